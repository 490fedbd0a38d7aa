import type { Element, ElementRecord, FileInfo, MimeType, ProcessorKind } from '../../types.js';
import type { RecordTable } from '../records.js';
import type { TraversalContext } from '../scope.js';

/** Stateless per-format walker: everything it discovers goes into the context. */
export interface FormatExtractor {
  kind: ProcessorKind;
  mimeTypes: readonly MimeType[];
  extract(source: string, ctx: TraversalContext): void;
}

export interface ProcessingResult {
  filePath: string;
  fileInfo: FileInfo | null;
  errors: string[];
  elements: Element[];
  records: ElementRecord[];
  table: RecordTable;
}

export interface LanguageProcessor {
  readonly kind: ProcessorKind;
  readonly table: RecordTable;
  getSupportedTypes(): ReadonlySet<MimeType>;
  processFile(filePath: string): ProcessingResult;
}

export function isValid(result: ProcessingResult): boolean {
  return result.errors.length === 0;
}
