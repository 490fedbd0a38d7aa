import { readFileSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import type { FileInfo, MimeType, ProcessorKind } from '../../types.js';
import { describeError, failure } from '../../errors.js';
import { RecordTable, toRecord } from '../records.js';
import { TraversalContext } from '../scope.js';
import type { FormatExtractor, LanguageProcessor, ProcessingResult } from './types.js';

function readFileInfo(filePath: string): FileInfo {
  const absolutePath = resolve(filePath);
  const stats = statSync(absolutePath);
  return {
    name: basename(absolutePath),
    path: absolutePath,
    size: stats.size,
    lastModified: stats.mtimeMs,
  };
}

function readSourceFile(filePath: string, ctx: TraversalContext): { info: FileInfo; source: string } | null {
  try {
    const info = readFileInfo(filePath);
    return { info, source: readFileSync(filePath, 'utf-8') };
  } catch (err) {
    ctx.fail('read', `Cannot read ${filePath}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Wraps a format extractor with file reading and the processor's running
 * table. Failures of any kind end up in `result.errors`; nothing thrown by
 * the extractor escapes `processFile`.
 */
export class ExtractionProcessor implements LanguageProcessor {
  readonly kind: ProcessorKind;
  readonly table: RecordTable;
  private readonly supportedTypes: ReadonlySet<MimeType>;

  constructor(private readonly extractor: FormatExtractor) {
    this.kind = extractor.kind;
    this.table = new RecordTable(extractor.kind);
    this.supportedTypes = new Set(extractor.mimeTypes);
  }

  getSupportedTypes(): ReadonlySet<MimeType> {
    return this.supportedTypes;
  }

  processFile(filePath: string): ProcessingResult {
    const ctx = new TraversalContext(filePath);
    const result: ProcessingResult = {
      filePath,
      fileInfo: null,
      errors: ctx.errors,
      elements: [],
      records: [],
      table: this.table,
    };

    const file = readSourceFile(filePath, ctx);
    if (!file) return result;
    result.fileInfo = file.info;
    const source = file.source;

    try {
      this.extractor.extract(source, ctx);
    } catch (err) {
      // An unexpected throw mid-walk leaves a partial tree; keep none of it.
      result.errors.push(failure('parse', `${this.kind} extraction failed: ${describeError(err)}`));
      return result;
    }

    result.elements = ctx.elements;
    result.records = ctx.elements.map(element => toRecord(filePath, element));
    this.table.append(result.records);
    return result;
  }
}

/** Runs an extractor over in-memory text without touching a table. */
export function extractSource(extractor: FormatExtractor, filePath: string, source: string): TraversalContext {
  const ctx = new TraversalContext(filePath);
  extractor.extract(source, ctx);
  return ctx;
}
