import type { MimeType, ProcessorKind } from '../types.js';
import { ConfigurationError, describeError, failure } from '../errors.js';
import { FileTypeDetector, MIME } from './detector.js';
import type { RecordTable } from './records.js';
import { walkDirectory, type FolderListing } from './scanner.js';
import { createProcessors } from './processors/index.js';
import { isValid, type LanguageProcessor, type ProcessingResult } from './processors/types.js';

export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

export type FileStatus = 'processed' | 'failed' | 'skipped';

export interface FileOutcome {
  filePath: string;
  status: FileStatus;
  mimeType: MimeType;
  processor: ProcessorKind | null;
  errors: string[];
  result: ProcessingResult | null;
}

/** Outcomes grouped by folder relative to the walked root; `.` is the root itself. */
export type DirectoryResult = Map<string, FileOutcome[]>;

export interface DirectoryOptions {
  ignoreDirs?: Iterable<string>;
  onFile?: (outcome: FileOutcome) => void;
}

export interface Coverage {
  missing: MimeType[];
  duplicates: MimeType[];
}

export interface RegistryOptions {
  detector?: FileTypeDetector;
  logger?: Logger;
}

/**
 * Maps MIME types to processors. The first processor to claim a type keeps
 * it; later claims are ignored and logged.
 */
export class ProcessorRegistry {
  private readonly processors: LanguageProcessor[] = [];
  private readonly byType = new Map<MimeType, LanguageProcessor>();
  private readonly duplicates = new Set<MimeType>();
  private readonly detector: FileTypeDetector;
  private readonly logger: Logger;

  constructor(options: RegistryOptions = {}) {
    this.detector = options.detector ?? new FileTypeDetector();
    this.logger = options.logger ?? console;
  }

  register(processor: LanguageProcessor): void {
    this.processors.push(processor);
    for (const mimeType of processor.getSupportedTypes()) {
      const owner = this.byType.get(mimeType);
      if (owner) {
        this.duplicates.add(mimeType);
        this.logger.error(`${mimeType} is already handled by ${owner.kind}; ignoring ${processor.kind}`);
        continue;
      }
      this.byType.set(mimeType, processor);
    }
  }

  processorFor(mimeType: MimeType): LanguageProcessor | undefined {
    return this.byType.get(mimeType);
  }

  coverage(): Coverage {
    return {
      missing: this.detector.extractableTypes().filter(t => !this.byType.has(t)),
      duplicates: [...this.duplicates],
    };
  }

  assertCoverage(): void {
    const { missing, duplicates } = this.coverage();
    if (missing.length === 0 && duplicates.length === 0) return;
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`no processor for ${missing.join(', ')}`);
    if (duplicates.length > 0) parts.push(`claimed twice: ${duplicates.join(', ')}`);
    throw new ConfigurationError(`Processor coverage mismatch: ${parts.join('; ')}`, missing, duplicates);
  }

  processFile(filePath: string): FileOutcome {
    const mimeType = this.detector.detect(filePath);
    if (this.detector.isUnknown(mimeType)) {
      return skipped(filePath, mimeType, failure('detection', `Unrecognized file type: ${filePath}`));
    }

    const processor = this.byType.get(mimeType);
    if (!processor) {
      return skipped(filePath, mimeType, failure('dispatch', `No processor for ${mimeType}: ${filePath}`));
    }

    let result: ProcessingResult;
    try {
      result = processor.processFile(filePath);
    } catch (err) {
      const message = failure('parse', `${processor.kind} processor crashed on ${filePath}: ${describeError(err)}`);
      this.logger.error(message);
      return { filePath, status: 'failed', mimeType, processor: processor.kind, errors: [message], result: null };
    }

    const status: FileStatus = isValid(result) ? 'processed' : 'failed';
    if (status === 'failed') {
      this.logger.error(`${filePath}: ${result.errors.join('; ')}`);
    }
    return { filePath, status, mimeType, processor: processor.kind, errors: result.errors, result };
  }

  processDirectory(root: string, options: DirectoryOptions = {}): DirectoryResult {
    return this.processListings(walkDirectory(root, options.ignoreDirs), options);
  }

  /** Processes an existing walk. A folder that failed to list yields one failed outcome for the folder. */
  processListings(listings: readonly FolderListing[], options: Pick<DirectoryOptions, 'onFile'> = {}): DirectoryResult {
    const results: DirectoryResult = new Map();
    for (const listing of listings) {
      const outcomes: FileOutcome[] = [];
      const report = (outcome: FileOutcome): void => {
        outcomes.push(outcome);
        options.onFile?.(outcome);
      };
      if (listing.error) {
        report(this.folderFailure(listing.path, listing.error));
      } else {
        for (const filePath of listing.files) report(this.processFile(filePath));
      }
      results.set(listing.folder, outcomes);
    }
    return results;
  }

  private folderFailure(path: string, error: string): FileOutcome {
    this.logger.error(error);
    return { filePath: path, status: 'failed', mimeType: MIME.directory, processor: null, errors: [error], result: null };
  }

  /** Each processor's own table, keyed by processor kind. */
  tables(): Map<ProcessorKind, RecordTable> {
    return new Map(this.processors.map(p => [p.kind, p.table] as const));
  }

  supportedTypes(): MimeType[] {
    return [...this.byType.keys()];
  }
}

function skipped(filePath: string, mimeType: MimeType, error: string): FileOutcome {
  return { filePath, status: 'skipped', mimeType, processor: null, errors: [error], result: null };
}

/** Registry with every built-in processor, coverage-checked. */
export function createDefaultRegistry(options: RegistryOptions = {}): ProcessorRegistry {
  const registry = new ProcessorRegistry(options);
  for (const processor of createProcessors()) {
    registry.register(processor);
  }
  registry.assertCoverage();
  return registry;
}
