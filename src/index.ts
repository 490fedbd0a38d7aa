export * from './types.js';
export { ConfigurationError, describeError, failure, type FailureKind } from './errors.js';
export { loadConfig, ConfigError, type OutlineConfig, type OutputFormat } from './config.js';
export {
  DEFAULT_IGNORE_DIRS,
  EXTENSION_MIME_TYPES,
  FileTypeDetector,
  MIME,
  MIME_ALIASES,
  detectMimeType,
  extractableTypes,
  resolveIgnoreDirs,
} from './parser/detector.js';
export { ScopeTracker, TraversalContext, PATH_SEPARATOR, type ElementDraft } from './parser/scope.js';
export { RECORD_COLUMNS, RecordTable, toRecord, type RecordColumn } from './parser/records.js';
export { countEntries, walkDirectory, type FolderListing, type ListDirectory } from './parser/scanner.js';
export {
  ProcessorRegistry,
  createDefaultRegistry,
  type Coverage,
  type DirectoryOptions,
  type DirectoryResult,
  type FileOutcome,
  type FileStatus,
  type Logger,
  type RegistryOptions,
} from './parser/registry.js';
export * from './parser/processors/index.js';
