export type FailureKind = 'detection' | 'read' | 'parse' | 'validation' | 'dispatch';

const LABELS: Record<FailureKind, string> = {
  detection: 'DetectionFailure',
  read: 'ReadFailure',
  parse: 'ParseFailure',
  validation: 'ValidationFailure',
  dispatch: 'DispatchFailure',
};

/**
 * Formats a per-file failure as the string stored on results.
 * Failures are data: nothing in the extraction path throws them.
 */
export function failure(kind: FailureKind, message: string): string {
  return `${LABELS[kind]}: ${message}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * A processor set that disagrees with the detector's extension table.
 * Raised at startup, never while walking files.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly missing: string[],
    readonly duplicates: string[],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
