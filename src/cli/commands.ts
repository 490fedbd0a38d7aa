import { writeFileSync } from 'fs';
import { resolve } from 'path';
import type { OutlineConfig, OutputFormat } from '../config.js';
import { EXTENSION_MIME_TYPES } from '../parser/detector.js';
import { countEntries, walkDirectory } from '../parser/scanner.js';
import { createDefaultRegistry, type DirectoryResult, type Logger, type ProcessorRegistry } from '../parser/registry.js';
import { ExtractionProgress, terminalOutput, type ProgressOutput } from './progress.js';
import { bold, cyan, dim, magenta, red, yellow } from './colors.js';

export interface ExtractOptions {
  ignore?: string[];
  out?: string;
  format?: OutputFormat;
  strict?: boolean;
}

export interface CommandIO {
  write(text: string): void;
}

export const stdoutIO: CommandIO = {
  write: text => process.stdout.write(text),
};

const quietLogger: Logger = {
  log: () => {},
  error: () => {},
};

export const EXIT_OK = 0;
export const EXIT_FILE_FAILED = 1;
export const EXIT_STRICT_FAILURE = 2;

function tablesAsJsonLines(registry: ProcessorRegistry): string {
  return [...registry.tables().values()]
    .map(table => table.toJsonLines())
    .filter(text => text !== '')
    .join('\n');
}

function summaryLines(registry: ProcessorRegistry, results: DirectoryResult): string[] {
  const lines = [bold('Records by processor:')];
  for (const [kind, table] of registry.tables()) {
    lines.push(`  ${cyan(kind.padEnd(12))} ${magenta(String(table.size))}`);
  }
  lines.push(bold('Files by folder:'));
  for (const [folder, outcomes] of results) {
    const failed = outcomes.filter(o => o.status === 'failed').length;
    const note = failed > 0 ? ` ${red(`(${failed} with errors)`)}` : '';
    lines.push(`  ${folder} ${yellow(String(outcomes.length))}${note}`);
  }
  return lines;
}

/**
 * Walks `directory`, writes JSON Lines or a summary and returns the exit
 * code. Per-file failures only change it under `strict`.
 */
export function runExtract(
  directory: string,
  options: ExtractOptions,
  config: OutlineConfig,
  io: CommandIO = stdoutIO,
  progressOutput: ProgressOutput = terminalOutput,
): number {
  const root = resolve(directory);
  const format = options.format ?? config.output;
  const ignore = [...config.ignoreDirs, ...(options.ignore ?? [])];
  // JSON Lines on stdout must not be interleaved with progress output.
  const showProgress = format === 'summary' || options.out !== undefined;

  const listings = walkDirectory(root, ignore);
  const progress = showProgress ? new ExtractionProgress(countEntries(listings), progressOutput) : null;
  const logger: Logger = config.verbose
    ? { log: console.log, error: message => (progress ? progress.logError(message) : console.error(message)) }
    : quietLogger;
  const registry = createDefaultRegistry({ logger });

  let failed = 0;
  const results = registry.processListings(listings, {
    onFile: outcome => {
      if (outcome.status === 'failed') failed++;
      progress?.record(outcome);
    },
  });
  if (progress) {
    progressOutput.write(`${progress.finish().join('\n')}\n`);
  }

  if (format === 'jsonl') {
    const text = tablesAsJsonLines(registry);
    if (options.out) {
      writeFileSync(options.out, text === '' ? '' : `${text}\n`);
      io.write(`${dim(`Wrote ${options.out}`)}\n`);
    } else if (text !== '') {
      io.write(`${text}\n`);
    }
  } else {
    io.write(`${summaryLines(registry, results).join('\n')}\n`);
  }

  return options.strict && failed > 0 ? EXIT_STRICT_FAILURE : EXIT_OK;
}

/** Processes one file and prints its records as JSON Lines; errors go to stderr. */
export function runFile(filePath: string, io: CommandIO = stdoutIO, logger: Logger = console): number {
  const registry = createDefaultRegistry({ logger: quietLogger });
  const outcome = registry.processFile(resolve(filePath));

  for (const error of outcome.errors) logger.error(error);
  const table = outcome.processor ? registry.tables().get(outcome.processor) : undefined;
  const text = table?.toJsonLines() ?? '';
  if (text !== '') io.write(`${text}\n`);

  return outcome.status === 'processed' ? EXIT_OK : EXIT_FILE_FAILED;
}

/** Extension, MIME type and processor, one row per known extension. */
export function describeTypes(): string[] {
  const registry = createDefaultRegistry({ logger: quietLogger });
  return Object.entries(EXTENSION_MIME_TYPES).map(([extension, mimeType]) => {
    const processor = registry.processorFor(mimeType)?.kind ?? '-';
    return `${extension.padEnd(10)} ${mimeType.padEnd(26)} ${processor}`;
  });
}
