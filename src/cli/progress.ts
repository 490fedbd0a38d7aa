import type { ProgressStats } from '../types.js';
import type { FileOutcome } from '../parser/registry.js';
import { COLORS, CURSOR, dim, green, magenta, red, yellow } from './colors.js';

const BAR_WIDTH = 20;
const FILLED = '\u2588';
const EMPTY = '\u2591';

export interface ProgressOutput {
  isTTY: boolean;
  write(text: string): void;
  error(text: string): void;
}

export const terminalOutput: ProgressOutput = {
  isTTY: process.stdout.isTTY ?? false,
  write: text => process.stdout.write(text),
  error: text => process.stderr.write(text),
};

export function formatTime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

let restoreOnExit = false;

function restoreCursor(): void {
  process.stdout.write(CURSOR.show);
}

/**
 * One-line bar for a directory walk, redrawn per file outcome. Off a TTY it
 * prints a line at each quarter instead.
 */
export class ExtractionProgress {
  private readonly stats: ProgressStats;
  private lastMilestone = 0;

  constructor(
    totalFiles: number,
    private readonly out: ProgressOutput = terminalOutput,
    now: number = Date.now(),
  ) {
    this.stats = {
      totalFiles,
      filesProcessed: 0,
      filesFailed: 0,
      filesUnrecognized: 0,
      filesUnsupported: 0,
      recordsExtracted: 0,
      startTime: now,
    };
    if (out.isTTY) {
      out.write(CURSOR.hide);
      if (!restoreOnExit) {
        process.on('exit', restoreCursor);
        restoreOnExit = true;
      }
    }
  }

  get done(): number {
    const s = this.stats;
    return s.filesProcessed + s.filesFailed + s.filesUnrecognized + s.filesUnsupported;
  }

  record(outcome: FileOutcome): void {
    const s = this.stats;
    s.currentItem = outcome.filePath;
    s.recordsExtracted += outcome.result?.records.length ?? 0;
    if (outcome.status === 'processed') s.filesProcessed++;
    else if (outcome.status === 'failed') s.filesFailed++;
    else if (outcome.errors[0]?.startsWith('DetectionFailure')) s.filesUnrecognized++;
    else s.filesUnsupported++;
    this.render();
  }

  logError(message: string): void {
    if (this.out.isTTY) {
      this.out.write('\r\x1b[K');
      this.out.error(`${red(message)}\n`);
      this.render();
    } else {
      this.out.error(`${message}\n`);
    }
  }

  private render(): void {
    const { totalFiles: total, recordsExtracted, filesFailed } = this.stats;
    const done = this.done;
    const ratio = total > 0 ? Math.min(done / total, 1) : 1;

    if (!this.out.isTTY) {
      const percent = Math.floor(ratio * 100);
      const milestone = Math.floor(percent / 25) * 25;
      if (milestone > this.lastMilestone) {
        this.out.write(`  Progress: ${percent}% (${done}/${total} files)\n`);
        this.lastMilestone = milestone;
      }
      return;
    }

    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = `${COLORS.green}${FILLED.repeat(filled)}${COLORS.reset}${COLORS.dim}${EMPTY.repeat(BAR_WIDTH - filled)}${COLORS.reset}`;
    const parts = [`[${bar}] ${yellow(`${done}/${total}`)} files`, `${magenta(String(recordsExtracted))} records`];
    if (filesFailed > 0) parts.push(`${red(String(filesFailed))} failed`);
    const item = this.stats.currentItem ? ` ${dim(this.stats.currentItem)}` : '';
    this.out.write(`\r\x1b[K${parts.join(' | ')}${item}`);
  }

  /** Clears the bar and returns the summary lines. */
  finish(now: number = Date.now()): string[] {
    if (this.out.isTTY) this.out.write(`\r\x1b[K${CURSOR.show}`);
    const s = this.stats;
    const skipped = s.filesUnrecognized + s.filesUnsupported;
    const lines = [
      green('--- Extraction Summary ---'),
      `Files processed: ${yellow(String(s.filesProcessed))} ${dim(`(${formatTime(now - s.startTime)})`)}`,
      `Files skipped: ${dim(String(skipped))} (${s.filesUnrecognized} unrecognized, ${s.filesUnsupported} without a processor)`,
    ];
    if (s.filesFailed > 0) lines.push(`Files with errors: ${red(String(s.filesFailed))}`);
    lines.push(`Records extracted: ${magenta(String(s.recordsExtracted))}`);
    return lines;
  }

  getStats(): ProgressStats {
    return { ...this.stats };
  }
}
