import { describe, it, expect } from 'vitest';
import type { ElementRecord } from '../../../src/types.js';
import { CURSOR } from '../../../src/cli/colors.js';
import { ExtractionProgress, formatTime, type ProgressOutput } from '../../../src/cli/progress.js';
import { RecordTable } from '../../../src/parser/records.js';
import type { FileOutcome } from '../../../src/parser/registry.js';

const stripAnsi = (text: string): string => text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');

function captureOutput(isTTY = false) {
  const written: string[] = [];
  const errors: string[] = [];
  const output: ProgressOutput = {
    isTTY,
    write: text => {
      written.push(text);
    },
    error: text => {
      errors.push(text);
    },
  };
  return { output, written, errors };
}

function record(name: string): ElementRecord {
  return { filepath: 'a.py', parent_path: '', order: 1, name, content: `def ${name}(): pass`, props: '{}', element_type: 'Function' };
}

function outcome(filePath: string, status: FileOutcome['status'], records: ElementRecord[], errors: string[] = []): FileOutcome {
  const result =
    status === 'skipped'
      ? null
      : { filePath, fileInfo: null, errors, elements: [], records, table: new RecordTable('python') };
  return { filePath, status, mimeType: 'text/x-python', processor: status === 'skipped' ? null : 'python', errors, result };
}

const outcomes: FileOutcome[] = [
  outcome('a.py', 'processed', [record('f'), record('g')]),
  outcome('b.py', 'failed', [record('ok')], ['ValidationFailure: Python syntax error at line 4, column 1: missing ")"']),
  outcome('blob', 'skipped', [], ['DetectionFailure: Unrecognized file type: blob']),
  outcome('notes.txt', 'skipped', [], ['DispatchFailure: No processor for text/plain: notes.txt']),
];

describe('ExtractionProgress', () => {
  it('counts outcomes by status and skip reason', () => {
    const progress = new ExtractionProgress(4, captureOutput().output, 0);
    for (const o of outcomes) progress.record(o);

    expect(progress.getStats()).toEqual({
      totalFiles: 4,
      filesProcessed: 1,
      filesFailed: 1,
      filesUnrecognized: 1,
      filesUnsupported: 1,
      recordsExtracted: 3,
      startTime: 0,
      currentItem: 'notes.txt',
    });
    expect(progress.done).toBe(4);
  });

  it('prints a line at each quarter when not on a terminal', () => {
    const { output, written } = captureOutput();
    const progress = new ExtractionProgress(4, output, 0);
    for (const o of outcomes) progress.record(o);

    expect(written).toEqual([
      '  Progress: 25% (1/4 files)\n',
      '  Progress: 50% (2/4 files)\n',
      '  Progress: 75% (3/4 files)\n',
      '  Progress: 100% (4/4 files)\n',
    ]);
  });

  it('summarizes processed, skipped and failed files', () => {
    const progress = new ExtractionProgress(4, captureOutput().output, 1_000);
    for (const o of outcomes) progress.record(o);

    expect(progress.finish(66_000).map(stripAnsi)).toEqual([
      '--- Extraction Summary ---',
      'Files processed: 1 (1m 5s)',
      'Files skipped: 2 (1 unrecognized, 1 without a processor)',
      'Files with errors: 1',
      'Records extracted: 3',
    ]);
  });

  it('leaves out the error line when nothing failed', () => {
    const progress = new ExtractionProgress(1, captureOutput().output, 0);
    progress.record(outcomes[0]);

    expect(progress.finish(500).map(stripAnsi)).toEqual([
      '--- Extraction Summary ---',
      'Files processed: 1 (0s)',
      'Files skipped: 0 (0 unrecognized, 0 without a processor)',
      'Records extracted: 2',
    ]);
  });

  it('redraws a single line on a terminal and restores the cursor', () => {
    const { output, written, errors } = captureOutput(true);
    const progress = new ExtractionProgress(2, output, 0);
    progress.record(outcomes[0]);
    progress.logError('b.py: broken');
    progress.finish(0);

    expect(written[0]).toBe(CURSOR.hide);
    expect(stripAnsi(written[1])).toBe('\r[██████████' + '░'.repeat(10) + '] 1/2 files | 2 records a.py');
    expect(errors.map(stripAnsi)).toEqual(['b.py: broken\n']);
    expect(written[written.length - 1]).toBe(`\r\x1b[K${CURSOR.show}`);
  });
});

describe('formatTime', () => {
  it('formats seconds and minutes', () => {
    expect(formatTime(999)).toBe('0s');
    expect(formatTime(42_000)).toBe('42s');
    expect(formatTime(125_000)).toBe('2m 5s');
  });
});
