import { describe, it, expect, afterAll, vi } from 'vitest';
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../../../src/errors.js';
import { MIME, MIME_ALIASES, extractableTypes } from '../../../src/parser/detector.js';
import { RecordTable } from '../../../src/parser/records.js';
import { ProcessorRegistry, createDefaultRegistry, type Logger } from '../../../src/parser/registry.js';
import { ExtractionProcessor } from '../../../src/parser/processors/processor.js';
import { pythonExtractor } from '../../../src/parser/processors/python.js';
import type { LanguageProcessor } from '../../../src/parser/processors/types.js';

const scripts = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures', 'scripts');

function spyLogger() {
  return { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() } satisfies Logger;
}

describe('ProcessorRegistry', () => {
  const tempDir = mkdtempSync(join(tmpdir(), 'registry-test-'));
  const file = (name: string, content: string): string => {
    const fullPath = join(tempDir, name);
    mkdirSync(join(fullPath, '..'), { recursive: true });
    writeFileSync(fullPath, content);
    return fullPath;
  };

  const emptyPy = file('empty.py', '');
  const goodPy = file('good.py', 'def good():\n    return 1\n');
  const badPy = file('bad.py', 'def ok():\n    pass\n\ndef broken(:\n    pass\n');
  const notes = file('notes.txt', 'plain words');
  const blob = file('blob', 'just some words');
  file('pkg/config.yaml', 'name: demo\n');

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('covers every extractable type exactly once', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });

    expect(registry.coverage()).toEqual({ missing: [], duplicates: [] });
    expect([...registry.supportedTypes()].sort()).toEqual(
      [...extractableTypes(), ...MIME_ALIASES.jupyter, ...MIME_ALIASES.shell].sort(),
    );
  });

  it('answers to the alternate names of a format', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });

    expect(registry.processorFor('application/x-jupyter')?.kind).toBe('jupyter');
    expect(registry.processorFor('text/x-ipynb+json')?.kind).toBe('jupyter');
    expect(registry.processorFor('application/x-sh')?.kind).toBe('shell');
  });

  it('dispatches shell scripts found by their shebang and MDX files', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });

    const script = registry.processFile(join(scripts, 'setup'));
    expect(script).toMatchObject({ status: 'processed', mimeType: MIME.shell, processor: 'shell', errors: [] });
    expect(script.result?.records.map(r => [r.element_type, r.name])).toEqual([
      ['Variable', 'PREFIX'],
      ['Function', 'install_tools'],
    ]);

    const page = registry.processFile(join(scripts, 'intro.mdx'));
    expect(page).toMatchObject({ status: 'processed', mimeType: MIME.mdx, processor: 'mdx', errors: [] });
    expect(page.result?.records.map(r => [r.element_type, r.name])).toEqual([
      ['Frontmatter', 'frontmatter'],
      ['Import', './chart.js'],
      ['Header', 'Overview'],
      ['JSXElement', 'Chart'],
    ]);
  });

  it('keeps the first processor to claim a type', () => {
    const logger = spyLogger();
    const registry = new ProcessorRegistry({ logger });
    const first = new ExtractionProcessor(pythonExtractor);
    const second = new ExtractionProcessor(pythonExtractor);
    registry.register(first);
    registry.register(second);

    expect(registry.processorFor(MIME.python)).toBe(first);
    expect(logger.error).toHaveBeenCalledWith(`${MIME.python} is already handled by python; ignoring python`);
    expect(registry.coverage().duplicates).toEqual([MIME.python]);
  });

  it('refuses a processor set that leaves types uncovered', () => {
    const registry = new ProcessorRegistry({ logger: spyLogger() });
    registry.register(new ExtractionProcessor(pythonExtractor));

    expect(() => registry.assertCoverage()).toThrow(ConfigurationError);
    try {
      registry.assertCoverage();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.missing).toContain(MIME.yaml);
        expect(err.missing).not.toContain(MIME.python);
        expect(err.duplicates).toEqual([]);
        expect(err.message).toMatch(/^Processor coverage mismatch: no processor for /);
      }
    }
  });

  it('skips files it cannot classify or dispatch', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });

    const unknown = registry.processFile(blob);
    expect(unknown.status).toBe('skipped');
    expect(unknown.mimeType).toBe(MIME.unknown);
    expect(unknown.errors).toEqual([`DetectionFailure: Unrecognized file type: ${blob}`]);

    const plain = registry.processFile(notes);
    expect(plain.status).toBe('skipped');
    expect(plain.processor).toBeNull();
    expect(plain.errors).toEqual([`DispatchFailure: No processor for ${MIME.plain}: ${notes}`]);
  });

  it('processes an empty source file to zero records', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });
    const outcome = registry.processFile(emptyPy);

    expect(outcome.status).toBe('processed');
    expect(outcome.processor).toBe('python');
    expect(outcome.errors).toEqual([]);
    expect(outcome.result?.records).toEqual([]);
  });

  it('marks a file with syntax errors failed without affecting the next', () => {
    const logger = spyLogger();
    const registry = createDefaultRegistry({ logger });

    const bad = registry.processFile(badPy);
    const good = registry.processFile(goodPy);

    expect(bad.status).toBe('failed');
    expect(bad.errors[0]).toMatch(/^ValidationFailure: Python syntax error at line 4/);
    expect(bad.result?.records.map(r => r.name)).toEqual(['ok']);
    expect(logger.error).toHaveBeenCalledTimes(1);

    expect(good.status).toBe('processed');
    expect(good.result?.records.map(r => r.name)).toEqual(['good']);
    expect(registry.tables().get('python')?.all().map(r => r.name)).toEqual(['ok', 'good']);
  });

  it('turns a crashing processor into a failed outcome', () => {
    const logger = spyLogger();
    const registry = new ProcessorRegistry({ logger });
    const crashing: LanguageProcessor = {
      kind: 'python',
      table: new RecordTable('python'),
      getSupportedTypes: () => new Set([MIME.python]),
      processFile: () => {
        throw new Error('boom');
      },
    };
    registry.register(crashing);

    const outcome = registry.processFile(goodPy);
    expect(outcome.status).toBe('failed');
    expect(outcome.result).toBeNull();
    expect(outcome.errors).toEqual([`ParseFailure: python processor crashed on ${goodPy}: boom`]);
    expect(logger.error).toHaveBeenCalledWith(outcome.errors[0]);
  });

  it('hands out each processor table by kind', () => {
    const registry = new ProcessorRegistry({ logger: spyLogger() });
    const processor = new ExtractionProcessor(pythonExtractor);
    registry.register(processor);

    expect(registry.tables().get('python')).toBe(processor.table);
    expect([...registry.tables().keys()]).toEqual(['python']);
  });

  it('groups directory outcomes by folder and reports each file', () => {
    const registry = createDefaultRegistry({ logger: spyLogger() });
    const seen: string[] = [];
    const results = registry.processDirectory(tempDir, { onFile: outcome => seen.push(outcome.filePath) });

    expect([...results.keys()]).toEqual(['.', 'pkg']);
    expect(results.get('pkg')?.map(o => [o.status, o.processor])).toEqual([['processed', 'yaml']]);
    expect(seen).toHaveLength(6);
    expect(registry.tables().get('yaml')?.all().map(r => r.name)).toEqual(['name']);
  });

  it('turns a folder that could not be listed into one failed outcome', () => {
    const logger = spyLogger();
    const registry = createDefaultRegistry({ logger });
    const seen: string[] = [];
    const error = 'ReadFailure: Cannot list /srv/locked: EACCES: permission denied';
    const configPath = join(tempDir, 'pkg', 'config.yaml');

    const results = registry.processListings(
      [
        { folder: 'locked', path: '/srv/locked', files: [], error },
        { folder: 'pkg', path: join(tempDir, 'pkg'), files: [configPath] },
      ],
      { onFile: outcome => seen.push(outcome.filePath) },
    );

    expect(results.get('locked')).toEqual([
      { filePath: '/srv/locked', status: 'failed', mimeType: MIME.directory, processor: null, errors: [error], result: null },
    ]);
    expect(results.get('pkg')?.map(o => o.status)).toEqual(['processed']);
    expect(seen).toEqual(['/srv/locked', configPath]);
    expect(logger.error).toHaveBeenCalledWith(error);
  });

  it('produces identical records for identical runs', () => {
    const first = createDefaultRegistry({ logger: spyLogger() });
    const second = createDefaultRegistry({ logger: spyLogger() });
    first.processDirectory(tempDir);
    second.processDirectory(tempDir);

    for (const [kind, table] of first.tables()) {
      expect(second.tables().get(kind)?.toJsonLines()).toBe(table.toJsonLines());
    }
  });
});
