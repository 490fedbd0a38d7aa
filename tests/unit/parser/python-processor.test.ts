import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { pythonExtractor } from '../../../src/parser/processors/python.js';
import { ExtractionProcessor, extractSource } from '../../../src/parser/processors/processor.js';

function extract(source: string) {
  return extractSource(pythonExtractor, 'test.py', source);
}

describe('Python processor', () => {
  it('nests an inner function under its parent', () => {
    const ctx = extract('def outer():\n    def inner(): pass\n');

    expect(ctx.errors).toEqual([]);
    expect(ctx.elements.map(e => [e.type, e.name, e.nestingLevel, e.parentPath])).toEqual([
      ['Function', 'outer', 0, ''],
      ['Function', 'inner', 1, 'Function:outer'],
    ]);
  });

  it('extracts imports, constants, classes and methods in source order', () => {
    const source = [
      'import os',
      'from typing import List, Optional',
      'from . import sibling',
      '',
      'MAX_RETRIES = 3',
      '',
      '',
      '# Loads records.',
      '# Second line.',
      '@dataclass',
      'class Loader(Base):',
      '    """Reads records."""',
      '',
      '    LIMIT = 10',
      '',
      '    async def load(self, path: str, *args, retries=2, **kwargs) -> List[str]:',
      '        return []',
      '',
    ].join('\n');
    const ctx = extract(source);

    expect(ctx.errors).toEqual([]);
    expect(ctx.elements.map(e => [e.order, e.type, e.name, e.parentPath])).toEqual([
      [1, 'Import', 'os', ''],
      [2, 'Import', 'typing', ''],
      [3, 'Import', '.', ''],
      [4, 'Constant', 'MAX_RETRIES', ''],
      [5, 'Class', 'Loader', ''],
      [6, 'Constant', 'LIMIT', 'Class:Loader'],
      [7, 'Method', 'load', 'Class:Loader'],
    ]);

    const [os, typing, relative, constant, loader, , load] = ctx.elements;
    expect(os.props).toEqual({ module: null, names: ['os'] });
    expect(typing.props).toEqual({ module: 'typing', names: ['List', 'Optional'] });
    expect(relative.props).toEqual({ module: '.', names: ['sibling'] });
    expect(constant.content).toBe('MAX_RETRIES = 3');

    expect(loader.comments).toEqual(['# Loads records.', '# Second line.']);
    expect(loader.startLine).toBe(10);
    expect(loader.props).toEqual({ bases: ['Base'], decorators: ['@dataclass'], docstring: 'Reads records.' });

    expect(load.nestingLevel).toBe(1);
    expect(load.parameters).toEqual(['self', 'path', '*args', 'retries', '**kwargs']);
    expect(load.props).toEqual({ async: true, decorators: [], return_type: 'List[str]', docstring: null });
  });

  it('names lambdas after their assignment target or synthesizes a name', () => {
    const ctx = extract('square = lambda x: x * x\nordered = sorted(items, key=lambda item: item.name)\n');

    expect(ctx.elements.map(e => [e.type, e.name, e.parameters])).toEqual([
      ['Lambda', 'square', ['x']],
      ['Lambda', 'lambda_1', ['item']],
    ]);
  });

  it('does not open a scope for lambdas', () => {
    const ctx = extract('def build():\n    return lambda: 1\n');

    const lambda = ctx.elements[1];
    expect(lambda.name).toBe('build.lambda_1');
    expect(lambda.parentPath).toBe('Function:build');
    expect(lambda.parameters).toEqual([]);
  });

  it('records __future__ and wildcard imports', () => {
    const ctx = extract('from __future__ import annotations\nfrom os.path import *\n');

    expect(ctx.elements.map(e => [e.name, e.props.names])).toEqual([
      ['__future__', ['annotations']],
      ['os.path', ['*']],
    ]);
  });

  it('ignores trailing comments and comments separated by a blank line', () => {
    const ctx = extract('x = 1  # trailing\ndef f():\n    pass\n\n# detached\n\ndef g():\n    pass\n');

    expect(ctx.elements.map(e => [e.name, e.comments])).toEqual([
      ['f', []],
      ['g', []],
    ]);
  });

  it('only treats upper-case module and class assignments as constants', () => {
    const ctx = extract('debug = True\n\ndef run():\n    LOCAL = 1\n');

    expect(ctx.elements.map(e => [e.type, e.name])).toEqual([['Function', 'run']]);
  });

  it('types functions inside methods as functions', () => {
    const ctx = extract('class A:\n    def m(self):\n        def helper():\n            pass\n');

    expect(ctx.elements.map(e => [e.type, e.name, e.parentPath])).toEqual([
      ['Class', 'A', ''],
      ['Method', 'm', 'Class:A'],
      ['Function', 'helper', 'Class:A/Method:m'],
    ]);
  });

  it('keeps the prefix before a syntax error and reports it', () => {
    const ctx = extract('def ok():\n    pass\n\ndef broken(:\n    pass\n');

    expect(ctx.elements.map(e => e.name)).toEqual(['ok']);
    expect(ctx.errors.length).toBeGreaterThan(0);
    expect(ctx.errors[0]).toMatch(/^ValidationFailure: Python syntax error at line 4/);
  });

  it('produces nothing for an empty file', () => {
    const ctx = extract('');

    expect(ctx.elements).toEqual([]);
    expect(ctx.errors).toEqual([]);
  });
});

describe('Python files through ExtractionProcessor', () => {
  const tempDir = mkdtempSync(join(tmpdir(), 'python-processor-test-'));
  const write = (name: string, content: string): string => {
    const fullPath = join(tempDir, name);
    writeFileSync(fullPath, content);
    return fullPath;
  };

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reports file info for an empty file with no records or errors', () => {
    const filePath = write('empty.py', '');
    const result = new ExtractionProcessor(pythonExtractor).processFile(filePath);

    expect(result.errors).toEqual([]);
    expect(result.records).toEqual([]);
    expect(result.fileInfo).toMatchObject({ name: 'empty.py', path: filePath, size: 0 });
    expect(typeof result.fileInfo?.lastModified).toBe('number');
  });

  it('extracts every function from a file larger than the default parser buffer', () => {
    const source = Array.from({ length: 2000 }, (_, i) => `def f${i}(a, b):\n    return a + b\n`).join('');
    expect(source.length).toBeGreaterThan(64 * 1024);
    const processor = new ExtractionProcessor(pythonExtractor);

    const result = processor.processFile(write('large.py', source));

    expect(result.errors).toEqual([]);
    expect(result.records).toHaveLength(2000);
    expect(result.records[1999]).toMatchObject({ name: 'f1999', order: 2000, element_type: 'Function' });
    expect(processor.table.size).toBe(2000);
  });
});
