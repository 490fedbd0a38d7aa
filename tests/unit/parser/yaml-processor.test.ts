import { describe, it, expect } from 'vitest';
import { yamlExtractor } from '../../../src/parser/processors/yaml.js';
import { extractSource } from '../../../src/parser/processors/processor.js';

function extract(source: string) {
  return extractSource(yamlExtractor, 'config.yaml', source);
}

describe('YAML processor', () => {
  const source = [
    'name: demo',
    'server:',
    '  host: localhost',
    '  # the port',
    '  port: 8080',
    '  tags:',
    '    - web',
    '    - api',
    'db_url: postgres://${DB_HOST}:5432/app',
    'docs: see https://example.com/guide',
    'ratio: 0.5',
    'enabled: true',
    'empty:',
    '',
  ].join('\n');

  it('walks mappings and sequences in document order', () => {
    const ctx = extract(source);

    expect(ctx.errors).toEqual([]);
    expect(ctx.elements.map(e => [e.type, e.name, e.nestingLevel, e.parentPath])).toEqual([
      ['Scalar', 'name', 0, ''],
      ['Mapping', 'server', 0, ''],
      ['Scalar', 'host', 1, 'Mapping:server'],
      ['Scalar', 'port', 1, 'Mapping:server'],
      ['Sequence', 'tags', 1, 'Mapping:server'],
      ['Scalar', 'tags[0]', 2, 'Mapping:server/Sequence:tags'],
      ['Scalar', 'tags[1]', 2, 'Mapping:server/Sequence:tags'],
      ['Scalar', 'db_url', 0, ''],
      ['Scalar', 'docs', 0, ''],
      ['Scalar', 'ratio', 0, ''],
      ['Scalar', 'enabled', 0, ''],
      ['Scalar', 'empty', 0, ''],
    ]);
  });

  it('records positions, comments and scalar types', () => {
    const byName = new Map(extract(source).elements.map(e => [e.name, e]));

    const server = byName.get('server');
    expect(server?.startLine).toBe(2);
    expect(server?.endLine).toBe(8);
    expect(server?.props).toEqual({ keys: 3 });

    const port = byName.get('port');
    expect(port?.startLine).toBe(5);
    expect(port?.content).toBe('port: 8080');
    expect(port?.comments).toEqual(['# the port']);
    expect(port?.props).toEqual({ yaml_type: 'int' });

    expect(byName.get('tags')?.props).toEqual({ length: 2 });
    expect(byName.get('tags[0]')?.props).toEqual({ yaml_type: 'str' });
    expect(byName.get('ratio')?.props).toEqual({ yaml_type: 'float' });
    expect(byName.get('enabled')?.props).toEqual({ yaml_type: 'bool' });
    expect(byName.get('empty')?.props).toEqual({ yaml_type: 'null' });
    expect(byName.get('empty')?.content).toBe('empty:');
  });

  it('notes environment variables and URLs in string values', () => {
    const byName = new Map(extract(source).elements.map(e => [e.name, e]));

    expect(byName.get('db_url')?.props).toEqual({ yaml_type: 'str', env_vars: ['DB_HOST'] });
    expect(byName.get('docs')?.props).toEqual({ yaml_type: 'str', urls: ['https://example.com/guide'] });
  });

  it('wraps each document of a stream in its own frame', () => {
    const ctx = extract('a: 1\n---\nb: 2\n');

    expect(ctx.elements.map(e => [e.type, e.name, e.parentPath])).toEqual([
      ['Document', 'document_1', ''],
      ['Scalar', 'a', 'Document:document_1'],
      ['Document', 'document_2', ''],
      ['Scalar', 'b', 'Document:document_2'],
    ]);
  });

  it('names root sequence items by index', () => {
    const ctx = extract('- one\n- two\n');

    expect(ctx.elements.map(e => [e.name, e.content])).toEqual([
      ['[0]', 'one'],
      ['[1]', 'two'],
    ]);
  });

  it('records anchors and aliases', () => {
    const ctx = extract('base: &b 1\ncopy: *b\n');

    expect(ctx.elements.map(e => [e.type, e.name, e.props])).toEqual([
      ['Scalar', 'base', { yaml_type: 'int', anchor: 'b' }],
      ['Alias', 'copy', { anchor: 'b' }],
    ]);
  });

  it('emits nothing for a document with errors', () => {
    const ctx = extract('a: [1, 2\nb: 3\n');

    expect(ctx.elements).toEqual([]);
    expect(ctx.errors.length).toBeGreaterThan(0);
    expect(ctx.errors[0]).toMatch(/^ParseFailure: YAML: /);
  });

  it('skips pairs whose key is a collection', () => {
    const ctx = extract('? [a, b]\n: 1\nc: 2\n');

    expect(ctx.errors).toEqual(['ValidationFailure: Unsupported non-scalar key at line 1']);
    expect(ctx.elements.map(e => e.name)).toEqual(['c']);
  });

  it('produces nothing for an empty file', () => {
    const ctx = extract('');

    expect(ctx.elements).toEqual([]);
    expect(ctx.errors).toEqual([]);
  });

  it('produces nothing for a file holding only a document marker', () => {
    const ctx = extract('---\n');

    expect(ctx.elements).toEqual([]);
    expect(ctx.errors).toEqual([]);
  });
});
