import { Document, LineCounter, parseDocument } from 'yaml';
import { describeError } from '../../errors.js';
import { MIME } from '../detector.js';
import type { FormatExtractor } from './types.js';
import { type DataVocabulary, walkDataRoot } from './yaml.js';

const JSON_VOCABULARY: DataVocabulary = {
  mapping: 'Object',
  sequence: 'Array',
  scalar: 'Value',
  alias: 'Value',
  typeKey: 'json_type',
  scalarType(value) {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'bigint') return 'number';
    return typeof value;
  },
  scanStrings: false,
};

type StrictParse = { ok: true; value: unknown } | { ok: false; error: string };

function parseStrict(source: string): StrictParse {
  try {
    const value: unknown = JSON.parse(source);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: describeError(err) };
  }
}

/**
 * JSON is checked with `JSON.parse` first; the tree is then read through the
 * YAML parser, which keeps the source ranges `JSON.parse` throws away.
 */
export const jsonExtractor: FormatExtractor = {
  kind: 'json',
  mimeTypes: [MIME.json],
  extract(raw, ctx) {
    const source = raw.replace(/^\uFEFF/, '');
    if (source.trim() === '') return;

    const parsed = parseStrict(source);
    if (!parsed.ok) {
      ctx.fail('parse', `Invalid JSON: ${parsed.error}`);
      return;
    }

    const lines = new LineCounter();
    const document = parseDocument(source, { lineCounter: lines, schema: 'json' });
    // Valid JSON the YAML reader rejects (tab-indented flow content) loses its line numbers.
    const contents = document.errors.length > 0 ? new Document(parsed.value).contents : document.contents;
    walkDataRoot(contents, { ctx, source, lines, vocabulary: JSON_VOCABULARY });
  },
};
