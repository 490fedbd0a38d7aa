import { LineCounter, isAlias, isMap, isPair, isScalar, isSeq, parseAllDocuments } from 'yaml';
import type { ElementType, Props } from '../../types.js';
import type { TraversalContext } from '../scope.js';
import { MIME } from '../detector.js';
import { findEnvVars, findUrls } from '../props.js';
import type { FormatExtractor } from './types.js';

/** Element names and scalar typing for one data format walked over `yaml` nodes. */
export interface DataVocabulary {
  mapping: ElementType;
  sequence: ElementType;
  scalar: ElementType;
  alias: ElementType;
  typeKey: string;
  scalarType(value: unknown): string;
  scanStrings: boolean;
}

const YAML_VOCABULARY: DataVocabulary = {
  mapping: 'Mapping',
  sequence: 'Sequence',
  scalar: 'Scalar',
  alias: 'Alias',
  typeKey: 'yaml_type',
  scalarType(value) {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'boolean') return 'bool';
    if (typeof value === 'bigint') return 'int';
    if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
    return 'str';
  },
  scanStrings: true,
};

export interface DataWalk {
  ctx: TraversalContext;
  source: string;
  lines: LineCounter;
  vocabulary: DataVocabulary;
}

function rangeOf(node: unknown): [number, number] | null {
  if (typeof node !== 'object' || node === null || !('range' in node)) return null;
  const range = node.range;
  if (!Array.isArray(range) || typeof range[0] !== 'number' || typeof range[1] !== 'number') return null;
  return [range[0], range[1]];
}

function commentLines(comment: unknown): string[] {
  if (typeof comment !== 'string') return [];
  return comment.split('\n').filter(line => line.trim() !== '').map(line => `#${line}`);
}

function commentsBefore(node: unknown): string[] {
  if (typeof node !== 'object' || node === null || !('commentBefore' in node)) return [];
  return commentLines(node.commentBefore);
}

function position(walk: DataWalk, start: number, end: number): { startLine: number; endLine: number; content: string } {
  // `end` is exclusive; a trailing newline belongs to the previous line.
  const content = walk.source.slice(start, end).replace(/\s+$/, '');
  return {
    startLine: walk.lines.linePos(start).line,
    endLine: walk.lines.linePos(start + Math.max(content.length - 1, 0)).line,
    content,
  };
}

/** Emits one named value; maps and sequences push a frame and recurse. */
export function walkDataValue(
  name: string,
  value: unknown,
  start: number,
  comments: string[],
  walk: DataWalk,
  fallbackEnd = start,
): void {
  const { ctx, vocabulary } = walk;
  const valueRange = rangeOf(value);
  const end = valueRange ? valueRange[1] : fallbackEnd;
  const located = position(walk, start, Math.max(end, start));

  if (isMap(value)) {
    ctx.emit({ type: vocabulary.mapping, name, ...located, comments, props: { keys: value.items.length } });
    ctx.within(vocabulary.mapping, name, () => walkDataMap(value.items, walk, commentsBefore(value)));
    return;
  }

  if (isSeq(value)) {
    ctx.emit({ type: vocabulary.sequence, name, ...located, comments, props: { length: value.items.length } });
    ctx.within(vocabulary.sequence, name, () => {
      value.items.forEach((item, index) => {
        const itemRange = rangeOf(item);
        walkDataValue(`${name}[${index}]`, item, itemRange ? itemRange[0] : end, commentsBefore(item), walk);
      });
    });
    return;
  }

  if (isAlias(value)) {
    ctx.emit({ type: vocabulary.alias, name, ...located, comments, props: { anchor: value.source } });
    return;
  }

  const scalar: unknown = isScalar(value) ? value.value : value;
  const props: Props = { [vocabulary.typeKey]: vocabulary.scalarType(scalar) };
  if (isScalar(value) && value.anchor) props.anchor = value.anchor;
  if (vocabulary.scanStrings && typeof scalar === 'string') {
    const envVars = findEnvVars(scalar);
    const urls = findUrls(scalar);
    if (envVars.length > 0) props.env_vars = envVars;
    if (urls.length > 0) props.urls = urls;
  }
  ctx.emit({ type: vocabulary.scalar, name, ...located, comments, props });
}

/** Walks map pairs in source order. A key that is not a scalar cannot name an element. */
export function walkDataMap(items: unknown[], walk: DataWalk, firstComments: string[] = []): void {
  items.forEach((pair, index) => {
    if (!isPair(pair)) return;
    const key = pair.key;
    const keyRange = rangeOf(key);
    if (!isScalar(key)) {
      const line = keyRange ? walk.lines.linePos(keyRange[0]).line : 0;
      walk.ctx.fail('validation', `Unsupported non-scalar key at line ${line}`);
      return;
    }
    const comments = [...(index === 0 ? firstComments : []), ...commentsBefore(key)];
    const [start, keyEnd] = keyRange ?? [0, 0];
    walkDataValue(String(key.value), pair.value, start, comments, walk, keyEnd);
  });
}

/** Top-level contents: map pairs and sequence items become root elements. */
export function walkDataRoot(contents: unknown, walk: DataWalk): void {
  if (isMap(contents)) {
    walkDataMap(contents.items, walk, commentsBefore(contents));
    return;
  }
  if (isSeq(contents)) {
    contents.items.forEach((item, index) => {
      const range = rangeOf(item);
      walkDataValue(`[${index}]`, item, range ? range[0] : 0, commentsBefore(item), walk);
    });
    return;
  }
  if (contents !== null && contents !== undefined) {
    const range = rangeOf(contents);
    walkDataValue('value', contents, range ? range[0] : 0, commentsBefore(contents), walk);
  }
}

/** A document that is only a `---` marker composes to an empty null scalar. */
function isEmptyContents(contents: unknown): boolean {
  if (contents === null || contents === undefined) return true;
  if (!isScalar(contents) || contents.value !== null) return false;
  const range = rangeOf(contents);
  return range !== null && range[0] === range[1];
}

function firstLine(message: string): string {
  return message.split('\n', 1)[0];
}

export const yamlExtractor: FormatExtractor = {
  kind: 'yaml',
  mimeTypes: [MIME.yaml],
  extract(source, ctx) {
    const lines = new LineCounter();
    const documents = parseAllDocuments(source, { lineCounter: lines });

    const walk: DataWalk = { ctx, source, lines, vocabulary: YAML_VOCABULARY };
    const multiple = documents.length > 1;

    const errors = documents.flatMap(document => document.errors);
    if (errors.length > 0) {
      for (const error of errors) ctx.fail('parse', `YAML: ${firstLine(error.message)}`);
      return;
    }

    for (const [index, document] of documents.entries()) {
      if (isEmptyContents(document.contents)) continue;
      if (!multiple) {
        walkDataRoot(document.contents, walk);
        continue;
      }

      const name = `document_${index + 1}`;
      const [start, end] = document.range;
      ctx.emit({
        type: 'Document',
        name,
        ...position(walk, start, end),
        comments: commentLines(document.commentBefore),
      });
      ctx.within('Document', name, () => walkDataRoot(document.contents, walk));
    }
  },
};
