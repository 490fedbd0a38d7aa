import type { Props } from '../../types.js';
import type { TraversalContext } from '../scope.js';
import { MIME } from '../detector.js';
import type { FormatExtractor } from './types.js';
import { walkMarkdown, type BlockVisitor, type LineSpan } from './markdown.js';

const ESM_STATEMENT = /^(import|export)\b/;
const COMPONENT_TAG = /^\s*<([A-Z][\w-]*)/;
const OPENING_TAG = /^\s*<[^>]*>/;
const ATTRIBUTE = /([A-Za-z_][\w-]*)=(?:"([^"]*)"|'([^']*)'|(\{[^}]*\}))/g;

interface EsmStatement {
  lines: string[];
  startLine: number;
}

/** One statement per line starting with `import` or `export`; other lines continue the one above. */
function splitStatements(raw: string, startLine: number): EsmStatement[] {
  const statements: EsmStatement[] = [];
  raw
    .replace(/\s+$/, '')
    .split('\n')
    .forEach((line, index) => {
      const last = statements[statements.length - 1];
      if (last && !ESM_STATEMENT.test(line)) {
        last.lines.push(line);
      } else {
        statements.push({ lines: [line], startLine: startLine + index });
      }
    });
  return statements;
}

function importSource(statement: string): string | null {
  const match = /\bfrom\s+['"]([^'"]+)['"]/.exec(statement) ?? /^import\s+['"]([^'"]+)['"]/.exec(statement);
  return match ? match[1] : null;
}

function exportName(statement: string): string {
  if (/^export\s+default\b/.test(statement)) return 'default';
  const declared = /^export\s+(?:async\s+)?(?:const|let|var|function\*?|class)\s+([A-Za-z_$][\w$]*)/.exec(statement);
  if (declared) return declared[1];
  const list = /^export\s*\{([^}]*)\}/.exec(statement);
  if (!list) return '*';
  return list[1]
    .split(',')
    .map(part => part.trim().split(/\s+as\s+/).pop() ?? '')
    .filter(name => name !== '')
    .join(', ');
}

function emitStatements(raw: string, startLine: number, comments: string[], ctx: TraversalContext): void {
  for (const [index, { lines, startLine: line }] of splitStatements(raw, startLine).entries()) {
    const text = lines.join('\n');
    const span = { startLine: line, endLine: line + lines.length - 1 };
    const own = index === 0 ? comments : [];
    if (text.startsWith('import')) {
      const source = importSource(text);
      ctx.emit({ type: 'Import', name: source ?? text, content: text, ...span, comments: own, props: { source } });
    } else {
      ctx.emit({
        type: 'Export',
        name: exportName(text),
        content: text,
        ...span,
        comments: own,
        props: { default: /^export\s+default\b/.test(text) },
      });
    }
  }
}

function emitComponent(name: string, raw: string, span: LineSpan, comments: string[], ctx: TraversalContext): void {
  const openingTag = OPENING_TAG.exec(raw)?.[0] ?? raw;
  const attributes: Props = {};
  for (const match of openingTag.matchAll(ATTRIBUTE)) {
    attributes[match[1]] = match[2] ?? match[3] ?? match[4] ?? '';
  }
  ctx.emit({
    type: 'JSXElement',
    name,
    content: raw.trim(),
    ...span,
    comments,
    props: { attributes, self_closing: /\/>\s*$/.test(openingTag) },
  });
}

const visitMdxBlock: BlockVisitor = (token, span, comments, ctx) => {
  if (token.type === 'paragraph' && ESM_STATEMENT.test(token.raw)) {
    emitStatements(token.raw, span.startLine, comments, ctx);
    return true;
  }
  if (token.type === 'html') {
    const tag = COMPONENT_TAG.exec(token.raw);
    if (tag) {
      emitComponent(tag[1], token.raw, span, comments, ctx);
      return true;
    }
  }
  return false;
};

/** Markdown plus top-level ESM statements and capitalized JSX blocks. */
export const mdxExtractor: FormatExtractor = {
  kind: 'mdx',
  mimeTypes: [MIME.mdx],
  extract(source, ctx) {
    walkMarkdown(source, ctx, visitMdxBlock);
  },
};
