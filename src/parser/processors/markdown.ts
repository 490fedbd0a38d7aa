import { marked, type Token, type Tokens } from 'marked';
import { parse as parseYaml } from 'yaml';
import type { Props } from '../../types.js';
import { describeError } from '../../errors.js';
import type { TraversalContext } from '../scope.js';
import { MIME } from '../detector.js';
import { toPropValue } from '../props.js';
import type { FormatExtractor } from './types.js';

const FRONTMATTER = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;
const HTML_COMMENT = /^\s*<!--([\s\S]*?)-->\s*$/;
const OPENING_FENCE = /^ {0,3}(`{3,}|~{3,})/;

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

function isCode(token: Token): token is Tokens.Code {
  return token.type === 'code';
}

function isList(token: Token): token is Tokens.List {
  return token.type === 'list';
}

function isBlockquote(token: Token): token is Tokens.Blockquote {
  return token.type === 'blockquote';
}

function isTable(token: Token): token is Tokens.Table {
  return token.type === 'table';
}

function isHtml(token: Token): token is Tokens.HTML {
  return token.type === 'html';
}

function isLink(token: Token): token is Tokens.Link {
  return token.type === 'link';
}

function countLines(text: string): number {
  return text.split('\n').length - 1;
}

/** A fenced block is closed when its last line repeats the fence character at least as many times. */
function isUnclosedFence(token: Tokens.Code): boolean {
  if (token.codeBlockStyle === 'indented') return false;
  const opening = OPENING_FENCE.exec(token.raw);
  if (!opening) return false;
  const fence = opening[1];
  const body = token.raw.replace(/\s+$/, '');
  const lastLine = body.slice(body.lastIndexOf('\n') + 1).trim();
  if (body.indexOf('\n') === -1) return true;
  return !(lastLine.length >= fence.length && [...lastLine].every(ch => ch === fence[0]));
}

export interface LineSpan {
  startLine: number;
  endLine: number;
}

/** Claims a top-level token ahead of the Markdown rules; returns true when it did. */
export type BlockVisitor = (token: Token, span: LineSpan, comments: string[], ctx: TraversalContext) => boolean;

interface MarkdownWalk {
  ctx: TraversalContext;
  visitBlock?: BlockVisitor;
  body: string;
  // Where the previous token ended, as an offset into `body` and a 1-based line.
  offset: number;
  line: number;
  sections: number[];
  pendingComments: string[];
}

// Line endings and leading tabs the way the lexer rewrites them, so every token's raw text is found verbatim.
function normalizeBody(body: string): string {
  return body
    .replace(/\r\n|\r/g, '\n')
    .replace(/^( *)(\t+)/gm, (_, leading: string, tabs: string) => leading + '    '.repeat(tabs.length));
}

/**
 * Moves past `raw` and returns its first line. Link reference definitions
 * are consumed without a token, so the gap before `raw` is counted too.
 */
function advance(walk: MarkdownWalk, raw: string): number {
  const index = walk.body.indexOf(raw, walk.offset);
  const start = index === -1 ? walk.offset : index;
  const startLine = walk.line + countLines(walk.body.slice(walk.offset, start));
  walk.offset = start + raw.length;
  walk.line = startLine + countLines(raw);
  return startLine;
}

function emitLinks(token: Token, startLine: number, walk: MarkdownWalk): void {
  const links: Tokens.Link[] = [];
  marked.walkTokens([token], inner => {
    if (isLink(inner)) links.push(inner);
  });
  for (const link of links) {
    walk.ctx.emit({
      type: 'Link',
      name: link.text,
      content: link.href,
      startLine,
      endLine: startLine,
      props: { title: link.title ?? null },
    });
  }
}

function openSection(token: Tokens.Heading, span: LineSpan, comments: string[], walk: MarkdownWalk): void {
  const { ctx, sections } = walk;
  while (sections.length > 0 && sections[sections.length - 1] >= token.depth) {
    ctx.scope.pop();
    sections.pop();
  }
  ctx.emit({
    type: 'Header',
    name: token.text,
    content: token.raw.trim(),
    ...span,
    comments,
    props: { level: token.depth },
  });
  ctx.scope.push('Header', token.text);
  sections.push(token.depth);
}

function blockElement(token: Token): { type: 'CodeBlock' | 'List' | 'Blockquote' | 'Table' | 'Html'; base: string; content: string; props: Props } | null {
  if (isCode(token)) {
    return {
      type: 'CodeBlock',
      base: 'code',
      content: token.text,
      props: { language: token.lang || null, fenced: token.codeBlockStyle !== 'indented' },
    };
  }
  if (isList(token)) {
    return {
      type: 'List',
      base: 'list',
      content: token.raw.trim(),
      props: {
        ordered: token.ordered,
        items: token.items.map(item => item.text),
        tasks: token.items.filter(item => item.task).length,
      },
    };
  }
  if (isBlockquote(token)) {
    return { type: 'Blockquote', base: 'quote', content: token.text, props: {} };
  }
  if (isTable(token)) {
    return {
      type: 'Table',
      base: 'table',
      content: token.raw.trim(),
      props: { header: token.header.map(cell => cell.text), rows: token.rows.length },
    };
  }
  if (isHtml(token)) {
    const tag = /<([A-Za-z][\w-]*)/.exec(token.text);
    return { type: 'Html', base: 'html', content: token.text.trim(), props: { tag: tag ? tag[1].toLowerCase() : null } };
  }
  return null;
}

/** Returns false when traversal has to stop. */
function visitToken(token: Token, walk: MarkdownWalk): boolean {
  const { ctx } = walk;
  const startLine = advance(walk, token.raw);
  const span = { startLine, endLine: startLine + countLines(token.raw.replace(/\s+$/, '')) };

  if (token.type === 'space') return true;

  if (isHtml(token)) {
    const comment = HTML_COMMENT.exec(token.text);
    if (comment) {
      walk.pendingComments.push(comment[1].trim());
      return true;
    }
  }

  if (isCode(token) && isUnclosedFence(token)) {
    ctx.fail('validation', `Unclosed code block starting at line ${startLine}`);
    return false;
  }

  const comments = walk.pendingComments;
  walk.pendingComments = [];

  if (walk.visitBlock?.(token, span, comments, ctx)) return true;

  if (isHeading(token)) {
    openSection(token, span, comments, walk);
    emitLinks(token, startLine, walk);
    return true;
  }

  const block = blockElement(token);
  if (block) {
    ctx.emit({
      type: block.type,
      name: ctx.syntheticName(block.base),
      content: block.content,
      ...span,
      comments,
      props: block.props,
    });
  }
  if (!isCode(token)) emitLinks(token, startLine, walk);
  return true;
}

function visitFrontmatter(source: string, ctx: TraversalContext): { body: string; lines: number } {
  const match = FRONTMATTER.exec(source);
  if (!match) return { body: source, lines: 0 };

  const lines = countLines(match[0]) + (match[0].endsWith('\n') ? 0 : 1);
  try {
    const data: unknown = parseYaml(match[1]);
    const metadata = toPropValue(data);
    ctx.emit({
      type: 'Frontmatter',
      name: 'frontmatter',
      content: match[1],
      startLine: 1,
      endLine: lines,
      props: {
        keys: data !== null && typeof data === 'object' && !Array.isArray(data) ? Object.keys(data) : [],
        metadata,
      },
    });
  } catch (err) {
    ctx.fail('parse', `Front matter: ${describeError(err).split('\n', 1)[0]}`);
  }
  return { body: source.slice(match[0].length), lines };
}

/**
 * Walks Markdown text: front matter first, then the top-level blocks, with
 * headers opening sections that close at the next header of the same or a
 * higher level. `visitBlock` sees each block before the Markdown rules do.
 */
export function walkMarkdown(source: string, ctx: TraversalContext, visitBlock?: BlockVisitor): void {
  const { body, lines } = visitFrontmatter(source.replace(/^\uFEFF/, ''), ctx);
  const normalized = normalizeBody(body);
  const walk: MarkdownWalk = {
    ctx,
    visitBlock,
    body: normalized,
    offset: 0,
    line: lines + 1,
    sections: [],
    pendingComments: [],
  };

  for (const token of marked.lexer(normalized, { gfm: true })) {
    if (!visitToken(token, walk)) break;
  }
  // Close whatever sections are still open.
  while (walk.sections.length > 0) {
    ctx.scope.pop();
    walk.sections.pop();
  }
}

export const markdownExtractor: FormatExtractor = {
  kind: 'markdown',
  mimeTypes: [MIME.markdown],
  extract(source, ctx) {
    walkMarkdown(source, ctx);
  },
};
