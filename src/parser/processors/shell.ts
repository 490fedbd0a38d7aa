import Parser from 'tree-sitter';
import Bash from 'tree-sitter-bash';
import type { TraversalContext } from '../scope.js';
import { MIME, MIME_ALIASES } from '../detector.js';
import type { FormatExtractor } from './types.js';
import { leadingComments, lineSpan, parseSource, reportSyntaxProblems, unquote } from './helpers.js';

const parser = new Parser();
parser.setLanguage(Bash);

const SOURCE_COMMANDS = new Set(['source', '.']);
const ALIAS_DEFINITION = /^alias\s+([^=\s]+)=([\s\S]*)$/;

interface ShellWalk {
  ctx: TraversalContext;
  cutoff: number;
}

function emittable(node: Parser.SyntaxNode, walk: ShellWalk): boolean {
  return node.endIndex <= walk.cutoff;
}

// A shebang sits above the first statement but documents nothing.
function docComments(anchor: Parser.SyntaxNode): string[] {
  return leadingComments(anchor).filter(comment => !comment.startsWith('#!'));
}

function visitFunction(node: Parser.SyntaxNode, walk: ShellWalk): void {
  if (!emittable(node, walk)) return;
  const { ctx } = walk;
  const name = node.childForFieldName('name')?.text ?? ctx.syntheticName('function');

  ctx.emit({
    type: 'Function',
    name,
    content: node.text,
    ...lineSpan(node),
    comments: docComments(node),
    props: { keyword: node.children[0]?.type === 'function' },
  });

  const body = node.childForFieldName('body');
  if (body) ctx.within('Function', name, () => visitChildren(body, walk));
}

function visitAssignment(node: Parser.SyntaxNode, walk: ShellWalk): void {
  // `FOO=bar cmd` only sets FOO for that command.
  const parent = node.parent;
  if (!parent || parent.type === 'command') return;
  const declaration = parent.type === 'declaration_command' ? parent : null;
  const statement = declaration ?? node;
  const name = node.childForFieldName('name')?.text;
  if (!name || !emittable(statement, walk)) return;

  const value = node.childForFieldName('value');
  walk.ctx.emit({
    type: 'Variable',
    name,
    content: statement.text,
    ...lineSpan(statement),
    comments: docComments(statement),
    props: {
      value: value ? unquote(value.text) : '',
      keyword: declaration?.children[0]?.text ?? null,
    },
  });
}

function visitCommand(node: Parser.SyntaxNode, walk: ShellWalk): void {
  const command = node.childForFieldName('name')?.text;
  if (!command || !emittable(node, walk)) return;

  if (SOURCE_COMMANDS.has(command)) {
    const target = node.childrenForFieldName('argument')[0];
    if (!target) return;
    walk.ctx.emit({
      type: 'Source',
      name: unquote(target.text),
      content: node.text,
      ...lineSpan(node),
      comments: docComments(node),
      props: { command },
    });
    return;
  }

  if (command === 'alias') {
    const match = ALIAS_DEFINITION.exec(node.text);
    if (!match) return;
    walk.ctx.emit({
      type: 'Alias',
      name: match[1],
      content: node.text,
      ...lineSpan(node),
      comments: docComments(node),
      props: { value: unquote(match[2].trim()) },
    });
  }
}

function visit(node: Parser.SyntaxNode, walk: ShellWalk): void {
  switch (node.type) {
    case 'function_definition':
      visitFunction(node, walk);
      return;
    case 'variable_assignment':
      visitAssignment(node, walk);
      return;
    case 'command':
      visitCommand(node, walk);
      return;
    case 'ERROR':
      return;
  }
  visitChildren(node, walk);
}

function visitChildren(node: Parser.SyntaxNode, walk: ShellWalk): void {
  for (const child of node.children) {
    if (child.startIndex >= walk.cutoff) return;
    visit(child, walk);
  }
}

export const shellExtractor: FormatExtractor = {
  kind: 'shell',
  mimeTypes: [MIME.shell, ...MIME_ALIASES.shell],
  extract(source, ctx) {
    const tree = parseSource(parser, source);
    const cutoff = reportSyntaxProblems(tree.rootNode, ctx, 'Shell');
    visitChildren(tree.rootNode, { ctx, cutoff });
  },
};
