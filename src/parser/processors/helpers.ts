import type Parser from 'tree-sitter';
import type { TraversalContext } from '../scope.js';

// The binding copies string input through a fixed-size buffer, 32 KiB by
// default, and rejects anything larger.
const MIN_PARSE_BUFFER = 32 * 1024;

export function parseSource(parser: Parser, source: string): Parser.Tree {
  return parser.parse(source, undefined, { bufferSize: Math.max(MIN_PARSE_BUFFER, source.length * 2 + 1) });
}

export function sameNode(a: Parser.SyntaxNode | null, b: Parser.SyntaxNode | null): boolean {
  return !!a && !!b && a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

export function lineSpan(node: Parser.SyntaxNode): { startLine: number; endLine: number } {
  return { startLine: node.startPosition.row + 1, endLine: node.endPosition.row + 1 };
}

export function unquote(text: string): string {
  const match = /^([rRbBuUfF]*)(['"`])([\s\S]*)\2$/.exec(text);
  return match ? match[3] : text;
}

/**
 * Comment siblings directly above `anchor`, oldest first. A blank line ends
 * the run, and so does a comment that trails code on its own line.
 */
export function leadingComments(anchor: Parser.SyntaxNode, commentType = 'comment'): string[] {
  const comments: string[] = [];
  let boundaryRow = anchor.startPosition.row;
  let sibling = anchor.previousSibling;

  while (sibling && sibling.type === commentType && sibling.endPosition.row >= boundaryRow - 1) {
    const before = sibling.previousSibling;
    if (before && before.endPosition.row === sibling.startPosition.row) break;
    comments.unshift(sibling.text.trim());
    boundaryRow = sibling.startPosition.row;
    sibling = before;
  }

  return comments;
}

export interface SyntaxProblem {
  index: number;
  line: number;
  column: number;
  message: string;
}

const MAX_REPORTED_PROBLEMS = 5;

export function collectSyntaxProblems(root: Parser.SyntaxNode): SyntaxProblem[] {
  const problems: SyntaxProblem[] = [];

  const visit = (node: Parser.SyntaxNode): void => {
    const position = {
      index: node.startIndex,
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
    };
    if (node.type === 'ERROR') {
      const snippet = node.text.split('\n', 1)[0].slice(0, 40);
      problems.push({ ...position, message: `unexpected ${JSON.stringify(snippet)}` });
      return;
    }
    // Zero-width leaves are tokens the parser inserted to recover.
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) {
      problems.push({ ...position, message: `missing ${JSON.stringify(node.type)}` });
      return;
    }
    for (const child of node.children) visit(child);
  };

  visit(root);
  return problems;
}

/**
 * Records syntax problems on the context and returns the offset of the
 * earliest one. Elements ending after that offset are not emitted.
 */
export function reportSyntaxProblems(root: Parser.SyntaxNode, ctx: TraversalContext, label: string): number {
  const problems = collectSyntaxProblems(root);
  if (problems.length === 0) return Number.POSITIVE_INFINITY;

  for (const problem of problems.slice(0, MAX_REPORTED_PROBLEMS)) {
    ctx.fail('validation', `${label} syntax error at line ${problem.line}, column ${problem.column}: ${problem.message}`);
  }
  if (problems.length > MAX_REPORTED_PROBLEMS) {
    ctx.fail('validation', `${label}: ${problems.length - MAX_REPORTED_PROBLEMS} more syntax errors`);
  }
  return Math.min(...problems.map(p => p.index));
}
