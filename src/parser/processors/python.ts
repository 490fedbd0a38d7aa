import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { Props } from '../../types.js';
import type { TraversalContext } from '../scope.js';
import { MIME } from '../detector.js';
import type { FormatExtractor } from './types.js';
import { leadingComments, lineSpan, parseSource, reportSyntaxProblems, unquote } from './helpers.js';

const parser = new Parser();
parser.setLanguage(Python);

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

interface PythonWalk {
  ctx: TraversalContext;
  cutoff: number;
  // Scope depth of the module level; notebook cells open a frame first.
  baseDepth: number;
}

function emittable(node: Parser.SyntaxNode, walk: PythonWalk): boolean {
  return node.endIndex <= walk.cutoff;
}

function parameterNames(params: Parser.SyntaxNode | null): string[] {
  if (!params) return [];
  return params.namedChildren.flatMap(param => {
    switch (param.type) {
      case 'identifier':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        return [param.text];
      case 'default_parameter':
      case 'typed_default_parameter':
        return [param.childForFieldName('name')?.text ?? param.text];
      case 'typed_parameter': {
        const first = param.namedChildren[0];
        return first ? [first.text] : [];
      }
      default:
        // `*` and `/` separators, comments
        return [];
    }
  });
}

function cleanDocstring(raw: string): string {
  const lines = unquote(raw.replace(/^([rRuU]*)("""|''')/, '$1"').replace(/("""|''')$/, '"'))
    .split('\n')
    .map(line => line.trim());
  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}

function docstringOf(definition: Parser.SyntaxNode): string | null {
  const body = definition.childForFieldName('body');
  const first = body?.namedChildren[0];
  if (!first || first.type !== 'expression_statement') return null;
  const expression = first.namedChildren[0];
  return expression?.type === 'string' ? cleanDocstring(expression.text) : null;
}

function visitDefinition(definition: Parser.SyntaxNode, anchor: Parser.SyntaxNode, walk: PythonWalk): void {
  if (!emittable(anchor, walk)) return;
  const { ctx } = walk;
  const name = definition.childForFieldName('name')?.text ?? ctx.syntheticName();
  const decorators = anchor.children.filter(c => c.type === 'decorator').map(c => c.text);
  const docstring = docstringOf(definition);
  const body = definition.childForFieldName('body');

  if (definition.type === 'class_definition') {
    const bases = definition.childForFieldName('superclasses')?.namedChildren.map(c => c.text) ?? [];
    ctx.emit({
      type: 'Class',
      name,
      content: anchor.text,
      ...lineSpan(anchor),
      comments: leadingComments(anchor),
      props: { bases, decorators, docstring },
    });
    ctx.within('Class', name, () => {
      if (body) visitChildren(body, walk);
    });
    return;
  }

  const type = ctx.scope.current?.type === 'Class' ? 'Method' : 'Function';
  const props: Props = {
    async: definition.children.some(c => c.type === 'async'),
    decorators,
    return_type: definition.childForFieldName('return_type')?.text ?? null,
    docstring,
  };
  ctx.emit({
    type,
    name,
    content: anchor.text,
    ...lineSpan(anchor),
    parameters: parameterNames(definition.childForFieldName('parameters')),
    comments: leadingComments(anchor),
    props,
  });
  ctx.within(type, name, () => {
    if (body) visitChildren(body, walk);
  });
}

function visitImport(node: Parser.SyntaxNode, walk: PythonWalk): void {
  if (!emittable(node, walk)) return;
  let module: string | null = null;
  let names: string[];

  if (node.type === 'import_statement') {
    names = node.childrenForFieldName('name').map(n => n.text);
  } else {
    module = node.type === 'future_import_statement'
      ? '__future__'
      : node.childForFieldName('module_name')?.text ?? null;
    names = node.children.some(c => c.type === 'wildcard_import')
      ? ['*']
      : node.childrenForFieldName('name').map(n => n.text);
  }

  walk.ctx.emit({
    type: 'Import',
    name: module ?? names.join(', '),
    content: node.text,
    ...lineSpan(node),
    comments: leadingComments(node),
    props: { module, names },
  });
}

function visitLambda(node: Parser.SyntaxNode, name: string, walk: PythonWalk): void {
  if (!emittable(node, walk)) return;
  walk.ctx.emit({
    type: 'Lambda',
    name,
    content: node.text,
    ...lineSpan(node),
    parameters: parameterNames(node.childForFieldName('parameters')),
  });
  // Lambdas are not scopes; nested ones are named against the same frame.
  const body = node.childForFieldName('body');
  if (body) visit(body, walk);
}

function visitAssignment(node: Parser.SyntaxNode, walk: PythonWalk): boolean {
  const left = node.childForFieldName('left');
  const right = node.childForFieldName('right');
  if (!left || left.type !== 'identifier' || !right) return false;

  if (right.type === 'lambda') {
    visitLambda(right, left.text, walk);
    return true;
  }

  const { scope } = walk.ctx;
  const atModuleOrClass = scope.depth === walk.baseDepth || scope.current?.type === 'Class';
  if (!atModuleOrClass || !CONSTANT_NAME.test(left.text)) return false;

  const statement = node.parent?.type === 'expression_statement' ? node.parent : node;
  if (!emittable(statement, walk)) return true;
  walk.ctx.emit({
    type: 'Constant',
    name: left.text,
    content: statement.text,
    ...lineSpan(statement),
    comments: leadingComments(statement),
    props: { annotation: node.childForFieldName('type')?.text ?? null },
  });
  visit(right, walk);
  return true;
}

function visit(node: Parser.SyntaxNode, walk: PythonWalk): void {
  switch (node.type) {
    case 'decorated_definition': {
      const definition = node.childForFieldName('definition');
      if (definition) visitDefinition(definition, node, walk);
      return;
    }
    case 'function_definition':
    case 'class_definition':
      visitDefinition(node, node, walk);
      return;
    case 'import_statement':
    case 'import_from_statement':
    case 'future_import_statement':
      visitImport(node, walk);
      return;
    case 'lambda':
      visitLambda(node, walk.ctx.syntheticName('lambda'), walk);
      return;
    case 'assignment':
      if (visitAssignment(node, walk)) return;
      break;
    case 'ERROR':
      return;
  }
  visitChildren(node, walk);
}

function visitChildren(node: Parser.SyntaxNode, walk: PythonWalk): void {
  for (const child of node.children) {
    if (child.startIndex >= walk.cutoff) return;
    visit(child, walk);
  }
}

/**
 * Parses Python source and emits its elements into `ctx` under whatever
 * frames are already open. Syntax problems are recorded as validation
 * failures labelled with `label`.
 */
export function walkPythonSource(source: string, ctx: TraversalContext, label = 'Python'): void {
  const tree = parseSource(parser, source);
  const cutoff = reportSyntaxProblems(tree.rootNode, ctx, label);
  visitChildren(tree.rootNode, { ctx, cutoff, baseDepth: ctx.scope.depth });
}

export const pythonExtractor: FormatExtractor = {
  kind: 'python',
  mimeTypes: [MIME.python],
  extract(source, ctx) {
    walkPythonSource(source, ctx);
  },
};
