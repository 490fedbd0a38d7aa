import Parser from 'tree-sitter';
import JavaScript from 'tree-sitter-javascript';
import type { Props, PropValue } from '../../types.js';
import type { TraversalContext } from '../scope.js';
import { MIME } from '../detector.js';
import type { FormatExtractor } from './types.js';
import { leadingComments, lineSpan, parseSource, reportSyntaxProblems, sameNode, unquote } from './helpers.js';

const parser = new Parser();
parser.setLanguage(JavaScript);

const FUNCTION_KINDS = new Map<string, string>([
  ['function_declaration', 'declaration'],
  ['generator_function_declaration', 'generator'],
  ['function_expression', 'expression'],
  ['function', 'expression'],
  ['generator_function', 'generator'],
  ['arrow_function', 'arrow'],
]);

const CLASS_TYPES = new Set(['class_declaration', 'class']);

interface JavaScriptWalk {
  ctx: TraversalContext;
  cutoff: number;
}

function isFunctionNode(node: Parser.SyntaxNode | null): boolean {
  return !!node && FUNCTION_KINDS.has(node.type);
}

function isRequireCall(node: Parser.SyntaxNode | null): boolean {
  return node?.type === 'call_expression' && node.childForFieldName('function')?.text === 'require';
}

/** Name a function or class gets from where it sits: declarator, assignment, key or default export. */
function contextualName(node: Parser.SyntaxNode): string | null {
  const own = node.childForFieldName('name');
  if (own) return own.text;

  const parent = node.parent;
  if (!parent) return null;
  switch (parent.type) {
    case 'variable_declarator':
      return sameNode(parent.childForFieldName('value'), node)
        ? parent.childForFieldName('name')?.text ?? null
        : null;
    case 'assignment_expression':
      return sameNode(parent.childForFieldName('right'), node)
        ? parent.childForFieldName('left')?.text ?? null
        : null;
    case 'pair': {
      const key = parent.childForFieldName('key');
      return key && sameNode(parent.childForFieldName('value'), node) ? unquote(key.text) : null;
    }
    case 'field_definition':
      return parent.childForFieldName('property')?.text ?? null;
    case 'export_statement':
      return 'default';
    default:
      return null;
  }
}

/** The statement whose preceding comments describe `node`. */
function commentAnchor(node: Parser.SyntaxNode): Parser.SyntaxNode {
  let anchor = node;
  const climb = (types: string[]): void => {
    if (anchor.parent && types.includes(anchor.parent.type)) anchor = anchor.parent;
  };
  climb(['variable_declarator', 'assignment_expression', 'pair', 'field_definition']);
  climb(['lexical_declaration', 'variable_declaration', 'expression_statement']);
  climb(['export_statement']);
  return anchor;
}

function parameterNames(node: Parser.SyntaxNode): string[] {
  const single = node.childForFieldName('parameter');
  if (single) return [single.text];
  const params = node.childForFieldName('parameters');
  if (!params) return [];
  return params.namedChildren.flatMap(param => {
    if (param.type === 'comment') return [];
    if (param.type === 'assignment_pattern') return [param.childForFieldName('left')?.text ?? param.text];
    return [param.text];
  });
}

function emittable(node: Parser.SyntaxNode, walk: JavaScriptWalk): boolean {
  return node.endIndex <= walk.cutoff;
}

function visitFunction(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (!emittable(node, walk)) return;
  const { ctx } = walk;
  const resolved = contextualName(node);
  const name = resolved ?? ctx.syntheticName();

  ctx.emit({
    type: 'Function',
    name,
    content: node.text,
    ...lineSpan(node),
    parameters: parameterNames(node),
    comments: leadingComments(commentAnchor(node)),
    props: {
      kind: FUNCTION_KINDS.get(node.type) ?? 'expression',
      async: node.children.some(c => c.type === 'async'),
      generator: node.children.some(c => c.type === '*'),
    },
  });

  const body = node.childForFieldName('body');
  if (!body) return;
  if (resolved) {
    ctx.within('Function', name, () => visitChildren(body, walk));
  } else {
    visitChildren(body, walk);
  }
}

function visitClass(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (!emittable(node, walk)) return;
  const { ctx } = walk;
  const name = contextualName(node) ?? ctx.syntheticName('class');
  const heritage = node.children.find(c => c.type === 'class_heritage');

  ctx.emit({
    type: 'Class',
    name,
    content: node.text,
    ...lineSpan(node),
    comments: leadingComments(commentAnchor(node)),
    props: { extends: heritage?.namedChildren[0]?.text ?? null },
  });

  const body = node.childForFieldName('body');
  if (body) ctx.within('Class', name, () => visitChildren(body, walk));
}

function visitMethod(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (!emittable(node, walk)) return;
  const { ctx } = walk;
  const name = node.childForFieldName('name')?.text ?? ctx.syntheticName('method');
  const has = (token: string): boolean => node.children.some(c => c.type === token);
  const accessor = has('get') ? 'get' : has('set') ? 'set' : null;

  ctx.emit({
    type: 'Method',
    name,
    content: node.text,
    ...lineSpan(node),
    parameters: parameterNames(node),
    comments: leadingComments(node),
    props: {
      kind: accessor ?? (name === 'constructor' ? 'constructor' : 'method'),
      static: has('static'),
      async: has('async'),
      generator: has('*'),
    },
  });

  const body = node.childForFieldName('body');
  if (body) ctx.within('Method', name, () => visitChildren(body, walk));
}

function importSpecifiers(clause: Parser.SyntaxNode | undefined): PropValue[] {
  if (!clause) return [];
  const specifiers: PropValue[] = [];
  for (const part of clause.namedChildren) {
    if (part.type === 'identifier') {
      specifiers.push({ kind: 'default', imported: 'default', local: part.text });
    } else if (part.type === 'namespace_import') {
      const local = part.namedChildren.find(c => c.type === 'identifier')?.text ?? '*';
      specifiers.push({ kind: 'namespace', imported: '*', local });
    } else if (part.type === 'named_imports') {
      for (const specifier of part.namedChildren.filter(c => c.type === 'import_specifier')) {
        const imported = specifier.childForFieldName('name')?.text ?? specifier.text;
        const local = specifier.childForFieldName('alias')?.text ?? imported;
        specifiers.push({ kind: 'named', imported, local });
      }
    }
  }
  return specifiers;
}

function visitImport(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (!emittable(node, walk)) return;
  const source = unquote(node.childForFieldName('source')?.text ?? '');
  const props: Props = {
    source,
    dynamic: false,
    specifiers: importSpecifiers(node.children.find(c => c.type === 'import_clause')),
  };
  const attributes = node.children.find(c => c.type === 'import_attribute');
  if (attributes) props.attributes = attributes.text;

  walk.ctx.emit({
    type: 'Import',
    name: source,
    content: node.text,
    ...lineSpan(node),
    comments: leadingComments(node),
    props,
  });
}

function visitCall(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  const callee = node.childForFieldName('function');
  const dynamic = callee?.type === 'import';
  if ((dynamic || isRequireCall(node)) && emittable(node, walk)) {
    const first = node.childForFieldName('arguments')?.namedChildren[0];
    const source = first?.type === 'string' ? unquote(first.text) : null;
    walk.ctx.emit({
      type: 'Import',
      name: source ?? (dynamic ? 'import()' : 'require()'),
      content: node.text,
      ...lineSpan(node),
      props: { source, dynamic, commonjs: !dynamic, specifiers: [] },
    });
  }
  visitChildren(node, walk);
}

function declaredNames(declaration: Parser.SyntaxNode): string[] {
  if (declaration.type === 'lexical_declaration' || declaration.type === 'variable_declaration') {
    return declaration.namedChildren
      .filter(c => c.type === 'variable_declarator')
      .map(c => c.childForFieldName('name')?.text ?? '');
  }
  const name = declaration.childForFieldName('name')?.text;
  return name ? [name] : [];
}

function visitExport(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (!emittable(node, walk)) return;
  const isDefault = node.children.some(c => c.type === 'default');
  const declaration = node.childForFieldName('declaration');
  const value = node.childForFieldName('value');
  const sourceNode = node.childForFieldName('source');
  const source = sourceNode ? unquote(sourceNode.text) : null;

  const specifiers: PropValue[] = [];
  let names: string[] = [];
  const clause = node.children.find(c => c.type === 'export_clause');
  const namespace = node.children.find(c => c.type === 'namespace_export');

  if (clause) {
    for (const specifier of clause.namedChildren.filter(c => c.type === 'export_specifier')) {
      const local = specifier.childForFieldName('name')?.text ?? specifier.text;
      const exported = specifier.childForFieldName('alias')?.text ?? local;
      specifiers.push({ local, exported });
      names.push(exported);
    }
  } else if (namespace) {
    names = [namespace.namedChildren[0]?.text ?? '*'];
  } else if (declaration) {
    names = isDefault ? ['default'] : declaredNames(declaration);
  } else if (isDefault) {
    names = ['default'];
  } else if (node.children.some(c => c.type === '*')) {
    names = ['*'];
  }

  walk.ctx.emit({
    type: 'Export',
    name: names.join(', '),
    content: node.text,
    ...lineSpan(node),
    comments: leadingComments(node),
    props: { default: isDefault, source, specifiers },
  });

  if (declaration) visit(declaration, walk);
  if (value) visit(value, walk);
}

/** Directly under `program`, or exported from there. Callbacks and blocks push no frame, so depth cannot tell. */
function isModuleLevel(node: Parser.SyntaxNode): boolean {
  const parent = node.parent;
  if (parent?.type === 'export_statement') return parent.parent?.type === 'program';
  return parent?.type === 'program';
}

function visitDeclaration(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  const isConst = node.type === 'lexical_declaration' && node.children[0]?.type === 'const';
  const declarators = node.namedChildren.filter(c => c.type === 'variable_declarator');

  if (isConst && isModuleLevel(node)) {
    for (const declarator of declarators) {
      const value = declarator.childForFieldName('value');
      const name = declarator.childForFieldName('name');
      if (!name || !value) continue;
      if (isFunctionNode(value) || CLASS_TYPES.has(value.type) || isRequireCall(value)) continue;
      const target = declarators.length === 1 ? node : declarator;
      if (!emittable(target, walk)) continue;
      walk.ctx.emit({
        type: 'Constant',
        name: name.text,
        content: target.text,
        ...lineSpan(target),
        comments: leadingComments(commentAnchor(declarator)),
        props: { value_type: value.type },
      });
    }
  }

  visitChildren(node, walk);
}

function jsxAttributes(tag: Parser.SyntaxNode): Props {
  const attributes: Props = {};
  for (const attribute of tag.namedChildren) {
    if (attribute.type === 'jsx_attribute') {
      const [key, value] = attribute.namedChildren;
      if (!key) continue;
      attributes[key.text] = value ? (value.type === 'string' ? unquote(value.text) : value.text) : true;
    } else if (attribute.type === 'jsx_expression') {
      attributes['...'] = attribute.text;
    }
  }
  return attributes;
}

function visitJsx(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  const tag = node.type === 'jsx_element' ? node.childForFieldName('open_tag') ?? node.namedChildren[0] : node;
  const name = tag?.childForFieldName('name')?.text;
  if (tag && name && /^[A-Z]/.test(name) && emittable(node, walk)) {
    walk.ctx.emit({
      type: 'JSXElement',
      name,
      content: node.text,
      ...lineSpan(node),
      props: { attributes: jsxAttributes(tag), self_closing: node.type === 'jsx_self_closing_element' },
    });
  }
  visitChildren(node, walk);
}

function visit(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  if (isFunctionNode(node)) {
    visitFunction(node, walk);
    return;
  }
  if (CLASS_TYPES.has(node.type)) {
    visitClass(node, walk);
    return;
  }

  switch (node.type) {
    case 'method_definition':
      visitMethod(node, walk);
      return;
    case 'import_statement':
      visitImport(node, walk);
      return;
    case 'export_statement':
      visitExport(node, walk);
      return;
    case 'call_expression':
      visitCall(node, walk);
      return;
    case 'lexical_declaration':
    case 'variable_declaration':
      visitDeclaration(node, walk);
      return;
    case 'jsx_element':
    case 'jsx_self_closing_element':
      visitJsx(node, walk);
      return;
    case 'meta_property':
      if (node.text === 'import.meta' && emittable(node, walk)) {
        walk.ctx.emit({
          type: 'Import',
          name: 'import.meta',
          content: node.parent?.text ?? node.text,
          ...lineSpan(node),
          props: { source: null, dynamic: false, meta: true, specifiers: [] },
        });
      }
      return;
    case 'ERROR':
      return;
  }
  visitChildren(node, walk);
}

function visitChildren(node: Parser.SyntaxNode, walk: JavaScriptWalk): void {
  for (const child of node.children) {
    if (child.startIndex >= walk.cutoff) return;
    visit(child, walk);
  }
}

export const javascriptExtractor: FormatExtractor = {
  kind: 'javascript',
  mimeTypes: [MIME.javascript],
  extract(source, ctx) {
    const tree = parseSource(parser, source);
    const cutoff = reportSyntaxProblems(tree.rootNode, ctx, 'JavaScript');
    visitChildren(tree.rootNode, { ctx, cutoff });
  },
};
