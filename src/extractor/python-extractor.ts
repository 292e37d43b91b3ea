/**
 * Python Extractor
 *
 * Uses tree-sitter to collect the top-level declarations of a Python module:
 * - function definitions (sync and async) with parameters and return-presence
 * - class definitions (methods stay inside the class span)
 *
 * Nested declarations are not emitted. A tree containing error or missing
 * nodes, or a Python 2 print/exec statement, degrades to one `File` element
 * describing the first syntax error.
 */

import Parser from 'tree-sitter';
import PythonLang from 'tree-sitter-python';

import type { CallableElement, ClassElement, CodeElement } from './types.js';
import { createFileFallback, freezeAll } from './utils.js';

// tree-sitter's Language type (compiled parser)
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

type SyntaxNode = Parser.SyntaxNode;

const LANGUAGE = 'python';

/** Characters handed to the parser per read */
const READ_CHUNK = 16 * 1024;

/** Node types that open a new scope for return detection */
const SCOPE_NODES = new Set(['function_definition', 'class_definition', 'lambda']);

/** Parameter node types that end the positional list */
const VARIADIC_NODES = new Set([
  'list_splat_pattern',
  'dictionary_splat_pattern',
  'keyword_separator',
]);

/**
 * Parse source text into a tree. Input is fed in chunks so large modules
 * do not hit the binding's single-string size limit.
 */
function parse(sourceText: string): Parser.Tree {
  const parser = new Parser();
  parser.setLanguage(PythonLang as TreeSitterLanguage);
  return parser.parse((index: number) =>
    index < sourceText.length ? sourceText.slice(index, index + READ_CHUNK) : ''
  );
}

/** Python 2 statements the grammar still accepts but Python 3 rejects */
const LEGACY_STATEMENTS = new Set(['print_statement', 'exec_statement']);

/**
 * Locate the first legacy statement, depth first.
 */
function findLegacyStatement(node: SyntaxNode): SyntaxNode | null {
  if (LEGACY_STATEMENTS.has(node.type)) {
    return node;
  }
  for (const child of node.namedChildren) {
    const found = findLegacyStatement(child);
    if (found) {
      return found;
    }
  }
  return null;
}

/**
 * Locate the first error or missing node, depth first.
 */
function findFirstError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) {
    return node;
  }
  for (const child of node.children) {
    if (child.hasError || child.isMissing) {
      const found = findFirstError(child);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

function describeSyntaxError(node: SyntaxNode): string {
  const where = `line ${node.startPosition.row + 1}, column ${node.startPosition.column + 1}`;
  if (node.isMissing) {
    return `Missing "${node.type}" at ${where}`;
  }
  return `Syntax error at ${where}`;
}

/**
 * Line range of a node, ignoring a trailing newline the node may swallow.
 */
function lineRange(node: SyntaxNode): { startLine: number; endLine: number } {
  const startLine = node.startPosition.row + 1;
  let endLine = node.endPosition.row + 1;
  if (node.endPosition.column === 0 && node.endPosition.row > node.startPosition.row) {
    endLine -= 1;
  }
  return { startLine, endLine };
}

/**
 * Mimics inspect.cleandoc: strip the first line, remove the common
 * indentation of the rest, drop leading and trailing blank lines.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, '        ').split('\n');

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart().length;
    if (content > 0) {
      margin = Math.min(margin, line.length - content);
    }
  }

  const cleaned = lines.map((line, i) => {
    if (i === 0) {
      return line.trimStart();
    }
    return margin === Infinity ? line : line.slice(margin);
  });

  while (cleaned.length > 0 && (cleaned[cleaned.length - 1] ?? '').trim() === '') {
    cleaned.pop();
  }
  while (cleaned.length > 0 && (cleaned[0] ?? '').trim() === '') {
    cleaned.shift();
  }

  return cleaned.join('\n');
}

const STRING_LITERAL = /^([rRuU]?)("""|'''|"|')([\s\S]*)\2$/;

/**
 * Body of a plain string literal, or null for byte and f-strings.
 * Implicitly concatenated literals are joined.
 */
function literalText(node: SyntaxNode): string | null {
  if (node.type === 'string') {
    const match = STRING_LITERAL.exec(node.text);
    return match ? (match[3] ?? '') : null;
  }
  if (node.type === 'concatenated_string') {
    const parts = node.namedChildren.map(literalText);
    return parts.every((part): part is string => part !== null) ? parts.join('') : null;
  }
  return null;
}

/**
 * Docstring of a function or class: the first statement of its body when
 * that statement is a plain (non f-) string literal.
 */
function getDocstring(definition: SyntaxNode): string {
  const body = definition.childForFieldName('body');
  if (!body) {
    return '';
  }

  const first = body.namedChildren.find((child) => child.type !== 'comment');
  if (first?.type !== 'expression_statement') {
    return '';
  }

  const expr = first.firstNamedChild;
  if (!expr || first.namedChildCount !== 1) {
    return '';
  }

  const text = literalText(expr);
  return text === null ? '' : cleanDocstring(text);
}

function parameterName(param: SyntaxNode): string | null {
  switch (param.type) {
    case 'identifier':
      return param.text;
    case 'default_parameter':
    case 'typed_default_parameter':
      return param.childForFieldName('name')?.text ?? null;
    case 'typed_parameter': {
      const inner = param.firstNamedChild;
      return inner?.type === 'identifier' ? inner.text : null;
    }
    default:
      return null;
  }
}

function isVariadic(param: SyntaxNode): boolean {
  if (VARIADIC_NODES.has(param.type)) {
    return true;
  }
  // `*args: int` is a typed_parameter wrapping a splat
  const inner = param.type === 'typed_parameter' ? param.firstNamedChild : null;
  return inner !== null && VARIADIC_NODES.has(inner.type);
}

/**
 * Positional parameter names in declaration order. Collection stops at the
 * first `*`, `*args` or `**kwargs`; keyword-only names are not included.
 */
function getParameters(definition: SyntaxNode): string[] {
  const params = definition.childForFieldName('parameters');
  if (!params) {
    return [];
  }

  const names: string[] = [];
  for (const param of params.namedChildren) {
    if (isVariadic(param)) {
      break;
    }
    const name = parameterName(param);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

/**
 * True when `return <value>` appears in the subtree, without descending
 * into nested functions, classes or lambdas.
 */
function containsValueReturn(node: SyntaxNode): boolean {
  for (const child of node.namedChildren) {
    if (child.type === 'return_statement' && child.namedChildCount > 0) {
      return true;
    }
    if (SCOPE_NODES.has(child.type) || child.type === 'decorated_definition') {
      continue;
    }
    if (containsValueReturn(child)) {
      return true;
    }
  }
  return false;
}

function isAsync(definition: SyntaxNode): boolean {
  return definition.children.some((child) => child.type === 'async');
}

/**
 * Resolve a module-level statement to a function/class definition node.
 */
function unwrapDefinition(statement: SyntaxNode): SyntaxNode | null {
  if (statement.type === 'function_definition' || statement.type === 'class_definition') {
    return statement;
  }
  if (statement.type === 'decorated_definition') {
    return statement.childForFieldName('definition');
  }
  return null;
}

function toElement(definition: SyntaxNode): CallableElement | ClassElement {
  const base = {
    name: definition.childForFieldName('name')?.text ?? '',
    docstring: getDocstring(definition),
    sourceText: definition.text.trimEnd(),
    ...lineRange(definition),
    language: LANGUAGE,
  };

  if (definition.type === 'class_definition') {
    return { ...base, kind: 'Class' };
  }

  const body = definition.childForFieldName('body');
  return {
    ...base,
    kind: isAsync(definition) ? 'AsyncFunction' : 'Function',
    parameters: Object.freeze(getParameters(definition)),
    hasReturnValue: body ? containsValueReturn(body) : false,
  };
}

/**
 * Extract top-level functions and classes from Python source.
 *
 * @param sourceText - Python module source
 * @returns Elements in source order; never empty
 *
 * @example
 * ```ts
 * const [add] = extractPythonElements('def add(a, b):\n    return a + b\n');
 * // add.kind === 'Function', add.parameters => ['a', 'b'], add.hasReturnValue === true
 * ```
 */
export function extractPythonElements(sourceText: string): readonly CodeElement[] {
  let tree: Parser.Tree;
  try {
    tree = parse(sourceText);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return freezeAll([
      createFileFallback(sourceText, LANGUAGE, 'Error parsing Python file', message),
    ]);
  }

  const root = tree.rootNode;
  const invalid = root.hasError ? (findFirstError(root) ?? root) : findLegacyStatement(root);
  if (invalid) {
    return freezeAll([
      createFileFallback(sourceText, LANGUAGE, 'Error parsing Python file', describeSyntaxError(invalid)),
    ]);
  }

  const elements: CodeElement[] = [];
  for (const statement of root.namedChildren) {
    const definition = unwrapDefinition(statement);
    if (definition) {
      elements.push(toElement(definition));
    }
  }

  if (elements.length === 0) {
    return freezeAll([createFileFallback(sourceText, LANGUAGE, 'No structured elements found')]);
  }

  return freezeAll(elements);
}
