/**
 * Python syntax helpers on top of tree-sitter-python.
 * Everything here is purely syntactic: names are read from source text,
 * never resolved.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { getNodeText, containsNodeOfType, getChildrenOfType } from './TreeSitterUtils.js';

// =============================================================================
// Tree-sitter Node Type Constants
// =============================================================================

/** Python tree-sitter node types for definitions */
export const PyDefinitionNodes = {
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
  DECORATOR: 'decorator',
  LAMBDA: 'lambda',
} as const;

/** Python tree-sitter node types for identifiers and names */
export const PyIdentifierNodes = {
  IDENTIFIER: 'identifier',
  ATTRIBUTE: 'attribute',
} as const;

/** Python tree-sitter node types for expressions */
export const PyExpressionNodes = {
  CALL: 'call',
  ARGUMENT_LIST: 'argument_list',
  KEYWORD_ARGUMENT: 'keyword_argument',
  LIST_SPLAT: 'list_splat',
  DICTIONARY_SPLAT: 'dictionary_splat',
  PARENTHESIZED_EXPRESSION: 'parenthesized_expression',
  STRING: 'string',
  CONCATENATED_STRING: 'concatenated_string',
  INTERPOLATION: 'interpolation',
  COMMENT: 'comment',
} as const;

/** Node types that open a new lexical scope */
export const PYTHON_SCOPE_TYPES: readonly string[] = [
  PyDefinitionNodes.CLASS_DEFINITION,
  PyDefinitionNodes.FUNCTION_DEFINITION,
];

const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

/**
 * Creates a Python parser instance.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

/**
 * Reads the `name` field of a class or function definition.
 */
export function getDefinitionName(
  node: Parser.SyntaxNode,
  sourceCode: string
): string | null {
  const nameNode = node.childForFieldName('name');
  return nameNode ? getNodeText(nameNode, sourceCode) : null;
}

/**
 * Decorator names of a definition, in source order.
 * `@TestCaseMetadata(...)` yields `TestCaseMetadata`, `@pytest.mark.skip` yields `pytest.mark.skip`.
 */
export function getDecoratorNames(
  definition: Parser.SyntaxNode,
  sourceCode: string
): string[] {
  const parent = definition.parent;
  if (!parent || parent.type !== PyDefinitionNodes.DECORATED_DEFINITION) return [];

  const names: string[] = [];
  for (const child of getChildrenOfType(parent, PyDefinitionNodes.DECORATOR)) {
    const match = getNodeText(child, sourceCode).match(/^@\s*([\w.]+)/);
    if (match) names.push(match[1]);
  }
  return names;
}

/**
 * Base class expressions of a class definition that are plain names or
 * dotted attributes. Calls, subscripts and keyword arguments (`metaclass=`)
 * are skipped.
 */
export function getBaseClassNames(
  classNode: Parser.SyntaxNode,
  sourceCode: string
): string[] {
  const superclasses = classNode.childForFieldName('superclasses');
  if (!superclasses) return [];

  const bases: string[] = [];
  for (const child of superclasses.namedChildren) {
    if (
      child.type === PyIdentifierNodes.IDENTIFIER ||
      child.type === PyIdentifierNodes.ATTRIBUTE
    ) {
      bases.push(getNodeText(child, sourceCode).replace(/\s+/g, ''));
    }
  }
  return bases;
}

/**
 * Whether a function definition is declared with `async def`.
 */
export function isAsyncFunction(node: Parser.SyntaxNode): boolean {
  return node.children.length > 0 && node.children[0].type === 'async';
}

/**
 * For a call of the form `<receiver>.<method>(...)`, returns receiver and
 * method text. Any other call shape returns null.
 */
export function getAttributeCall(
  callNode: Parser.SyntaxNode,
  sourceCode: string
): { receiver: string; method: string } | null {
  const func = callNode.childForFieldName('function');
  if (!func || func.type !== PyIdentifierNodes.ATTRIBUTE) return null;

  const object = func.childForFieldName('object');
  const attribute = func.childForFieldName('attribute');
  if (!object || !attribute) return null;

  return {
    receiver: getNodeText(object, sourceCode),
    method: getNodeText(attribute, sourceCode),
  };
}

/**
 * The first positional argument of a call, or null when the call has none
 * (no arguments, keyword-only, a leading splat, or a generator argument).
 */
export function getFirstPositionalArgument(
  callNode: Parser.SyntaxNode
): Parser.SyntaxNode | null {
  const args = callNode.childForFieldName('arguments');
  if (!args || args.type !== PyExpressionNodes.ARGUMENT_LIST) return null;

  const first = args.namedChildren.find((child) => child.type !== PyExpressionNodes.COMMENT);
  if (!first) return null;
  if (
    first.type === PyExpressionNodes.KEYWORD_ARGUMENT ||
    first.type === PyExpressionNodes.LIST_SPLAT ||
    first.type === PyExpressionNodes.DICTIONARY_SPLAT
  ) {
    return null;
  }
  return first;
}

/**
 * Value of a literal string expression, or null when the expression is
 * computed. Plain strings, implicit concatenations of plain strings and
 * f-strings without interpolation count as literals. Escape sequences are
 * decoded unless the string is raw.
 */
export function getStringLiteralValue(
  node: Parser.SyntaxNode,
  sourceCode: string
): string | null {
  if (node.type === PyExpressionNodes.PARENTHESIZED_EXPRESSION) {
    const inner = node.namedChildren.find((child) => child.type !== PyExpressionNodes.COMMENT);
    return inner ? getStringLiteralValue(inner, sourceCode) : null;
  }

  if (node.type === PyExpressionNodes.CONCATENATED_STRING) {
    const parts: string[] = [];
    for (const child of node.namedChildren) {
      if (child.type === PyExpressionNodes.COMMENT) continue;
      const value = getStringLiteralValue(child, sourceCode);
      if (value === null) return null;
      parts.push(value);
    }
    return parts.join('');
  }

  if (node.type !== PyExpressionNodes.STRING) return null;
  if (containsNodeOfType(node, [PyExpressionNodes.INTERPOLATION])) return null;

  const match = getNodeText(node, sourceCode).match(STRING_LITERAL);
  if (!match) return null;
  const [, prefix, , body] = match;
  return decodeStringBody(body, prefix.toLowerCase());
}

const SIMPLE_ESCAPES = new Map<string, string>([
  ['\r\n', ''],
  ['\n', ''],
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['v', '\v'],
]);

const ESCAPE_SEQUENCE =
  /\\(\r\n|\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9A-Fa-f]{2}|u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8})/g;

function decodeStringBody(body: string, prefix: string): string {
  const value = prefix.includes('f') ? body.replace(/\{\{/g, '{').replace(/\}\}/g, '}') : body;
  if (prefix.includes('r')) return value;
  const isBytes = prefix.includes('b');

  // Unknown escapes such as `\d` stay as written
  return value.replace(ESCAPE_SEQUENCE, (sequence: string, escape: string) => {
    const simple = SIMPLE_ESCAPES.get(escape);
    if (simple !== undefined) return simple;
    if (escape.startsWith('x')) return String.fromCharCode(parseInt(escape.slice(1), 16));
    if (escape.startsWith('u') || escape.startsWith('U')) {
      const codePoint = parseInt(escape.slice(1), 16);
      return isBytes || codePoint > 0x10ffff ? sequence : String.fromCodePoint(codePoint);
    }
    return String.fromCharCode(parseInt(escape, 8));
  });
}
