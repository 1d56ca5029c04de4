/**
 * Shared tree-sitter utilities for AST traversal, text extraction and
 * location reporting.
 */

import Parser from 'tree-sitter';

/**
 * 1-based source position.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 * Returning `false` from the callback skips that node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Returns the first node, in document order, that satisfies the predicate.
 */
export function findFirst(
  root: Parser.SyntaxNode,
  predicate: (node: Parser.SyntaxNode) => boolean
): Parser.SyntaxNode | null {
  if (predicate(root)) return root;
  for (const child of root.children) {
    const found = findFirst(child, predicate);
    if (found) return found;
  }
  return null;
}

/**
 * Checks whether any descendant (or the node itself) has one of the given types.
 */
export function containsNodeOfType(
  root: Parser.SyntaxNode,
  types: readonly string[]
): boolean {
  const typeSet = new Set(types);
  return findFirst(root, (node) => typeSet.has(node.type)) !== null;
}

/**
 * Gets all children of a specific type.
 */
export function getChildrenOfType(
  node: Parser.SyntaxNode,
  type: string
): Parser.SyntaxNode[] {
  return node.children.filter((child) => child.type === type);
}

/**
 * Finds the first syntax problem in a tree: an ERROR node or a token the
 * parser had to insert (zero-width leaf). Returns null for a clean tree.
 */
export function findSyntaxProblem(root: Parser.SyntaxNode): Parser.SyntaxNode | null {
  return findFirst(
    root,
    (node) =>
      node.type === 'ERROR' ||
      (node !== root && node.childCount === 0 && node.startIndex === node.endIndex)
  );
}
