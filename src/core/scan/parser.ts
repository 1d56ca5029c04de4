/**
 * Source parser: turns file text into a SourceUnit without ever throwing on
 * malformed input.
 */
import type Parser from 'tree-sitter';
import { createPythonParser } from '../../validators/tree-sitter/python-ast.js';
import { findSyntaxProblem, getLocation, getNodeText } from '../../validators/tree-sitter/TreeSitterUtils.js';
import { collapseWhitespace, truncateString } from '../../utils/string.js';
import type { SourceUnit } from './types.js';

// Node's tree-sitter binding rejects inputs larger than its default buffer
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Parses Python source text. Reuses one tree-sitter parser per instance.
 */
export class SourceParser {
  private readonly parser: Parser;

  constructor(parser: Parser = createPythonParser()) {
    this.parser = parser;
  }

  parse(path: string, text: string): SourceUnit {
    let tree: Parser.Tree;
    try {
      tree = this.parser.parse(text, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, text.length * 2),
      });
    } catch (error) {
      return {
        status: 'unparsable',
        path,
        text,
        error: {
          message: `Parser failed: ${error instanceof Error ? error.message : String(error)}`,
          line: 1,
          column: 1,
        },
      };
    }

    const problem = findSyntaxProblem(tree.rootNode);
    if (problem) {
      const { line, column } = getLocation(problem);
      return {
        status: 'unparsable',
        path,
        text,
        error: { message: describeProblem(problem, text), line, column },
      };
    }

    return { status: 'parsed', path, text, tree };
  }
}

function describeProblem(node: Parser.SyntaxNode, text: string): string {
  if (node.type === 'ERROR') {
    const snippet = truncateString(collapseWhitespace(getNodeText(node, text)), 40);
    return snippet ? `invalid syntax near "${snippet}"` : 'invalid syntax';
  }
  return `missing "${node.type}"`;
}

let sharedParser: SourceParser | null = null;

/**
 * Parse with a lazily created shared parser.
 */
export function parseSource(path: string, text: string): SourceUnit {
  if (!sharedParser) sharedParser = new SourceParser();
  return sharedParser.parse(path, text);
}
