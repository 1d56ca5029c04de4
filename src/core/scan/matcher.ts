/**
 * Call-site matcher: walks the body of every test method and reports calls
 * that match an active violation pattern.
 */
import type Parser from 'tree-sitter';
import type { NestedFunctionMode } from '../config/schema.js';
import { matchCommand } from '../patterns/registry.js';
import type {
  CommandPrefixPattern,
  FixedMethodPattern,
  ViolationPattern,
} from '../patterns/types.js';
import {
  PyDefinitionNodes,
  PyExpressionNodes,
  getAttributeCall,
  getFirstPositionalArgument,
  getStringLiteralValue,
} from '../../validators/tree-sitter/python-ast.js';
import { getLocation, getNodeText, walkTree } from '../../validators/tree-sitter/TreeSitterUtils.js';
import { collapseWhitespace, renderTemplate, truncateString } from '../../utils/string.js';
import { flattenScopes } from './classifier.js';
import type { Finding, FunctionScope, ParsedSourceUnit, ScopeSummary } from './types.js';

const MAX_SNIPPET_LENGTH = 120;
const MAX_COMMAND_LENGTH = 80;

export interface MatcherOptions {
  patterns: readonly ViolationPattern[];
  /** `inherit` also walks functions nested inside a test method */
  nestedFunctions: NestedFunctionMode;
}

interface CallSite {
  node: Parser.SyntaxNode;
  receiver: string;
  method: string;
  call: string;
}

/**
 * Match every test-method scope of a file against the active patterns.
 * Findings come back sorted by line, then column.
 */
export function matchFindings(
  unit: ParsedSourceUnit,
  scopes: readonly FunctionScope[],
  options: MatcherOptions
): Finding[] {
  const findings: Finding[] = [];
  if (options.patterns.length === 0) return findings;

  for (const scope of flattenScopes(scopes)) {
    if (scope.role !== 'test-method') continue;
    const body = scope.node.childForFieldName('body');
    if (!body) continue;

    const summary = summarizeScope(scope);
    walkTree(body, (node) => {
      if (node.type === PyDefinitionNodes.CLASS_DEFINITION) return false;
      if (node.type === PyDefinitionNodes.FUNCTION_DEFINITION) {
        return options.nestedFunctions === 'inherit';
      }
      if (node.type !== PyExpressionNodes.CALL) return true;

      const site = toCallSite(node, unit.text);
      if (!site) return true;
      for (const pattern of options.patterns) {
        const finding = pattern.kind === 'fixed-method-name'
          ? matchFixedMethod(pattern, site, unit, summary)
          : matchCommandPrefix(pattern, site, unit, summary);
        if (finding) findings.push(finding);
      }
      return true;
    });
  }

  return findings.sort(compareFindings);
}

/**
 * Orders findings by file, line, column, then rule.
 */
export function compareFindings(a: Finding, b: Finding): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.column !== b.column) return a.column - b.column;
  if (a.rule !== b.rule) return a.rule < b.rule ? -1 : 1;
  return 0;
}

function toCallSite(node: Parser.SyntaxNode, text: string): CallSite | null {
  const attribute = getAttributeCall(node, text);
  if (!attribute) return null;
  const receiver = collapseWhitespace(attribute.receiver);
  return {
    node,
    receiver,
    method: attribute.method,
    call: `${receiver}.${attribute.method}()`,
  };
}

function summarizeScope(scope: FunctionScope): ScopeSummary {
  return {
    qualifiedName: scope.qualifiedName,
    className: scope.className,
    role: scope.role,
    line: scope.line,
    decorators: scope.decorators,
  };
}

function baseFinding(
  pattern: ViolationPattern,
  site: CallSite,
  unit: ParsedSourceUnit,
  scope: ScopeSummary
): Omit<Finding, 'message' | 'suggestion'> {
  const { line, column } = getLocation(site.node);
  return {
    file: unit.path,
    line,
    column,
    rule: pattern.rule,
    code: pattern.code,
    snippet: truncateString(collapseWhitespace(getNodeText(site.node, unit.text)), MAX_SNIPPET_LENGTH),
    call: site.call,
    scope,
  };
}

function matchFixedMethod(
  pattern: FixedMethodPattern,
  site: CallSite,
  unit: ParsedSourceUnit,
  scope: ScopeSummary
): Finding | null {
  const rule = pattern.methods.get(site.method);
  if (!rule) return null;
  if (rule.receivers && !rule.receivers.has(site.receiver)) return null;

  return {
    ...baseFinding(pattern, site, unit, scope),
    message: renderTemplate(rule.message, {
      call: site.call,
      method: site.method,
      receiver: site.receiver,
      scope: scope.qualifiedName,
    }),
    suggestion: {
      text: rule.alternatives.length > 0
        ? rule.alternatives.join('; ')
        : `Remove the ${site.method}() call`,
      alternatives: rule.alternatives,
    },
  };
}

function matchCommandPrefix(
  pattern: CommandPrefixPattern,
  site: CallSite,
  unit: ParsedSourceUnit,
  scope: ScopeSummary
): Finding | null {
  if (!pattern.methods.has(site.method)) return null;
  if (pattern.receivers && !pattern.receivers.has(site.receiver)) return null;

  const argument = getFirstPositionalArgument(site.node);
  if (!argument) return null;
  const literal = getStringLiteralValue(argument, unit.text);
  if (literal === null) return null;
  const match = matchCommand(pattern, literal);
  if (!match) return null;

  const { tool, description } = match.rule;
  const replacement = renderTemplate(pattern.replacement, { tool });
  const command = truncateString(collapseWhitespace(match.command), MAX_COMMAND_LENGTH);

  return {
    ...baseFinding(pattern, site, unit, scope),
    command,
    message: renderTemplate(pattern.message, {
      call: site.call,
      method: site.method,
      receiver: site.receiver,
      scope: scope.qualifiedName,
      command,
      tool,
      description,
      replacement,
    }),
    suggestion: {
      text: description
        ? `Use ${replacement} instead (${description})`
        : `Use ${replacement} instead`,
      tool,
      description,
      replacement,
    },
  };
}
