import { ErrorCodes } from '../../utils/errors.js';
import {
  normalizePrefix,
  type CommandPatternEntry,
  type LoggingPatternEntry,
  type PatternRegistryFile,
} from './schema.js';
import type {
  CommandMatch,
  CommandPrefixPattern,
  CommandRule,
  MethodRule,
  PatternRegistry,
  ViolationPattern,
} from './types.js';
import type { RuleId } from '../config/schema.js';

/**
 * Build the runtime registry from validated registry file data.
 */
export function buildPatternRegistry(data: PatternRegistryFile, source: string): PatternRegistry {
  const methods = new Map<string, MethodRule>(
    data.logging.map((entry): [string, MethodRule] => [entry.method, toMethodRule(entry)])
  );

  const table = data.tool_usage;
  const commands = table.commands.map(toCommandRule);
  // Longest prefix wins: "python3 -m pip" before "python3"
  commands.sort((a, b) => b.tokens.length - a.tokens.length);

  return {
    version: data.version,
    source,
    logging: {
      kind: 'fixed-method-name',
      rule: 'test-logging',
      code: ErrorCodes.TEST_LOGGING,
      methods,
    },
    toolUsage: {
      kind: 'command-prefix-table',
      rule: 'tool-usage',
      code: ErrorCodes.TOOL_USAGE,
      methods: new Set(table.methods),
      receivers: table.receivers ? new Set(table.receivers) : null,
      ignoredPrefixes: new Set(table.ignored_prefixes.map((p) => p.toLowerCase())),
      message: table.message,
      replacement: table.replacement,
      commands,
    },
  };
}

function toMethodRule(entry: LoggingPatternEntry): MethodRule {
  return {
    method: entry.method,
    message: entry.message,
    receivers: entry.receivers ? new Set(entry.receivers) : null,
    alternatives: [...entry.alternatives],
  };
}

function toCommandRule(entry: CommandPatternEntry): CommandRule {
  return {
    prefix: entry.prefix,
    tokens: normalizePrefix(entry.prefix).split(' '),
    tool: entry.tool,
    description: entry.description,
    requiresArgs: entry.requires_args,
  };
}

/**
 * Patterns enabled for the given rules, in a fixed order.
 */
export function getActivePatterns(
  registry: PatternRegistry,
  rules: readonly RuleId[]
): ViolationPattern[] {
  const enabled = new Set(rules);
  const patterns: ViolationPattern[] = [];
  if (enabled.has('test-logging')) patterns.push(registry.logging);
  if (enabled.has('tool-usage')) patterns.push(registry.toolUsage);
  return patterns;
}

/**
 * Look a literal command up in the prefix table.
 *
 * The command is split on whitespace, ignored leading tokens (`sudo`) are
 * dropped and the first remaining token is reduced to its basename, so
 * `sudo /usr/sbin/ip addr` is looked up as `ip addr`.
 */
export function matchCommand(
  pattern: CommandPrefixPattern,
  command: string
): CommandMatch | null {
  const trimmed = command.trim();
  const tokens = trimmed.split(/\s+/).filter((t) => t.length > 0).map((t) => t.toLowerCase());

  let start = 0;
  while (start < tokens.length && pattern.ignoredPrefixes.has(tokens[start])) {
    start++;
  }
  const words = tokens.slice(start);
  if (words.length === 0) return null;
  words[0] = words[0].slice(words[0].lastIndexOf('/') + 1);

  for (const rule of pattern.commands) {
    if (words.length < rule.tokens.length) continue;
    if (rule.requiresArgs && words.length === rule.tokens.length) continue;
    if (rule.tokens.every((token, i) => words[i] === token)) {
      return { rule, command: trimmed };
    }
  }
  return null;
}
