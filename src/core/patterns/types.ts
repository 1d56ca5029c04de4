/**
 * Violation pattern types. A pattern is pure data: evaluating it needs
 * only call-site syntax, never types or imports.
 */
import type { RuleId } from '../config/schema.js';

/**
 * A fixed method name to match, with its remediation.
 */
export interface MethodRule {
  method: string;
  message: string;
  /** Receiver expressions the rule is limited to; null matches any receiver */
  receivers: ReadonlySet<string> | null;
  alternatives: readonly string[];
}

/**
 * Matches `<receiver>.<method>(...)` by method name alone.
 */
export interface FixedMethodPattern {
  kind: 'fixed-method-name';
  rule: Extract<RuleId, 'test-logging'>;
  code: string;
  methods: ReadonlyMap<string, MethodRule>;
}

/**
 * A command prefix and the wrapper suggested for it.
 */
export interface CommandRule {
  /** Prefix as written in the registry */
  prefix: string;
  /** Lower-cased prefix tokens */
  tokens: readonly string[];
  tool: string;
  description: string;
  requiresArgs: boolean;
}

/**
 * Matches raw execution calls whose literal command starts with a known prefix.
 */
export interface CommandPrefixPattern {
  kind: 'command-prefix-table';
  rule: Extract<RuleId, 'tool-usage'>;
  code: string;
  methods: ReadonlySet<string>;
  receivers: ReadonlySet<string> | null;
  /** Lower-cased tokens dropped from the start of a command before lookup */
  ignoredPrefixes: ReadonlySet<string>;
  message: string;
  replacement: string;
  /** Sorted longest prefix first */
  commands: readonly CommandRule[];
}

export type ViolationPattern = FixedMethodPattern | CommandPrefixPattern;

/**
 * The read-only set of patterns a scan runs with.
 */
export interface PatternRegistry {
  version: number;
  /** File the registry was loaded from */
  source: string;
  logging: FixedMethodPattern;
  toolUsage: CommandPrefixPattern;
}

/**
 * Result of looking a command up in the prefix table.
 */
export interface CommandMatch {
  rule: CommandRule;
  /** Command as given, trimmed */
  command: string;
}
