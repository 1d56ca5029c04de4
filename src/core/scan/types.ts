/**
 * Types shared by the source parser, scope classifier, call-site matcher
 * and scan engine.
 */
import type Parser from 'tree-sitter';
import type { RuleId } from '../config/schema.js';

/**
 * Role of a function definition. Only `test-method` scopes are matched.
 */
export type ScopeRole =
  | 'test-method'
  | 'lifecycle-hook'
  | 'private-helper'
  | 'tool-implementation'
  | 'other';

/**
 * Location and message of the first syntax error in a file.
 */
export interface ParseFailure {
  message: string;
  line: number;
  column: number;
}

interface SourceUnitBase {
  /** Path relative to the project root, forward slashes */
  path: string;
  text: string;
}

export interface ParsedSourceUnit extends SourceUnitBase {
  status: 'parsed';
  tree: Parser.Tree;
}

export interface UnparsableSourceUnit extends SourceUnitBase {
  status: 'unparsable';
  error: ParseFailure;
}

/**
 * One input file. Immutable once parsed.
 */
export type SourceUnit = ParsedSourceUnit | UnparsableSourceUnit;

/**
 * One function or method definition with its classification.
 */
export interface FunctionScope {
  name: string;
  /** Dotted lexical path, e.g. `NetworkSuite.verify_ping.inner` */
  qualifiedName: string;
  /** Immediately enclosing class, if the function is a method */
  className?: string;
  line: number;
  column: number;
  /** Number of enclosing function definitions */
  depth: number;
  decorators: readonly string[];
  isAsync: boolean;
  role: ScopeRole;
  /** Which classification rule decided the role */
  reason: string;
  /** The function_definition node */
  node: Parser.SyntaxNode;
  children: readonly FunctionScope[];
}

/**
 * Serializable view of the scope a finding occurred in.
 */
export interface ScopeSummary {
  qualifiedName: string;
  className?: string;
  role: ScopeRole;
  line: number;
  decorators: readonly string[];
}

/**
 * Remediation attached to a finding.
 */
export interface Suggestion {
  /** Human-readable remediation */
  text: string;
  /** Acceptable alternatives (test-logging) */
  alternatives?: readonly string[];
  /** Suggested wrapper class (tool-usage) */
  tool?: string;
  description?: string;
  /** Expression to use instead, e.g. `node.tools[Ip]` */
  replacement?: string;
}

/**
 * One reported policy violation.
 */
export interface Finding {
  file: string;
  line: number;
  column: number;
  rule: RuleId;
  code: string;
  message: string;
  /** Source text of the matched call */
  snippet: string;
  /** `<receiver>.<method>()` */
  call: string;
  /** Literal command, for tool-usage findings */
  command?: string;
  scope: ScopeSummary;
  suggestion: Suggestion;
}

export type DiagnosticKind = 'parse-error' | 'read-error' | 'missing-file';

/**
 * A non-policy problem with one file. Never counted as a finding.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  file: string;
  message: string;
  line?: number;
  column?: number;
}

/**
 * Outcome for one file.
 */
export interface FileScanResult {
  file: string;
  status: 'pass' | 'fail' | 'skipped';
  findings: Finding[];
  diagnostics: Diagnostic[];
}

export interface ScanSummary {
  filesScanned: number;
  filesWithFindings: number;
  filesSkipped: number;
  findings: number;
  diagnostics: number;
}

/**
 * Merged outcome for a batch, sorted by file path.
 */
export interface BatchScanResult {
  results: FileScanResult[];
  findings: Finding[];
  diagnostics: Diagnostic[];
  summary: ScanSummary;
}
