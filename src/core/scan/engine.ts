/**
 * Scan engine: runs parser, classifier and matcher over a batch of files and
 * merges the results into one deterministic report.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import type { Config, RuleId } from '../config/schema.js';
import { getActivePatterns } from '../patterns/registry.js';
import type { PatternRegistry } from '../patterns/types.js';
import { fileExists, readFile, toProjectPath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { SourceParser } from './parser.js';
import { classifyScopes, createClassifierOptions, type ClassifierOptions } from './classifier.js';
import { compareFindings, matchFindings, type MatcherOptions } from './matcher.js';
import type {
  BatchScanResult,
  Diagnostic,
  FileScanResult,
  FunctionScope,
  SourceUnit,
} from './types.js';

export interface ScanOptions {
  /** Limit the run to these rules (defaults to `config.rules`) */
  rules?: readonly RuleId[];
}

/**
 * Result of classifying a single file, for the classify command.
 */
export interface ClassificationResult {
  unit: SourceUnit;
  scopes: FunctionScope[];
}

export class ScanEngine {
  private readonly classifierOptions: ClassifierOptions;
  private readonly parser: SourceParser;

  constructor(
    private readonly projectRoot: string,
    private readonly config: Config,
    private readonly registry: PatternRegistry,
    parser?: SourceParser
  ) {
    this.classifierOptions = createClassifierOptions(config.classification);
    this.parser = parser ?? new SourceParser();
  }

  /**
   * Classify every function of a source text without matching.
   */
  classifySource(filePath: string, text: string): ClassificationResult {
    const unit = this.parser.parse(toProjectPath(this.projectRoot, filePath), text);
    if (unit.status === 'unparsable') return { unit, scopes: [] };
    return { unit, scopes: classifyScopes(unit, this.classifierOptions) };
  }

  /**
   * Scan source text that is already in memory.
   */
  scanSource(filePath: string, text: string, options: ScanOptions = {}): FileScanResult {
    const { unit, scopes } = this.classifySource(filePath, text);

    if (unit.status === 'unparsable') {
      const { message, line, column } = unit.error;
      logger.warn(`Skipping ${unit.path}: syntax error at line ${line}: ${message}`);
      return {
        file: unit.path,
        status: 'skipped',
        findings: [],
        diagnostics: [{ kind: 'parse-error', file: unit.path, message, line, column }],
      };
    }

    const findings = matchFindings(unit, scopes, this.matcherOptions(options));
    return {
      file: unit.path,
      status: findings.length > 0 ? 'fail' : 'pass',
      findings,
      diagnostics: [],
    };
  }

  /**
   * Read and scan one file. Missing files become a diagnostic.
   */
  async scanFile(filePath: string, options: ScanOptions = {}): Promise<FileScanResult> {
    const absolutePath = path.resolve(this.projectRoot, filePath);
    if (!(await fileExists(absolutePath))) {
      const file = toProjectPath(this.projectRoot, filePath);
      logger.warn(`File not found: ${file}`);
      return skipped(file, { kind: 'missing-file', file, message: 'File not found' });
    }

    const text = await readFile(absolutePath);
    return this.scanSource(filePath, text, options);
  }

  /**
   * Scan a batch of files. One file's failure never stops the others, and
   * the merged report is sorted regardless of completion order.
   */
  async scanFiles(filePaths: readonly string[], options: ScanOptions = {}): Promise<BatchScanResult> {
    const unique = [...new Set(filePaths)];
    const results: FileScanResult[] = [];

    // Use configured concurrency, or default to 75% of available CPUs (min 2, max 16)
    const concurrency = this.config.scan.concurrency ??
      Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);

    for (let i = 0; i < unique.length; i += concurrency) {
      const batch = unique.slice(i, i + concurrency);
      const settled = await Promise.allSettled(batch.map((fp) => this.scanFile(fp, options)));

      settled.forEach((outcome, j) => {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
          return;
        }
        const file = toProjectPath(this.projectRoot, batch[j]);
        const reason: unknown = outcome.reason;
        const message = `Failed to read file: ${reason instanceof Error ? reason.message : String(reason)}`;
        logger.warn(`${file}: ${message}`);
        results.push(skipped(file, { kind: 'read-error', file, message }));
      });
    }

    return mergeResults(results);
  }

  private matcherOptions(options: ScanOptions): MatcherOptions {
    return {
      patterns: getActivePatterns(this.registry, options.rules ?? this.config.rules),
      nestedFunctions: this.config.classification.nested_functions,
    };
  }
}

/**
 * Merge per-file results into a batch report sorted by file path, then
 * line and column.
 */
export function mergeResults(results: readonly FileScanResult[]): BatchScanResult {
  const sorted = [...results].sort((a, b) => (a.file === b.file ? 0 : a.file < b.file ? -1 : 1));
  const findings = sorted.flatMap((r) => r.findings).sort(compareFindings);
  const diagnostics = sorted.flatMap((r) => r.diagnostics).sort(compareDiagnostics);

  return {
    results: sorted,
    findings,
    diagnostics,
    summary: {
      filesScanned: sorted.filter((r) => r.status !== 'skipped').length,
      filesWithFindings: sorted.filter((r) => r.findings.length > 0).length,
      filesSkipped: sorted.filter((r) => r.status === 'skipped').length,
      findings: findings.length,
      diagnostics: diagnostics.length,
    },
  };
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return (a.line ?? 0) - (b.line ?? 0);
}

function skipped(file: string, diagnostic: Diagnostic): FileScanResult {
  return { file, status: 'skipped', findings: [], diagnostics: [diagnostic] };
}
