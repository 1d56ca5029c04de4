/**
 * Helper functions for the check command.
 */
import * as path from 'node:path';
import { RuleIdSchema, type ExitCodes, type RuleId } from '../../core/config/schema.js';
import type { BatchScanResult } from '../../core/scan/types.js';
import { globFiles, isGlobPattern } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { HumanFormatter, CompactFormatter, JsonFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/** Options shared by commands that print reports. */
export interface OutputOptions {
  json?: boolean;
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
  showAll?: boolean;
}

/**
 * Quiet silences the logger; verbose enables debug output.
 */
export function applyLogLevel(options: OutputOptions): void {
  if (options.quiet) {
    logger.setLevel('silent');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }
}

/**
 * Validate `--rule` values.
 */
export function parseRules(values: readonly string[]): RuleId[] {
  const rules: RuleId[] = [];
  for (const value of values) {
    const parsed = RuleIdSchema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Unknown rule "${value}". Expected one of: ${RuleIdSchema.options.join(', ')}`,
        { rule: value }
      );
    }
    if (!rules.includes(parsed.data)) rules.push(parsed.data);
  }
  return rules;
}

/**
 * `--json` wins over `--format`.
 */
export function resolveOutputFormat(options: OutputOptions): OutputFormat {
  if (options.json) return 'json';
  const format = options.format ?? 'human';
  const known = OUTPUT_FORMATS.find((f) => f === format);
  if (!known) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Unknown output format "${format}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`,
      { format }
    );
  }
  return known;
}

/**
 * Create formatter based on output format.
 */
export function createFormatter(format: OutputFormat, options: OutputOptions): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'compact':
      return new CompactFormatter();
    default:
      return new HumanFormatter({
        colors: !options.quiet,
        verbose: options.verbose ?? false,
        showPassing: !!(options.showAll || options.verbose),
      });
  }
}

/**
 * Resolve file arguments. Glob patterns are expanded; plain paths are kept
 * even when missing so the engine can report them.
 */
export async function resolveFilePatterns(
  patterns: readonly string[],
  projectRoot: string,
  exclude: string[]
): Promise<string[]> {
  const allFiles: string[] = [];
  for (const pattern of patterns) {
    if (isGlobPattern(pattern)) {
      allFiles.push(...await globFiles(pattern, { cwd: projectRoot, absolute: false, ignore: exclude }));
    } else {
      // Convert absolute paths to relative paths
      const filePath = path.isAbsolute(pattern)
        ? path.relative(projectRoot, pattern)
        : pattern;
      allFiles.push(filePath);
    }
  }
  return [...new Set(allFiles)];
}

/**
 * Exit code for a finished scan. Any finding fails the run; parse failures
 * fail it only when escalated.
 */
export function getExitCode(
  result: BatchScanResult,
  exitCodes: ExitCodes,
  failOnParseError: boolean
): number {
  if (result.summary.findings > 0) {
    return exitCodes.findings;
  }
  if (failOnParseError && result.diagnostics.some((d) => d.kind === 'parse-error')) {
    return exitCodes.error;
  }
  return exitCodes.success;
}
