/**
 * Formatter type definitions.
 */
import type { BatchScanResult, FileScanResult } from '../../core/scan/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json' | 'compact';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
  /** Show passing files (default: false - only show findings) */
  showPassing: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format a single file result.
   */
  formatResult(result: FileScanResult): string;

  /**
   * Format a whole batch.
   */
  formatBatch(batch: BatchScanResult): string;
}
