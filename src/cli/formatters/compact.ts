/**
 * Compact output formatter for CI and pre-commit hooks.
 * Format: file:line:column: CODE [rule] message
 */

import type { BatchScanResult, Diagnostic, FileScanResult, Finding } from '../../core/scan/types.js';
import type { IFormatter } from './types.js';

export class CompactFormatter implements IFormatter {
  formatResult(result: FileScanResult): string {
    const lines: string[] = [];

    for (const finding of result.findings) {
      lines.push(this.formatFinding(finding));
    }
    for (const diagnostic of result.diagnostics) {
      lines.push(this.formatDiagnostic(diagnostic));
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchScanResult): string {
    const lines: string[] = [];

    for (const result of batch.results) {
      const formatted = this.formatResult(result);
      if (formatted) {
        lines.push(formatted);
      }
    }

    lines.push(this.formatSummary(batch));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding): string {
    return `${finding.file}:${finding.line}:${finding.column}: ${finding.code} [${finding.rule}] ${finding.message}. ${finding.suggestion.text}`;
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const line = diagnostic.line ?? 0;
    const column = diagnostic.column ?? 0;
    return `${diagnostic.file}:${line}:${column}: WARN [${diagnostic.kind}] ${diagnostic.message}`;
  }

  private formatSummary(batch: BatchScanResult): string {
    const { summary } = batch;
    return `SUMMARY: ${summary.findings} finding${summary.findings !== 1 ? 's' : ''}, ` +
      `${summary.filesSkipped} skipped (${summary.filesScanned} file${summary.filesScanned !== 1 ? 's' : ''} checked)`;
  }
}
