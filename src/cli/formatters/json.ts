/**
 * JSON output formatter. Keys are snake_case for machine consumers.
 */
import type { BatchScanResult, Diagnostic, FileScanResult, Finding } from '../../core/scan/types.js';
import type { IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatResult(result: FileScanResult): string {
    return JSON.stringify(
      {
        file: result.file,
        status: result.status,
        findings: result.findings.map((f) => this.transformFinding(f)),
        diagnostics: result.diagnostics.map((d) => this.transformDiagnostic(d)),
      },
      null,
      2
    );
  }

  formatBatch(batch: BatchScanResult): string {
    return JSON.stringify(
      {
        passed: batch.summary.findings === 0,
        summary: {
          files_scanned: batch.summary.filesScanned,
          files_with_findings: batch.summary.filesWithFindings,
          files_skipped: batch.summary.filesSkipped,
          findings: batch.summary.findings,
          diagnostics: batch.summary.diagnostics,
        },
        findings: batch.findings.map((f) => this.transformFinding(f)),
        diagnostics: batch.diagnostics.map((d) => this.transformDiagnostic(d)),
      },
      null,
      2
    );
  }

  private transformFinding(finding: Finding): Record<string, unknown> {
    return {
      file: finding.file,
      line: finding.line,
      column: finding.column,
      rule: finding.rule,
      code: finding.code,
      message: finding.message,
      call: finding.call,
      snippet: finding.snippet,
      command: finding.command,
      scope: {
        qualified_name: finding.scope.qualifiedName,
        class_name: finding.scope.className,
        role: finding.scope.role,
        line: finding.scope.line,
        decorators: finding.scope.decorators,
      },
      suggestion: {
        text: finding.suggestion.text,
        alternatives: finding.suggestion.alternatives,
        tool: finding.suggestion.tool,
        description: finding.suggestion.description,
        replacement: finding.suggestion.replacement,
      },
    };
  }

  private transformDiagnostic(diagnostic: Diagnostic): Record<string, unknown> {
    return {
      kind: diagnostic.kind,
      file: diagnostic.file,
      line: diagnostic.line,
      column: diagnostic.column,
      message: diagnostic.message,
    };
  }
}
