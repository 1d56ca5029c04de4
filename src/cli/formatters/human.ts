import chalk from 'chalk';
import type { BatchScanResult, Diagnostic, FileScanResult, Finding } from '../../core/scan/types.js';
import type { RuleId } from '../../core/config/schema.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'dim';

const SEPARATOR = '='.repeat(70);

const RULE_GUIDANCE: Record<RuleId, { title: string; why: string[] }> = {
  'test-logging': {
    title: 'Test methods should not use warning-level logging.',
    why: [
      'A warning leaves it unclear whether the test passed with issues or actually passed',
      'Tests should either pass, fail, or skip - not pass with warnings',
    ],
  },
  'tool-usage': {
    title: 'Tests should use tool wrappers instead of raw command execution.',
    why: [
      'Wrappers give consistent error handling and logging',
      'Wrappers carry installation and capability checks',
    ],
  },
};

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      showPassing: options.showPassing ?? options.verbose ?? false,
    };
  }

  formatResult(result: FileScanResult): string {
    const lines: string[] = [];

    if (result.status === 'pass') {
      lines.push(`${this.colorize('✓', 'green')} ${result.file}`);
    }
    for (const finding of result.findings) {
      lines.push(...this.formatFinding(finding));
    }
    for (const diagnostic of result.diagnostics) {
      lines.push(this.formatDiagnostic(diagnostic));
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchScanResult): string {
    const lines: string[] = [];

    if (batch.findings.length > 0) {
      lines.push(this.colorize(`✗ Found ${plural(batch.findings.length, 'policy violation')} in test methods:`, 'red'));
      lines.push('');
    }

    for (const result of batch.results) {
      if (result.status === 'pass' && !this.options.showPassing) continue;
      if (result.status === 'skipped') continue;
      lines.push(this.formatResult(result));
      lines.push('');
    }

    if (batch.diagnostics.length > 0) {
      lines.push(this.colorize(`Skipped ${plural(batch.diagnostics.length, 'file')}:`, 'yellow'));
      for (const diagnostic of batch.diagnostics) {
        lines.push(this.formatDiagnostic(diagnostic));
      }
      lines.push('');
    }

    const rules = [...new Set(batch.findings.map((f) => f.rule))].sort();
    for (const rule of rules) {
      lines.push(...this.formatGuidance(rule, batch.findings.filter((f) => f.rule === rule)));
      lines.push('');
    }

    lines.push(this.formatSummary(batch));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding): string[] {
    const lines = [`  ${finding.file}:${finding.line} in ${finding.scope.qualifiedName}`];

    if (finding.rule === 'tool-usage') {
      lines.push(`    Command: ${finding.command ?? finding.snippet}`);
      lines.push(`    ${this.colorize(`→ ${finding.suggestion.text}`, 'yellow')}`);
    } else {
      lines.push(`    ${this.colorize(`→ ${finding.call}`, 'yellow')}`);
    }

    if (this.options.verbose) {
      lines.push(`    ${this.colorize(`[${finding.code}] ${finding.message}`, 'dim')}`);
      if (finding.scope.decorators.length > 0) {
        lines.push(`    ${this.colorize(`Decorators: ${finding.scope.decorators.join(', ')}`, 'dim')}`);
      }
    }
    return lines;
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const location = diagnostic.line !== undefined ? `:${diagnostic.line}` : '';
    return `  ${this.colorize('⚠', 'yellow')} ${diagnostic.file}${location}: ${diagnostic.message}`;
  }

  private formatGuidance(rule: RuleId, findings: Finding[]): string[] {
    const guidance = RULE_GUIDANCE[rule];
    const lines = [SEPARATOR, guidance.title];

    const alternatives = [...new Set(findings.flatMap((f) => f.suggestion.alternatives ?? []))];
    if (alternatives.length > 0) {
      lines.push('', 'Recommended alternatives:');
      lines.push(...alternatives.map((a) => `  • ${a}`));
    }
    lines.push('', 'Why:');
    lines.push(...guidance.why.map((w) => `  • ${w}`));
    lines.push(SEPARATOR);
    return lines;
  }

  private formatSummary(batch: BatchScanResult): string {
    const { summary } = batch;
    if (summary.findings === 0) {
      return this.colorize(`✓ No policy violations found (${plural(summary.filesScanned, 'file')} checked)`, 'green');
    }
    return this.colorize(
      `✗ ${plural(summary.findings, 'finding')} in ${plural(summary.filesWithFindings, 'file')} (${plural(summary.filesScanned, 'file')} checked)`,
      'red'
    );
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}
