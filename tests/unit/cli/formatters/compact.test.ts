/**
 * Tests for the compact formatter.
 */
import { describe, it, expect } from 'vitest';
import { CompactFormatter } from '../../../../src/cli/formatters/compact.js';
import { emptyBatch, sampleBatch } from './sample-results.js';

describe('CompactFormatter', () => {
  const formatter = new CompactFormatter();

  it('should print one line per finding and diagnostic, then a summary', () => {
    expect(formatter.formatBatch(sampleBatch()).split('\n')).toEqual([
      'suites/broken.py:1:13: WARN [parse-error] invalid syntax near "("',
      'suites/network.py:3:9: L001 [test-logging] log.warning() in test method NetworkSuite.verify_ping. ' +
        'Use log.info() for informational messages; Use log.debug() for detailed diagnostic information',
      'suites/network.py:4:9: T001 [tool-usage] node.execute() runs "ip addr show eth0" in test method ' +
        'NetworkSuite.verify_ping. Use node.tools[Ip] instead (IP address and routing management)',
      'SUMMARY: 2 findings, 1 skipped (2 files checked)',
    ]);
  });

  it('should print only the summary for a clean run', () => {
    expect(formatter.formatBatch(emptyBatch())).toBe('SUMMARY: 0 findings, 0 skipped (1 file checked)');
  });

  it('should use zero locations for diagnostics without a line', () => {
    expect(formatter.formatResult({
      file: 'missing.py',
      status: 'skipped',
      findings: [],
      diagnostics: [{ kind: 'missing-file', file: 'missing.py', message: 'File not found' }],
    })).toBe('missing.py:0:0: WARN [missing-file] File not found');
  });
});
