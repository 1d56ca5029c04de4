/**
 * Tests for the scan engine: per-file pipeline, batching and merging.
 */
import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ScanEngine, mergeResults } from '../../../../src/core/scan/engine.js';
import { getDefaultConfig, mergeConfig } from '../../../../src/core/config/loader.js';
import { loadPatternRegistry } from '../../../../src/core/patterns/loader.js';
import type { PatternRegistry } from '../../../../src/core/patterns/types.js';
import type { FileScanResult } from '../../../../src/core/scan/types.js';
import { logger } from '../../../../src/utils/logger.js';

const SUITE = [
  'class NetworkSuite(TestSuite):',
  '    def verify_ping(self, node, log):',
  '        log.warning("x")',
  '        node.execute("ip addr show eth0")',
  '',
].join('\n');

const HELPER = [
  'class NetworkSuite(TestSuite):',
  '    def _collect(self, log):',
  '        log.warning("x")',
  '',
].join('\n');

describe('ScanEngine', () => {
  let registry: PatternRegistry;
  let testDir: string;

  beforeAll(async () => {
    registry = await loadPatternRegistry(process.cwd());
  });

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'casecheck-engine-'));
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function write(relativePath: string, content: string): void {
    const fullPath = path.join(testDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }

  describe('scanSource', () => {
    it('should report findings with project-relative paths', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const result = engine.scanSource(path.join(testDir, 'suites/network.py'), SUITE);

      expect(result.file).toBe('suites/network.py');
      expect(result.status).toBe('fail');
      expect(result.findings.map((f) => [f.line, f.rule])).toEqual([
        [3, 'test-logging'],
        [4, 'tool-usage'],
      ]);
      expect(result.diagnostics).toEqual([]);
    });

    it('should pass files without findings', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      expect(engine.scanSource('suites/helper.py', HELPER)).toEqual({
        file: 'suites/helper.py',
        status: 'pass',
        findings: [],
        diagnostics: [],
      });
    });

    it('should skip unparsable files with a parse-error diagnostic', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const result = engine.scanSource('suites/broken.py', 'class Broken(:\n    pass\n');

      expect(result.status).toBe('skipped');
      expect(result.findings).toEqual([]);
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({ kind: 'parse-error', file: 'suites/broken.py', line: 1 });
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(vi.mocked(logger.warn).mock.calls[0][0]).toMatch(/^Skipping suites\/broken\.py: syntax error at line 1: /);
    });

    it('should limit findings to the requested rules', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const result = engine.scanSource('suites/network.py', SUITE, { rules: ['tool-usage'] });
      expect(result.findings.map((f) => f.rule)).toEqual(['tool-usage']);
    });

    it('should fall back to the configured rules', () => {
      const engine = new ScanEngine(testDir, mergeConfig({ rules: ['test-logging'] }), registry);
      const result = engine.scanSource('suites/network.py', SUITE);
      expect(result.findings.map((f) => f.rule)).toEqual(['test-logging']);
    });

    it('should honour the nested function mode', () => {
      const source = [
        'class S(TestSuite):',
        '    def test_a(self, log):',
        '        def inner():',
        '            log.warning("x")',
        '',
      ].join('\n');
      const independent = new ScanEngine(testDir, getDefaultConfig(), registry);
      const inherit = new ScanEngine(
        testDir,
        mergeConfig({ classification: { nested_functions: 'inherit' } }),
        registry
      );
      expect(independent.scanSource('a.py', source).findings).toHaveLength(0);
      expect(inherit.scanSource('a.py', source).findings).toHaveLength(1);
    });
  });

  describe('classifySource', () => {
    it('should return scopes for parsed files', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const { unit, scopes } = engine.classifySource('suites/network.py', SUITE);
      expect(unit.status).toBe('parsed');
      expect(scopes.map((s) => [s.qualifiedName, s.role])).toEqual([['NetworkSuite.verify_ping', 'test-method']]);
    });

    it('should return no scopes for unparsable files', () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const { unit, scopes } = engine.classifySource('broken.py', 'def broken(:\n');
      expect(unit.status).toBe('unparsable');
      expect(scopes).toEqual([]);
    });
  });

  describe('scanFile', () => {
    it('should read and scan a file from disk', async () => {
      write('suites/network.py', SUITE);
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const result = await engine.scanFile('suites/network.py');
      expect(result.findings).toHaveLength(2);
    });

    it('should report missing files as a diagnostic', async () => {
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const result = await engine.scanFile('missing.py');
      expect(result).toEqual({
        file: 'missing.py',
        status: 'skipped',
        findings: [],
        diagnostics: [{ kind: 'missing-file', file: 'missing.py', message: 'File not found' }],
      });
      expect(logger.warn).toHaveBeenCalledWith('File not found: missing.py');
    });
  });

  describe('scanFiles', () => {
    it('should scan a batch and keep going past unparsable files', async () => {
      write('suites/network.py', SUITE);
      write('suites/helper.py', HELPER);
      write('suites/broken.py', 'class Broken(:\n');
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);

      const batch = await engine.scanFiles(['suites/network.py', 'suites/broken.py', 'suites/helper.py']);

      expect(batch.results.map((r) => [r.file, r.status])).toEqual([
        ['suites/broken.py', 'skipped'],
        ['suites/helper.py', 'pass'],
        ['suites/network.py', 'fail'],
      ]);
      expect(batch.findings).toHaveLength(2);
      expect(batch.diagnostics.map((d) => d.kind)).toEqual(['parse-error']);
      expect(batch.summary).toEqual({
        filesScanned: 2,
        filesWithFindings: 1,
        filesSkipped: 1,
        findings: 2,
        diagnostics: 1,
      });
    });

    it('should produce the same report regardless of input order and batch size', async () => {
      const files = ['b.py', 'a.py', 'c.py', 'd.py'];
      for (const file of files) write(file, SUITE);

      const serial = new ScanEngine(testDir, mergeConfig({ scan: { concurrency: 1 } }), registry);
      const parallel = new ScanEngine(testDir, mergeConfig({ scan: { concurrency: 3 } }), registry);

      const first = await serial.scanFiles(files);
      const second = await parallel.scanFiles([...files].reverse());

      expect(second).toEqual(first);
      expect(first.findings.map((f) => `${f.file}:${f.line}`)).toEqual([
        'a.py:3', 'a.py:4', 'b.py:3', 'b.py:4', 'c.py:3', 'c.py:4', 'd.py:3', 'd.py:4',
      ]);
    });

    it('should scan duplicate paths once', async () => {
      write('a.py', SUITE);
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);
      const batch = await engine.scanFiles(['a.py', 'a.py']);
      expect(batch.results).toHaveLength(1);
    });

    it('should turn read failures into read-error diagnostics', async () => {
      // A directory passes the existence check but cannot be read as a file
      fs.mkdirSync(path.join(testDir, 'folder.py'));
      write('a.py', SUITE);
      const engine = new ScanEngine(testDir, getDefaultConfig(), registry);

      const batch = await engine.scanFiles(['folder.py', 'a.py']);

      expect(batch.results.map((r) => [r.file, r.status])).toEqual([
        ['a.py', 'fail'],
        ['folder.py', 'skipped'],
      ]);
      expect(batch.diagnostics).toHaveLength(1);
      expect(batch.diagnostics[0].kind).toBe('read-error');
      expect(batch.diagnostics[0].message).toMatch(/^Failed to read file: /);
    });
  });
});

describe('mergeResults', () => {
  it('should sort results and count an empty batch', () => {
    expect(mergeResults([])).toEqual({
      results: [],
      findings: [],
      diagnostics: [],
      summary: { filesScanned: 0, filesWithFindings: 0, filesSkipped: 0, findings: 0, diagnostics: 0 },
    });
  });

  it('should order diagnostics by file then line', () => {
    const results: FileScanResult[] = [
      { file: 'z.py', status: 'skipped', findings: [], diagnostics: [{ kind: 'parse-error', file: 'z.py', message: 'bad', line: 2 }] },
      { file: 'm.py', status: 'skipped', findings: [], diagnostics: [{ kind: 'missing-file', file: 'm.py', message: 'File not found' }] },
    ];
    expect(mergeResults(results).diagnostics.map((d) => d.file)).toEqual(['m.py', 'z.py']);
  });
});
