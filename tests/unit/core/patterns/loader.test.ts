/**
 * Tests for the pattern registry loader.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BUNDLED_PATTERNS_PATH, loadPatternRegistry } from '../../../../src/core/patterns/loader.js';
import { PatternError } from '../../../../src/utils/errors.js';

describe('loadPatternRegistry', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'casecheck-patterns-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('bundled registry', () => {
    it('should load the bundled registry by default', async () => {
      const registry = await loadPatternRegistry(testDir);
      expect(registry.source).toBe(BUNDLED_PATTERNS_PATH);
      expect(registry.version).toBe(1);
      expect([...registry.logging.methods.keys()]).toEqual(['warning']);
      expect([...registry.toolUsage.methods]).toEqual(['execute', 'execute_async']);
    });

    it('should map common commands to their wrappers', async () => {
      const { toolUsage } = await loadPatternRegistry(testDir);
      const tools = new Map(toolUsage.commands.map((rule) => [rule.prefix, rule.tool]));
      expect(tools.get('ip')).toBe('Ip');
      expect(tools.get('lscpu')).toBe('Lscpu');
      expect(tools.get('ping')).toBe('Ping');
      expect(tools.get('systemctl')).toBe('Service');
    });

    it('should list four logging alternatives', async () => {
      const { logging } = await loadPatternRegistry(testDir);
      expect(logging.methods.get('warning')?.alternatives).toHaveLength(4);
    });
  });

  describe('custom registry', () => {
    it('should load a project-relative registry file', async () => {
      fs.writeFileSync(
        path.join(testDir, 'patterns.yaml'),
        [
          'version: 3',
          'logging:',
          '  - method: warn',
          'tool_usage:',
          '  methods: [run]',
          '  commands:',
          '    - prefix: ethtool',
          '      tool: Ethtool',
          '',
        ].join('\n')
      );

      const registry = await loadPatternRegistry(testDir, 'patterns.yaml');

      expect(registry.source).toBe(path.join(testDir, 'patterns.yaml'));
      expect(registry.version).toBe(3);
      expect([...registry.logging.methods.keys()]).toEqual(['warn']);
      expect([...registry.toolUsage.methods]).toEqual(['run']);
      expect(registry.toolUsage.commands.map((c) => c.tool)).toEqual(['Ethtool']);
    });

    it('should throw PatternError P001 when the file is missing', async () => {
      await expect(loadPatternRegistry(testDir, 'missing.yaml')).rejects.toMatchObject({
        name: 'PatternError',
        code: 'P001',
      });
    });

    it('should throw PatternError P002 for invalid data', async () => {
      fs.writeFileSync(
        path.join(testDir, 'patterns.yaml'),
        'tool_usage:\n  commands:\n    - prefix: ip\n'
      );

      const error = await loadPatternRegistry(testDir, 'patterns.yaml').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PatternError);
      expect(error).toMatchObject({ code: 'P002' });
      expect(error instanceof Error && error.message).toMatch(/^Invalid pattern registry: YAML validation failed: tool_usage\.commands\.0\.tool: /);
    });

    it('should throw PatternError P002 for malformed YAML', async () => {
      fs.writeFileSync(path.join(testDir, 'patterns.yaml'), 'logging: [unclosed\n');

      await expect(loadPatternRegistry(testDir, 'patterns.yaml')).rejects.toMatchObject({
        code: 'P002',
      });
    });
  });
});
