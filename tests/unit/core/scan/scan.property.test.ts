/**
 * Property tests for matching and merging invariants.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import * as fc from 'fast-check';
import { matchFindings } from '../../../../src/core/scan/matcher.js';
import { classifyScopes, createClassifierOptions } from '../../../../src/core/scan/classifier.js';
import { mergeResults } from '../../../../src/core/scan/engine.js';
import { SourceParser } from '../../../../src/core/scan/parser.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { loadPatternRegistry } from '../../../../src/core/patterns/loader.js';
import { getActivePatterns } from '../../../../src/core/patterns/registry.js';
import type { PatternRegistry } from '../../../../src/core/patterns/types.js';
import type { FileScanResult, Finding } from '../../../../src/core/scan/types.js';

const PYTHON_KEYWORDS = new Set([
  'and', 'as', 'assert', 'async', 'await', 'break', 'case', 'class', 'continue', 'def', 'del',
  'elif', 'else', 'except', 'exec', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
  'is', 'lambda', 'match', 'nonlocal', 'not', 'or', 'pass', 'print', 'raise', 'return', 'try',
  'type', 'while', 'with', 'yield',
]);

const parser = new SourceParser();
const classifierOptions = createClassifierOptions(getDefaultConfig().classification);

let registry: PatternRegistry;

beforeAll(async () => {
  registry = await loadPatternRegistry(process.cwd());
});

function scan(source: string): Finding[] {
  const unit = parser.parse('suites/generated.py', source);
  if (unit.status !== 'parsed') throw new Error(unit.error.message);
  return matchFindings(unit, classifyScopes(unit, classifierOptions), {
    patterns: getActivePatterns(registry, ['test-logging', 'tool-usage']),
    nestedFunctions: 'independent',
  });
}

function testMethod(statements: readonly string[]): string {
  return ['class S(TestSuite):', '    def test_generated(self, node, log):', ...statements.map((s) => `        ${s}`), ''].join('\n');
}

const identifierArb = fc
  .stringMatching(/^[a-z_][a-z0-9_]{0,10}$/)
  .filter((name) => !PYTHON_KEYWORDS.has(name));

const statementArb = fc.oneof(
  fc.constant({ text: 'log.warning("w")', offends: true }),
  fc.constant({ text: 'log.info("i")', offends: false }),
  fc.constant({ text: 'node.execute("unknowncmd --flag")', offends: false }),
  fc.constant({ text: 'node.execute("ip addr")', offends: true }),
  identifierArb.map((name) => ({ text: `node.execute(${name})`, offends: false }))
);

describe('scan properties', () => {
  it('reports exactly one finding per offending call site', () => {
    fc.assert(
      fc.property(fc.array(statementArb, { minLength: 1, maxLength: 12 }), (statements) => {
        const findings = scan(testMethod(statements.map((s) => s.text)));
        const expectedLines = statements.flatMap((s, i) => (s.offends ? [i + 3] : []));
        expect(findings.map((f) => f.line)).toEqual(expectedLines);
      }),
      { numRuns: 50 }
    );
  });

  it('never matches a command passed through a variable', () => {
    fc.assert(
      fc.property(identifierArb, (name) => {
        expect(scan(testMethod([`node.execute(${name})`, `node.execute_async(${name})`]))).toEqual([]);
      }),
      { numRuns: 50 }
    );
  });

  it('merges results the same way regardless of completion order', () => {
    const resultArb = fc
      .uniqueArray(fc.stringMatching(/^[a-z]{1,6}\.py$/), { minLength: 1, maxLength: 6 })
      .map((files) => files.map((file, i): FileScanResult => {
        const source = testMethod(i % 2 === 0 ? ['log.warning("w")', 'node.execute("ip addr")'] : ['log.info("i")']);
        const unit = parser.parse(file, source);
        if (unit.status !== 'parsed') throw new Error(unit.error.message);
        const findings = matchFindings(unit, classifyScopes(unit, classifierOptions), {
          patterns: getActivePatterns(registry, ['test-logging', 'tool-usage']),
          nestedFunctions: 'independent',
        });
        return { file, status: findings.length > 0 ? 'fail' : 'pass', findings, diagnostics: [] };
      }));

    fc.assert(
      fc.property(
        resultArb.chain((results) =>
          fc.tuple(fc.constant(results), fc.shuffledSubarray(results, { minLength: results.length, maxLength: results.length }))
        ),
        ([results, shuffled]) => {
          expect(mergeResults(shuffled)).toEqual(mergeResults(results));
        }
      ),
      { numRuns: 30 }
    );
  });
});
