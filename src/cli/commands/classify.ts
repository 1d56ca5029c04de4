import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { loadPatternRegistry } from '../../core/patterns/loader.js';
import { ScanEngine } from '../../core/scan/engine.js';
import { flattenScopes } from '../../core/scan/classifier.js';
import type { FunctionScope } from '../../core/scan/types.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { applyLogLevel } from './check-helpers.js';

interface ClassifyOptions {
  config?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Create the classify command: shows the role assigned to every function.
 */
export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Show the role assigned to every function in the given files')
    .argument('<files...>', 'Python files to classify')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output in JSON format')
    .option('--quiet', 'Suppress log output')
    .option('--verbose', 'Show detailed output')
    .action(async (files: string[], options: ClassifyOptions) => {
      try {
        applyLogLevel(options);
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        const registry = await loadPatternRegistry(projectRoot, config.patterns.file);
        const engine = new ScanEngine(projectRoot, config, registry);

        const report: Array<{ file: string; error?: string; scopes: FunctionScope[] }> = [];
        for (const file of files) {
          const absolutePath = path.resolve(projectRoot, file);
          if (!(await fileExists(absolutePath))) {
            logger.warn(`File not found: ${file}`);
            continue;
          }
          const { unit, scopes } = engine.classifySource(file, await readFile(absolutePath));
          if (unit.status === 'unparsable') {
            logger.warn(`Skipping ${unit.path}: syntax error at line ${unit.error.line}: ${unit.error.message}`);
            report.push({ file: unit.path, error: unit.error.message, scopes: [] });
            continue;
          }
          report.push({ file: unit.path, scopes: flattenScopes(scopes) });
        }

        if (options.json) {
          console.log(JSON.stringify(report.map((entry) => ({
            file: entry.file,
            error: entry.error,
            scopes: entry.scopes.map((s) => ({
              qualified_name: s.qualifiedName,
              role: s.role,
              reason: s.reason,
              line: s.line,
              depth: s.depth,
              decorators: s.decorators,
            })),
          })), null, 2));
        } else {
          console.log(report.map((entry) => formatEntry(entry.file, entry.scopes, entry.error)).join('\n\n'));
        }
        process.exit(0);
      } catch (error) {
        logger.error('Classification failed', error instanceof Error ? error : undefined);
        process.exit(2);
      }
    });
}

/**
 * One line per function: line number, role, indented qualified name, reason.
 */
export function formatEntry(file: string, scopes: readonly FunctionScope[], error?: string): string {
  const lines = [file];
  if (error) {
    lines.push(`  (unparsable: ${error})`);
    return lines.join('\n');
  }
  if (scopes.length === 0) {
    lines.push('  (no functions)');
  }
  for (const scope of scopes) {
    const indent = '  '.repeat(scope.depth);
    lines.push(`  L${String(scope.line).padEnd(5)} ${scope.role.padEnd(19)} ${indent}${scope.qualifiedName}  (${scope.reason})`);
  }
  return lines.join('\n');
}
