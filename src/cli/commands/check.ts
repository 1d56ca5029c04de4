import { Command } from 'commander';
import { loadConfig, getDefaultConfig } from '../../core/config/loader.js';
import { loadPatternRegistry } from '../../core/patterns/loader.js';
import { ScanEngine } from '../../core/scan/engine.js';
import { globFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import {
  applyLogLevel,
  createFormatter,
  getExitCode,
  parseRules,
  resolveFilePatterns,
  resolveOutputFormat,
  type OutputOptions,
} from './check-helpers.js';

interface CheckOptions extends OutputOptions {
  rule?: string[];
  config?: string;
  patterns?: string;
  strict?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check Python test methods for discouraged logging and raw command execution')
    .argument('[files...]', 'Files or glob patterns to check')
    .option('--rule <ids...>', 'Only run these rules: test-logging, tool-usage')
    .option('--json', 'Output in JSON format')
    .option('--format <format>', 'Output format: human, json, or compact', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--patterns <path>', 'Path to a pattern registry file')
    .option('--strict', 'Fail the run when a file cannot be parsed')
    .option('--show-all', 'Show passing files too')
    .option('--quiet', 'Suppress log output')
    .option('--verbose', 'Show detailed output')
    .action(async (filePatterns: string[], options: CheckOptions) => {
      let exitCodes = getDefaultConfig().exit_codes;
      try {
        applyLogLevel(options);
        const projectRoot = process.cwd();

        const config = await loadConfig(projectRoot, options.config);
        exitCodes = config.exit_codes;

        const format = resolveOutputFormat(options);
        const rules = options.rule ? parseRules(options.rule) : config.rules;
        const registry = await loadPatternRegistry(projectRoot, options.patterns ?? config.patterns.file);
        logger.debug(`Loaded pattern registry from ${registry.source}`);

        const files = filePatterns.length === 0
          ? await globFiles(config.scan.include, {
              cwd: projectRoot,
              absolute: false,
              ignore: config.scan.exclude,
            })
          : await resolveFilePatterns(filePatterns, projectRoot, config.scan.exclude);

        if (files.length === 0) {
          logger.warn('No files found matching the given patterns.');
          process.exit(exitCodes.success);
        }

        logger.info(`Checking ${files.length} file(s) for ${rules.join(', ')}...`);

        const engine = new ScanEngine(projectRoot, config, registry);
        const result = await engine.scanFiles(files, { rules });

        console.log(createFormatter(format, options).formatBatch(result));

        process.exit(getExitCode(result, exitCodes, options.strict || config.fail_on_parse_error));
      } catch (error) {
        logger.error('Check failed', error instanceof Error ? error : undefined);
        process.exit(exitCodes.error);
      }
    });
}
