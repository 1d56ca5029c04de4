import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { loadPatternRegistry } from '../../core/patterns/loader.js';
import type { PatternRegistry } from '../../core/patterns/types.js';
import { renderTemplate } from '../../utils/string.js';
import { logger } from '../../utils/logger.js';

interface PatternsOptions {
  config?: string;
  patterns?: string;
  json?: boolean;
}

/**
 * Create the patterns command: prints the active pattern registry.
 */
export function createPatternsCommand(): Command {
  return new Command('patterns')
    .description('List the active violation patterns')
    .option('--config <path>', 'Path to config file')
    .option('--patterns <path>', 'Path to a pattern registry file')
    .option('--json', 'Output in JSON format')
    .action(async (options: PatternsOptions) => {
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        const registry = await loadPatternRegistry(projectRoot, options.patterns ?? config.patterns.file);
        console.log(options.json ? JSON.stringify(registryToJson(registry), null, 2) : formatRegistry(registry));
        process.exit(0);
      } catch (error) {
        logger.error('Failed to load patterns', error instanceof Error ? error : undefined);
        process.exit(2);
      }
    });
}

export function formatRegistry(registry: PatternRegistry): string {
  const lines = [`Pattern registry v${registry.version} (${registry.source})`, '', 'test-logging:'];
  for (const rule of registry.logging.methods.values()) {
    const receivers = rule.receivers ? ` on ${[...rule.receivers].join(', ')}` : '';
    lines.push(`  .${rule.method}()${receivers}`);
  }

  const { toolUsage } = registry;
  lines.push('', `tool-usage (${[...toolUsage.methods].map((m) => `.${m}()`).join(', ')}):`);
  const ordered = [...toolUsage.commands].sort((a, b) => a.prefix.localeCompare(b.prefix));
  for (const rule of ordered) {
    const replacement = renderTemplate(toolUsage.replacement, { tool: rule.tool });
    const args = rule.requiresArgs ? ' ...' : '';
    lines.push(`  ${rule.prefix}${args} → ${replacement}${rule.description ? ` (${rule.description})` : ''}`);
  }
  return lines.join('\n');
}

function registryToJson(registry: PatternRegistry): Record<string, unknown> {
  return {
    version: registry.version,
    source: registry.source,
    logging: [...registry.logging.methods.values()].map((rule) => ({
      method: rule.method,
      receivers: rule.receivers ? [...rule.receivers] : null,
      alternatives: rule.alternatives,
    })),
    tool_usage: {
      methods: [...registry.toolUsage.methods],
      ignored_prefixes: [...registry.toolUsage.ignoredPrefixes],
      commands: registry.toolUsage.commands.map((rule) => ({
        prefix: rule.prefix,
        tool: rule.tool,
        description: rule.description,
        requires_args: rule.requiresArgs,
      })),
    },
  };
}
