/**
 * Zod schema for the violation pattern registry file.
 */
import { z } from 'zod';

/** One fixed-method-name entry of the logging table. */
export const LoggingPatternSchema = z.object({
  /** Method name that triggers the finding (e.g. `warning`) */
  method: z.string().min(1),
  /** Message template for the finding */
  message: z.string().default('{call} in test method {scope}'),
  /** Restrict matching to these receiver expressions; omitted means any receiver */
  receivers: z.array(z.string()).optional(),
  /** Acceptable alternatives listed in the remediation */
  alternatives: z.array(z.string()).default([]),
});

/** One command-prefix entry of the tool-usage table. */
export const CommandPatternSchema = z.object({
  /** Leading command token(s), e.g. `ip` or `python3 -m pip` */
  prefix: z.string().trim().min(1),
  /** Wrapper class suggested for the command */
  tool: z.string().min(1),
  description: z.string().default(''),
  /** Only match when the command has arguments after the prefix */
  requires_args: z.boolean().default(false),
});

/** The tool-usage table. */
export const ToolUsagePatternSchema = z
  .object({
    /** Raw execution entry points */
    methods: z.array(z.string().min(1)).min(1).default(['execute', 'execute_async']),
    receivers: z.array(z.string()).optional(),
    /** Leading tokens skipped before matching (e.g. `sudo`) */
    ignored_prefixes: z.array(z.string()).default(['sudo']),
    message: z.string().default('{call} runs "{command}" in test method {scope}'),
    /** Replacement expression template */
    replacement: z.string().default('node.tools[{tool}]'),
    commands: z.array(CommandPatternSchema).default([]),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.commands.forEach((entry, index) => {
      const key = normalizePrefix(entry.prefix);
      if (seen.has(key)) {
        ctx.addIssue({
          code: 'custom',
          path: ['commands', index, 'prefix'],
          message: `Duplicate command prefix "${entry.prefix}"`,
        });
      }
      seen.add(key);
    });
  });

/** Schema for the whole registry file. */
export const PatternRegistrySchema = z
  .object({
    version: z.number().int().default(1),
    logging: z.array(LoggingPatternSchema).default([]),
    tool_usage: z.preprocess((val) => val ?? {}, ToolUsagePatternSchema),
  })
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.logging.forEach((entry, index) => {
      if (seen.has(entry.method)) {
        ctx.addIssue({
          code: 'custom',
          path: ['logging', index, 'method'],
          message: `Duplicate logging method "${entry.method}"`,
        });
      }
      seen.add(entry.method);
    });
  });

/**
 * Canonical form of a command prefix: lower-case, single-spaced.
 */
export function normalizePrefix(prefix: string): string {
  return prefix.trim().split(/\s+/).join(' ').toLowerCase();
}

export type PatternRegistryFile = z.infer<typeof PatternRegistrySchema>;
export type LoggingPatternEntry = z.infer<typeof LoggingPatternSchema>;
export type CommandPatternEntry = z.infer<typeof CommandPatternSchema>;
