import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Identifiers of the policy checks. */
export const RuleIdSchema = z.enum(['test-logging', 'tool-usage']);

/** How functions nested inside a test method are matched. */
export const NestedFunctionModeSchema = z.enum(['independent', 'inherit']);

/** Inputs to the scope classifier. */
export const ClassificationSchema = z.object({
  /** Path patterns (gitignore syntax) where tool wrappers are implemented */
  tool_paths: z.array(z.string()).default(['lisa/tools/', 'lisa/base_tools/']),
  /** Path patterns where every class counts as a test-suite class */
  test_paths: z.array(z.string()).default([]),
  /** Base class names that mark a test-suite class */
  test_base_classes: z.array(z.string()).default(['TestSuite', 'TestCase']),
  /** Name prefixes of test methods */
  test_method_prefixes: z.array(z.string().min(1)).default(['test', 'verify']),
  /** Setup/teardown names that are never test methods */
  lifecycle_hooks: z.array(z.string()).default([
    'before_case',
    'after_case',
    'before_suite',
    'after_suite',
    'setUp',
    'tearDown',
    'setUpClass',
    'tearDownClass',
    'setup_method',
    'teardown_method',
    'setup_class',
    'teardown_class',
  ]),
  nested_functions: NestedFunctionModeSchema.default('independent'),
});

/** File scanning patterns used when no files are given. */
export const ScanSchema = z.object({
  include: z.array(z.string()).default(['**/*.py']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/.venv/**',
    '**/venv/**',
    '**/.git/**',
  ]),
  /** Concurrency for file reads (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

/** Pattern registry location. */
export const PatternsConfigSchema = z.object({
  /** Registry YAML replacing the bundled one, relative to the project root */
  file: z.string().optional(),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().default(0),
  findings: z.number().default(1),
  error: z.number().default(2),
});

/** Complete casecheck configuration. */
export const ConfigSchema = z.object({
  classification: withDefaults(ClassificationSchema),
  scan: withDefaults(ScanSchema),
  patterns: withDefaults(PatternsConfigSchema),
  rules: z.array(RuleIdSchema).min(1).default(['test-logging', 'tool-usage']),
  /** Treat unparsable files as a failed run */
  fail_on_parse_error: z.boolean().default(false),
  exit_codes: withDefaults(ExitCodesSchema),
});

/** A config file; an empty document means all defaults. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Config = z.infer<typeof ConfigSchema>;
export type ClassificationConfig = z.infer<typeof ClassificationSchema>;
export type RuleId = z.infer<typeof RuleIdSchema>;
export type NestedFunctionMode = z.infer<typeof NestedFunctionModeSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
