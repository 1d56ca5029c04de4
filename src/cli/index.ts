import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createClassifyCommand } from './commands/classify.js';
import { createPatternsCommand } from './commands/patterns.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('casecheck')
    .description('Policy checker for Python test suites')
    .version(VERSION);
  [createCheckCommand, createClassifyCommand, createPatternsCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
