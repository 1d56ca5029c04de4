/**
 * Pattern registry loader - loads and validates the registry YAML.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { PatternError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { PatternRegistrySchema } from './schema.js';
import { buildPatternRegistry } from './registry.js';
import type { PatternRegistry } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Registry shipped with the package (same relative depth from src/ and dist/). */
export const BUNDLED_PATTERNS_PATH = path.resolve(__dirname, '../../../data/patterns.yaml');

/**
 * Load the pattern registry.
 * Uses the bundled registry unless a project-relative path is given.
 */
export async function loadPatternRegistry(
  projectRoot: string,
  patternsPath?: string
): Promise<PatternRegistry> {
  const fullPath = patternsPath
    ? path.resolve(projectRoot, patternsPath)
    : BUNDLED_PATTERNS_PATH;

  if (!(await fileExists(fullPath))) {
    throw new PatternError(
      ErrorCodes.PATTERNS_LOAD_ERROR,
      `Pattern registry not found: ${fullPath}`,
      { path: fullPath }
    );
  }

  try {
    const data = await loadYamlWithSchema(fullPath, PatternRegistrySchema);
    return buildPatternRegistry(data, fullPath);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new PatternError(
        ErrorCodes.INVALID_PATTERNS,
        `Invalid pattern registry: ${error.message}`,
        { ...error.details, path: fullPath }
      );
    }
    throw error;
  }
}
