/**
 * File system operations - reading and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/.venv/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
}

/**
 * Whether a file argument uses glob syntax (`*`, `?`, `[...]`, `{a,b}`, extglobs).
 */
export function isGlobPattern(pattern: string): boolean {
  return fg.isDynamicPattern(pattern);
}

/**
 * Path of a file relative to the project root, always with forward slashes.
 * Paths outside the root are returned as given (normalised).
 */
export function toProjectPath(projectRoot: string, filePath: string): string {
  const absolute = path.resolve(projectRoot, filePath);
  const relative = path.relative(projectRoot, absolute);
  const chosen = relative.startsWith('..') || path.isAbsolute(relative) ? filePath : relative;
  return chosen.replace(/\\/g, '/');
}
