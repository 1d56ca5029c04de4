/**
 * Path matcher for gitignore-style path patterns.
 * Used to recognise tool-implementation and test-suite directories.
 */

import ignoreModule, { type Ignore } from 'ignore';

// ignore@5 types are CommonJS with `export default`; under NodeNext the
// factory is the module's `default` property
const ignore = ignoreModule.default;

/**
 * PathMatcher instance for filtering file paths.
 */
export interface PathMatcher {
  /**
   * Check if a file path matches any of the patterns.
   * @param filePath - Relative path from project root
   */
  matches(filePath: string): boolean;

  /**
   * Get the configured patterns.
   */
  patterns(): string[];
}

/**
 * Create a PathMatcher over gitignore-style patterns.
 * An empty pattern list matches nothing.
 */
export function createPathMatcher(patterns: string[] = []): PathMatcher {
  const filter: Ignore | null = patterns.length > 0 ? ignore().add(patterns) : null;

  return {
    matches(filePath: string): boolean {
      if (!filter) return false;
      const normalizedPath = normalizeMatchPath(filePath);
      // ignore() throws on empty paths and paths that escape the root
      if (normalizedPath === '' || normalizedPath.startsWith('../')) return false;
      return filter.ignores(normalizedPath);
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

function normalizeMatchPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}
