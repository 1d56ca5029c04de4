/**
 * Pattern registry exports.
 */
export * from './types.js';
export * from './loader.js';
export * from './registry.js';
export { PatternRegistrySchema, normalizePrefix } from './schema.js';
export type { PatternRegistryFile } from './schema.js';
