/**
 * Scan exports.
 */
export * from './types.js';
export * from './parser.js';
export * from './classifier.js';
export * from './matcher.js';
export * from './engine.js';
