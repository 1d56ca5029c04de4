/**
 * Output formatters.
 */
export * from './types.js';
export { HumanFormatter } from './human.js';
export { CompactFormatter } from './compact.js';
export { JsonFormatter } from './json.js';
