/**
 * casecheck - policy checker for Python test suites.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Pattern registry
export * from './core/patterns/index.js';

// Parsing, classification and matching
export * from './core/scan/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
