/**
 * Error types and codes for casecheck.
 * All thrown errors extend CaseCheckError.
 */

/**
 * Base error class for all casecheck errors.
 */
export class CaseCheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CaseCheckError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends CaseCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Pattern registry errors (missing or malformed registry data).
 */
export class PatternError extends CaseCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PatternError';
  }
}

/**
 * System errors (file not found, unreadable files, YAML parse errors).
 */
export class SystemError extends CaseCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Policy findings
  TEST_LOGGING: 'L001',
  TOOL_USAGE: 'T001',

  // Configuration and registry
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',
  PATTERNS_LOAD_ERROR: 'P001',
  INVALID_PATTERNS: 'P002',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  READ_ERROR: 'S003',
} as const;
