/**
 * Error types and codes for pymodgraph.
 * Every error raised on purpose extends PyModGraphError.
 */

/**
 * Base error class for all pymodgraph errors.
 */
export class PyModGraphError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PyModGraphError';
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
export class ConfigError extends PyModGraphError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command-line usage. Shown to the user without a stack trace.
 */
export class UsageError extends PyModGraphError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // Usage errors
  MISSING_ROOT: 'U001',
  MISSING_PACKAGE: 'U002',
  INVALID_MODE: 'U003',
  INVALID_FORMAT: 'U004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
