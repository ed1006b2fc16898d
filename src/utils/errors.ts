/**
 * Error types and codes for packscan.
 * Every fatal condition is a PacksError; expected outcomes (dynamic constant
 * names, parse failures, unknown pack names) are returned as values instead.
 */

/**
 * Base error class for all packscan errors.
 */
export class PacksError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PacksError';
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
 * Configuration errors (packwerk.yml, package.yml, package_todo.yml).
 */
export class ConfigError extends PacksError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Errors raised while reading the files of a scan.
 */
export class ScanError extends PacksError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ScanError';
  }
}

/**
 * Broken assumptions about a syntax tree (e.g. a module with a dynamic name).
 */
export class ExtractionError extends PacksError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/**
 * Pack ownership index errors. Both codes signal a broken invariant,
 * never user input.
 */
export class PackSetError extends PacksError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PackSetError';
  }
}

export const ErrorCodes = {
  // Configuration (C001-C004)
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_PACKAGE_YML: 'C002',
  INVALID_PACKAGE_TODO: 'C003',
  YAML_PARSE_ERROR: 'C004',

  // Scanning (S001)
  UNREADABLE_FILE: 'S001',

  // Extraction (X001)
  DYNAMIC_MODULE_NAME: 'X001',

  // Pack set (P001-P002)
  NO_ROOT_PACK: 'P001',
  INCONSISTENT_INDEX: 'P002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Narrow an unknown thrown value to a printable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
