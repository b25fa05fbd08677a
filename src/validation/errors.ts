/**
 * Validation error messages module
 *
 * Centralized error message definitions for consistent configuration feedback
 */

/**
 * Standardized error messages with consistent format
 * Format: ${path}: Expected ${type}, got ${actualType}
 */
export const ErrorMessages = {
  TYPE_STRING: (path: string, actual: string): string => `${path}: Expected string, got ${actual}`,
  TYPE_BOOLEAN: (path: string, actual: string): string =>
    `${path}: Expected boolean, got ${actual}`,
  TYPE_FUNCTION: (path: string, actual: string): string =>
    `${path}: Expected function, got ${actual}`,
  INVALID_VALUE: (path: string, expected: string, actual: string): string =>
    `${path}: Expected ${expected}, got ${actual}`,
  EMPTY_STRING: (path: string): string => `${path}: Expected non-empty string, got ""`,
  MUST_BE_POSITIVE: (path: string, actual: string): string =>
    `${path}: Expected positive finite number, got ${actual}`,
  MISSING_WRITE: (path: string): string => `${path}: Expected object with write(), got no write()`
}

/**
 * Describe a value's type for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (Array.isArray(value)) {
    return 'array'
  }
  return typeof value
}

/**
 * Thrown when init() receives an invalid configuration
 */
export class MuxConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid console-mux configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'MuxConfigError'
  }
}
