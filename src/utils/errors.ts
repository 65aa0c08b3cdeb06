/**
 * Central error classes and validation utilities for olympiad-merge
 * @module utils/errors
 */

/**
 * Base error class for all olympiad-merge errors
 */
export class OlympiadMergeError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'OlympiadMergeError'
    this.code = code
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends OlympiadMergeError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends OlympiadMergeError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends OlympiadMergeError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a required table or one of its required columns is missing.
 * Aborts the run before any output is written.
 */
export class SchemaError extends OlympiadMergeError {
  public readonly table: string
  public readonly missingColumns: string[]

  constructor(
    table: string,
    message: string,
    missingColumns: string[] = [],
    context?: Record<string, unknown>
  ) {
    super(`Schema error in table '${table}': ${message}`, 'SCHEMA_ERROR', {
      table,
      missingColumns,
      ...context,
    })
    this.name = 'SchemaError'
    this.table = table
    this.missingColumns = missingColumns
  }
}

/**
 * Error thrown when a newly minted identifier is already taken.
 * Signals a minting logic error, so the merge is aborted.
 */
export class DuplicateIdentifierCollisionError extends OlympiadMergeError {
  public readonly table: string
  public readonly identifier: string

  constructor(table: string, identifier: string, context?: Record<string, unknown>) {
    super(
      `Identifier '${identifier}' already exists in table '${table}'`,
      'DUPLICATE_IDENTIFIER_COLLISION',
      { table, identifier, ...context }
    )
    this.name = 'DuplicateIdentifierCollisionError'
    this.table = table
    this.identifier = identifier
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: T[],
  parameterName: string
): T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Check if an error is an olympiad-merge error
 */
export function isOlympiadMergeError(error: unknown): error is OlympiadMergeError {
  return error instanceof OlympiadMergeError
}
