/**
 * GeoGrid Error Handling Module
 *
 * Standardized error hierarchy for the grid index. All errors extend
 * GeoGridError which provides:
 * - Error codes for programmatic handling
 * - JSON serialization
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - GeoGridError (base class)
 *   - ValidationError (bad query arguments)
 *     - InvalidCoordinateError (malformed or out-of-range point)
 *   - KeyNotFoundError (key was never indexed)
 *   - ExpansionExhaustedError (ring expansion hit its cap)
 *   - ConfigurationError (invalid grid options)
 *
 * @module errors
 */

import type { ExhaustionReason } from '../types/geo'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for grid operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_COORDINATE = 'INVALID_COORDINATE',

  // Lookup
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',

  // Search
  EXPANSION_EXHAUSTED = 'EXPANSION_EXHAUSTED',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all GeoGrid errors.
 *
 * @example
 * ```typescript
 * throw new GeoGridError('Operation failed', ErrorCode.UNKNOWN, {
 *   operation: 'insert',
 * })
 * ```
 */
export class GeoGridError extends Error {
  override readonly name: string = 'GeoGridError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error to a plain object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof GeoGridError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when a query argument is unusable (negative radius,
 * non-integer ring count, ...).
 */
export class ValidationError extends GeoGridError {
  override readonly name: string = 'ValidationError'

  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error raised for a point that is not two finite numbers within
 * latitude [-90, 90] and longitude [-180, 180].
 */
export class InvalidCoordinateError extends ValidationError {
  override readonly name = 'InvalidCoordinateError'

  /** The rejected input, as received */
  readonly value: unknown

  constructor(value: unknown, reason: string) {
    super(`Invalid coordinates ${describeValue(value)}: ${reason}`, { reason }, ErrorCode.INVALID_COORDINATE)
    this.value = value
    Object.setPrototypeOf(this, InvalidCoordinateError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error returned when a key was never indexed.
 */
export class KeyNotFoundError extends GeoGridError {
  override readonly name = 'KeyNotFoundError'

  readonly key: unknown

  constructor(key: unknown) {
    super(`Key not found: ${String(key)}`, ErrorCode.KEY_NOT_FOUND, { key })
    this.key = key
    Object.setPrototypeOf(this, KeyNotFoundError.prototype)
  }
}

// =============================================================================
// Search Errors
// =============================================================================

/**
 * Error thrown when ring expansion stops before a query could be satisfied,
 * either because the ring cap was reached or because every reachable cell
 * has already been visited.
 */
export class ExpansionExhaustedError extends GeoGridError {
  override readonly name = 'ExpansionExhaustedError'

  readonly origin: string
  readonly rings: number
  readonly reason: ExhaustionReason

  constructor(origin: string, rings: number, reason: ExhaustionReason) {
    super(
      reason === 'ring-limit'
        ? `Ring expansion from ${origin} exceeded ${rings} rings`
        : `Ring expansion from ${origin} covered the whole grid after ${rings} rings`,
      ErrorCode.EXPANSION_EXHAUSTED,
      { origin, rings, reason }
    )
    this.origin = origin
    this.rings = rings
    this.reason = reason
    Object.setPrototypeOf(this, ExpansionExhaustedError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when grid options are invalid.
 */
export class ConfigurationError extends GeoGridError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.INVALID_CONFIG, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a GeoGridError
 */
export function isGeoGridError(error: unknown): error is GeoGridError {
  return error instanceof GeoGridError
}

/**
 * Check if an error is an InvalidCoordinateError
 */
export function isInvalidCoordinateError(error: unknown): error is InvalidCoordinateError {
  return error instanceof InvalidCoordinateError
}

/**
 * Check if an error is a KeyNotFoundError
 */
export function isKeyNotFoundError(error: unknown): error is KeyNotFoundError {
  return error instanceof KeyNotFoundError
}

/**
 * Check if an error is an ExpansionExhaustedError
 */
export function isExpansionExhaustedError(error: unknown): error is ExpansionExhaustedError {
  return error instanceof ExpansionExhaustedError
}

// =============================================================================
// Helpers
// =============================================================================

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined'
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
