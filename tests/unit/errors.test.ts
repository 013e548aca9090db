/**
 * Error Hierarchy Tests
 */

import { describe, it, expect } from 'vitest'
import {
  ConfigurationError,
  ErrorCode,
  ExpansionExhaustedError,
  GeoGridError,
  InvalidCoordinateError,
  KeyNotFoundError,
  ValidationError,
  isExpansionExhaustedError,
  isGeoGridError,
  isInvalidCoordinateError,
  isKeyNotFoundError,
} from '../../src/errors'

describe('GeoGridError', () => {
  it('defaults to UNKNOWN with an empty context', () => {
    const error = new GeoGridError('boom')
    expect(error.code).toBe(ErrorCode.UNKNOWN)
    expect(error.context).toEqual({})
    expect(error).toBeInstanceOf(Error)
  })

  it('serializes with its cause', () => {
    const cause = new ValidationError('bad radius', { radius: -1 })
    const error = new GeoGridError('search failed', ErrorCode.UNKNOWN, { op: 'find' }, cause)

    expect(error.toJSON()).toEqual({
      name: 'GeoGridError',
      code: ErrorCode.UNKNOWN,
      message: 'search failed',
      context: { op: 'find' },
      cause: {
        name: 'ValidationError',
        code: ErrorCode.VALIDATION_FAILED,
        message: 'bad radius',
        context: { radius: -1 },
        cause: undefined,
      },
    })
  })

  it('matches codes', () => {
    expect(new KeyNotFoundError('x').is(ErrorCode.KEY_NOT_FOUND)).toBe(true)
    expect(new KeyNotFoundError('x').is(ErrorCode.UNKNOWN)).toBe(false)
  })
})

describe('InvalidCoordinateError', () => {
  it('is a ValidationError with its own code', () => {
    const error = new InvalidCoordinateError([1, 2, 3], 'expected [lat, lng], got 3 values')

    expect(error).toBeInstanceOf(ValidationError)
    expect(error.name).toBe('InvalidCoordinateError')
    expect(error.code).toBe(ErrorCode.INVALID_COORDINATE)
    expect(error.message).toBe('Invalid coordinates [1,2,3]: expected [lat, lng], got 3 values')
    expect(error.context).toEqual({ reason: 'expected [lat, lng], got 3 values' })
  })

  it('describes undefined and unserializable values', () => {
    expect(new InvalidCoordinateError(undefined, 'missing').message).toBe('Invalid coordinates undefined: missing')

    const cyclic: Record<string, unknown> = {}
    cyclic.self = cyclic
    expect(new InvalidCoordinateError(cyclic, 'odd').message).toBe('Invalid coordinates [object Object]: odd')
  })
})

describe('ExpansionExhaustedError', () => {
  it('explains a ring limit', () => {
    const error = new ExpansionExhaustedError('u09t', 5000, 'ring-limit')
    expect(error.message).toBe('Ring expansion from u09t exceeded 5000 rings')
    expect(error.context).toEqual({ origin: 'u09t', rings: 5000, reason: 'ring-limit' })
  })

  it('explains a covered grid', () => {
    expect(new ExpansionExhaustedError('u', 4, 'grid-covered').message).toBe(
      'Ring expansion from u covered the whole grid after 4 rings'
    )
  })
})

describe('type guards', () => {
  const errors = {
    invalid: new InvalidCoordinateError(null, 'expected { lat, lng } or [lat, lng]'),
    missing: new KeyNotFoundError('ORY'),
    exhausted: new ExpansionExhaustedError('u09t', 10, 'ring-limit'),
    config: new ConfigurationError('bad', { configKey: 'maxRings' }),
  }

  it('recognizes grid errors', () => {
    for (const error of Object.values(errors)) {
      expect(isGeoGridError(error)).toBe(true)
    }
    expect(isGeoGridError(new Error('plain'))).toBe(false)
    expect(isGeoGridError('string')).toBe(false)
  })

  it('tells the subclasses apart', () => {
    expect(isInvalidCoordinateError(errors.invalid)).toBe(true)
    expect(isInvalidCoordinateError(errors.missing)).toBe(false)
    expect(isKeyNotFoundError(errors.missing)).toBe(true)
    expect(isKeyNotFoundError(errors.exhausted)).toBe(false)
    expect(isExpansionExhaustedError(errors.exhausted)).toBe(true)
    expect(isExpansionExhaustedError(errors.config)).toBe(false)
  })
})
