/**
 * Coordinate validation
 *
 * Every point entering the grid goes through toGeoPoint() first, so the
 * encoder only ever sees two finite, in-range numbers.
 */

import { InvalidCoordinateError } from '../errors'
import { Err, Ok, type Result } from '../types/result'
import type { GeoPoint } from '../types/geo'

/**
 * Normalize an object or `[lat, lng]` tuple into a frozen GeoPoint.
 *
 * Accepts `unknown` because callers outside TypeScript can pass anything.
 */
export function toGeoPoint(value: unknown): Result<GeoPoint, InvalidCoordinateError> {
  let lat: unknown
  let lng: unknown

  if (Array.isArray(value)) {
    if (value.length !== 2) {
      return Err(new InvalidCoordinateError(value, `expected [lat, lng], got ${value.length} values`))
    }
    lat = value[0]
    lng = value[1]
  } else if (typeof value === 'object' && value !== null && 'lat' in value && 'lng' in value) {
    lat = value.lat
    lng = value.lng
  } else {
    return Err(new InvalidCoordinateError(value, 'expected { lat, lng } or [lat, lng]'))
  }

  if (typeof lat !== 'number' || typeof lng !== 'number' || !Number.isFinite(lat) || !Number.isFinite(lng)) {
    return Err(new InvalidCoordinateError(value, 'latitude and longitude must be finite numbers'))
  }
  if (lat < -90 || lat > 90) {
    return Err(new InvalidCoordinateError(value, `latitude ${lat} is outside [-90, 90]`))
  }
  if (lng < -180 || lng > 180) {
    return Err(new InvalidCoordinateError(value, `longitude ${lng} is outside [-180, 180]`))
  }

  return Ok(Object.freeze({ lat, lng }))
}
