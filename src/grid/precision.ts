/**
 * Precision selection
 *
 * Maps a requested search radius to one of the eight supported geohash
 * lengths, using the per-length average cell error in kilometers.
 */

import { MAX_PRECISION, MIN_PRECISION } from '../constants'
import { ConfigurationError } from '../errors'

/**
 * One row of the precision table
 */
export interface PrecisionLevel {
  /** Geohash length */
  precision: number
  /** Bits spent on latitude */
  latBits: number
  /** Bits spent on longitude */
  lngBits: number
  /** Latitude error in degrees */
  latError: number
  /** Longitude error in degrees */
  lngError: number
  /** Average cell error in kilometers */
  kmError: number
}

/**
 * Geohash length → error bounds
 */
export const PRECISION_TABLE: readonly PrecisionLevel[] = Object.freeze([
  { precision: 1, latBits: 2, lngBits: 3, latError: 23, lngError: 23, kmError: 2500 },
  { precision: 2, latBits: 5, lngBits: 5, latError: 2.8, lngError: 5.6, kmError: 630 },
  { precision: 3, latBits: 7, lngBits: 8, latError: 0.7, lngError: 0.7, kmError: 78 },
  { precision: 4, latBits: 10, lngBits: 10, latError: 0.087, lngError: 0.18, kmError: 20 },
  { precision: 5, latBits: 12, lngBits: 13, latError: 0.022, lngError: 0.022, kmError: 2.4 },
  { precision: 6, latBits: 15, lngBits: 15, latError: 0.0027, lngError: 0.0055, kmError: 0.61 },
  { precision: 7, latBits: 17, lngBits: 18, latError: 0.00068, lngError: 0.00068, kmError: 0.076 },
  { precision: 8, latBits: 20, lngBits: 20, latError: 0.000085, lngError: 0.00017, kmError: 0.019 },
])

/**
 * Pick a precision for an average search radius.
 *
 * Minimizes `(kmError < radius, |radius - kmError|)`: the level whose error
 * is closest to the radius among those at least as large as it, and only
 * when every level is smaller than the radius, the closest overall. The first
 * minimum in table order wins.
 *
 * @param radius - Radius in kilometers
 */
export function selectPrecision(
  radius: number,
  table: readonly PrecisionLevel[] = PRECISION_TABLE
): PrecisionLevel {
  if (Number.isNaN(radius)) {
    throw new ConfigurationError('Radius must be a number', { configKey: 'radius', actualValue: radius })
  }

  let best: PrecisionLevel | undefined
  let bestBelow = 0
  let bestGap = 0

  for (const level of table) {
    const below = level.kmError < radius ? 1 : 0
    const gap = Math.abs(radius - level.kmError)
    if (best === undefined || below < bestBelow || (below === bestBelow && gap < bestGap)) {
      best = level
      bestBelow = below
      bestGap = gap
    }
  }

  if (best === undefined) {
    throw new ConfigurationError('Precision table is empty', { configKey: 'precisionTable' })
  }
  return best
}

/**
 * Look up the table row for an explicit precision.
 *
 * @throws ConfigurationError when `precision` is not an integer in 1-8
 */
export function precisionLevel(
  precision: number,
  table: readonly PrecisionLevel[] = PRECISION_TABLE
): PrecisionLevel {
  const level = Number.isInteger(precision) ? table.find(l => l.precision === precision) : undefined
  if (!level) {
    throw new ConfigurationError(
      `Precision must be an integer between ${MIN_PRECISION} and ${MAX_PRECISION}, got ${precision}`,
      { configKey: 'precision', expectedValue: `${MIN_PRECISION}-${MAX_PRECISION}`, actualValue: precision }
    )
  }
  return level
}
