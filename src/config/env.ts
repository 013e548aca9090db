/**
 * Grid configuration
 *
 * Resolves GeoGridOptions into a fully populated configuration, and reads
 * options from environment variables for deployments that configure the
 * grid outside code:
 *
 * - GEOGRID_PRECISION: geohash length (1-8)
 * - GEOGRID_RADIUS: average search radius in kilometers (wins over precision)
 * - GEOGRID_VERBOSE: 'true' / 'false' (also '1' / '0')
 * - GEOGRID_MAX_RINGS: ring cap for unbounded searches
 */

import { DEFAULT_PRECISION, MAX_FRONTIER_RINGS } from '../constants'
import { ConfigurationError } from '../errors'
import { geohashEncoder } from '../geo/geohash'
import { haversineDistance } from '../geo/distance'
import { PRECISION_TABLE, precisionLevel, selectPrecision, type PrecisionLevel } from '../grid/precision'
import { getLogger, type Logger } from '../utils/logger'
import type { CellEncoder, DistanceFunction } from '../types/geo'

/**
 * Options accepted by the GeoGrid constructor
 */
export interface GeoGridOptions {
  /** Geohash length, 1-8 (default: 5). Ignored when `radius` is set. */
  precision?: number | undefined
  /** Average search radius in kilometers; picks the precision */
  radius?: number | undefined
  /** Log the chosen precision and skipped inserts (default: true) */
  verbose?: boolean | undefined
  /** Ring cap for expansions (default: 5000) */
  maxRings?: number | undefined
  /** Cell encoder (default: geohash) */
  encoder?: CellEncoder | undefined
  /** Distance used for refinement (default: haversine, kilometers) */
  distance?: DistanceFunction | undefined
  /** Logger (default: the global logger) */
  logger?: Logger | undefined
}

/**
 * Fully resolved grid configuration
 */
export interface GridConfig {
  level: PrecisionLevel
  verbose: boolean
  maxRings: number
  encoder: CellEncoder
  distance: DistanceFunction
  logger: Logger
}

/**
 * Validate options and fill in defaults
 */
export function resolveGridConfig(options: GeoGridOptions = {}): GridConfig {
  const level = options.radius !== undefined
    ? selectPrecision(options.radius, PRECISION_TABLE)
    : precisionLevel(options.precision ?? DEFAULT_PRECISION, PRECISION_TABLE)

  const maxRings = options.maxRings ?? MAX_FRONTIER_RINGS
  if (!Number.isInteger(maxRings) || maxRings < 1) {
    throw new ConfigurationError(`maxRings must be a positive integer, got ${maxRings}`, {
      configKey: 'maxRings',
      actualValue: maxRings,
    })
  }

  return {
    level,
    verbose: options.verbose ?? true,
    maxRings,
    encoder: options.encoder ?? geohashEncoder,
    distance: options.distance ?? haversineDistance,
    logger: options.logger ?? getLogger(),
  }
}

/**
 * Read grid options from environment variables. Unset variables are left
 * undefined so that constructor defaults apply.
 */
export function gridOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): GeoGridOptions {
  return {
    precision: parseNumber(env, 'GEOGRID_PRECISION'),
    radius: parseNumber(env, 'GEOGRID_RADIUS'),
    verbose: parseBoolean(env, 'GEOGRID_VERBOSE'),
    maxRings: parseNumber(env, 'GEOGRID_MAX_RINGS'),
  }
}

function parseNumber(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name]?.trim()
  if (raw === undefined || raw === '') return undefined

  const value = Number(raw)
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, { configKey: name, actualValue: raw })
  }
  return value
}

function parseBoolean(env: Record<string, string | undefined>, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return undefined

  if (raw === 'true' || raw === '1') return true
  if (raw === 'false' || raw === '0') return false
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, {
    configKey: name,
    expectedValue: 'true | false',
    actualValue: raw,
  })
}
