/**
 * geogrid
 *
 * Geohash grid index for keyed points with ring-expansion proximity search.
 *
 * @packageDocumentation
 */

// Main entry point
export { GeoGrid } from './grid/geo-grid'
export type { ClosestOptions, GridStats } from './grid/geo-grid'

// Building blocks
export { GridIndex } from './grid/grid-index'
export { FrontierExpander, boundedRings } from './grid/frontier'
export type { NeighborFunction } from './grid/frontier'
export { NearestSearch, ringCountForRadius } from './grid/nearest'
export type { NearestSearchOptions } from './grid/nearest'
export { withinRadius, closestN } from './grid/refine'
export type { PointLookup } from './grid/refine'
export { PRECISION_TABLE, selectPrecision, precisionLevel } from './grid/precision'
export type { PrecisionLevel } from './grid/precision'

// Geo primitives
export { encodeGeohash, getNeighbor, getNeighbors, neighborCells, geohashEncoder } from './geo/geohash'
export { haversineDistance } from './geo/distance'
export { toGeoPoint } from './geo/coordinates'

// Types
export type {
  GeoPoint,
  PointInput,
  CellCode,
  Neighbor,
  GridEntry,
  CellEncoder,
  DistanceFunction,
  ExhaustionReason,
  FrontierStep,
} from './types/geo'
export { Ok, Err, isOk, isErr, unwrap, unwrapOr, toOption } from './types/result'
export type { Result } from './types/result'

// Configuration
export { resolveGridConfig, gridOptionsFromEnv } from './config/env'
export type { GeoGridOptions, GridConfig } from './config/env'
export {
  DEFAULT_PRECISION,
  DEFAULT_SEARCH_RADIUS_KM,
  MAX_FRONTIER_RINGS,
  EARTH_RADIUS_KM,
  MIN_PRECISION,
  MAX_PRECISION,
} from './constants'

// Errors
export {
  ErrorCode,
  GeoGridError,
  ValidationError,
  InvalidCoordinateError,
  KeyNotFoundError,
  ExpansionExhaustedError,
  ConfigurationError,
  isGeoGridError,
  isInvalidCoordinateError,
  isKeyNotFoundError,
  isExpansionExhaustedError,
} from './errors'
export type { SerializedError } from './errors'

// Logging
export { consoleLogger, noopLogger, setLogger, getLogger } from './utils/logger'
export type { Logger } from './utils/logger'
