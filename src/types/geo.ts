/**
 * Geo Types for GeoGrid
 *
 * Points, cells and the collaborator contracts the grid consumes.
 */

// =============================================================================
// Points and Cells
// =============================================================================

/**
 * A validated coordinate pair in degrees
 */
export interface GeoPoint {
  readonly lat: number
  readonly lng: number
}

/**
 * Accepted point inputs: an object or a `[lat, lng]` tuple
 */
export type PointInput = GeoPoint | readonly [lat: number, lng: number]

/**
 * Fixed-length cell code at the grid precision (a geohash by default)
 */
export type CellCode = string

/**
 * One query result. `distance` is 0 unless exact refinement was requested.
 */
export interface Neighbor<K> {
  distance: number
  key: K
}

/**
 * Primary entry stored for each key
 */
export interface GridEntry {
  /** Cell the point falls into */
  readonly cell: CellCode
  /** Stored point */
  readonly point: GeoPoint
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Cell encoding and adjacency
 */
export interface CellEncoder {
  /** Encode a validated point into a cell code of length `precision` */
  encode(point: GeoPoint, precision: number): CellCode
  /** Up to 8 adjacent cells (cardinal and diagonal) at the same precision */
  neighbors(cell: CellCode): CellCode[]
}

/**
 * Great-circle distance, in the unit of the precision table (kilometers)
 */
export type DistanceFunction = (a: GeoPoint, b: GeoPoint) => number

// =============================================================================
// Expansion
// =============================================================================

/**
 * Why an expansion cannot produce another ring
 */
export type ExhaustionReason = 'ring-limit' | 'grid-covered'

/**
 * Outcome of a single expansion step
 */
export type FrontierStep =
  | { kind: 'ring'; index: number; cells: ReadonlySet<CellCode> }
  | { kind: 'exhausted'; reason: ExhaustionReason; rings: number }
