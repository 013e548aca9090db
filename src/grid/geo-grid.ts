/**
 * GeoGrid
 *
 * Geographical index of keyed points on a geohash grid, answering
 * "who is near this point", "who is near this key" and "which N keys are
 * closest to this point".
 *
 * Searches are approximate by default: they return every key filed in the
 * rings of cells around the query, with distance 0. Pass `doubleCheck` to
 * compute exact distances.
 *
 * The grid is built with insert() and then queried; mutating it while a
 * query's results are being consumed is not supported.
 *
 * @example
 * ```typescript
 * const grid = new GeoGrid({ radius: 20 })
 * grid.insert('ORY', [48.72, 2.359])
 * grid.insert('CDG', [48.75, 2.361])
 *
 * [...grid.findNearKey('ORY', 20, true)]
 * // [{ distance: 0, key: 'ORY' }, { distance: 3.33..., key: 'CDG' }]
 * ```
 */

import { DEFAULT_SEARCH_RADIUS_KM } from '../constants'
import { resolveGridConfig, type GeoGridOptions, type GridConfig } from '../config/env'
import { toGeoPoint } from '../geo/coordinates'
import { isErr, isOk, unwrap, type Result } from '../types/result'
import type { KeyNotFoundError } from '../errors'
import type { CellCode, GeoPoint, Neighbor, PointInput } from '../types/geo'
import type { Logger } from '../utils/logger'
import { GridIndex } from './grid-index'
import { NearestSearch } from './nearest'
import type { PrecisionLevel } from './precision'

/**
 * Options for findClosestFromPoint()
 */
export interface ClosestOptions<K> {
  /** Compute exact distances, sort and keep the first N (default: false) */
  doubleCheck?: boolean | undefined
  /** Only consider these keys */
  fromKeys?: Iterable<K> | undefined
}

/**
 * Grid statistics
 */
export interface GridStats {
  /** Number of indexed keys */
  entryCount: number
  /** Number of non-empty cells */
  cellCount: number
  /** Geohash length */
  precision: number
  /** Average cell error in kilometers */
  averageCellError: number
}

const NO_RESULTS: readonly never[] = Object.freeze([])

export class GeoGrid<K = string> {
  /** Geohash length, fixed for the lifetime of the grid */
  readonly precision: number

  /** Average cell error in kilometers for the chosen precision */
  readonly averageCellError: number

  /** Precision table row the grid was built with */
  readonly level: PrecisionLevel

  private readonly config: GridConfig
  private readonly index: GridIndex<K>
  private readonly search: NearestSearch<K>

  constructor(options: GeoGridOptions = {}) {
    this.config = resolveGridConfig(options)
    this.level = this.config.level
    this.precision = this.level.precision
    this.averageCellError = this.level.kmError

    this.index = new GridIndex<K>(this.precision, this.config.encoder)
    this.search = new NearestSearch<K>(this.index, {
      averageCellError: this.averageCellError,
      maxRings: this.config.maxRings,
      distance: this.config.distance,
      logger: this.config.logger,
    })

    if (this.config.verbose) {
      this.logger.info(`Setting grid precision to ${this.precision}, avg radius to ${this.averageCellError}km`)
    }
  }

  private get logger(): Logger {
    return this.config.logger
  }

  /**
   * Number of indexed keys
   */
  get size(): number {
    return this.index.size
  }

  // ===========================================================================
  // Building
  // ===========================================================================

  /**
   * Add a point to the grid.
   *
   * Invalid coordinates are skipped (and logged when verbose); the grid is
   * left untouched.
   *
   * @param verbose - Overrides the grid's `verbose` option for this call
   * @returns Whether the point was stored
   */
  insert(key: K, point: PointInput | null | undefined, verbose?: boolean): boolean {
    const result = this.index.insert(key, point)
    if (isErr(result)) {
      if (verbose ?? this.config.verbose) {
        this.logger.warn(`Wrong coordinates for key ${String(key)}, skipping point: ${result.error.message}`)
      }
      return false
    }
    return true
  }

  /**
   * Remove every entry
   */
  clear(): void {
    this.index.clear()
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  has(key: K): boolean {
    return this.index.has(key)
  }

  cellOf(key: K): Result<CellCode, KeyNotFoundError> {
    return this.index.cellOf(key)
  }

  pointOf(key: K): Result<GeoPoint, KeyNotFoundError> {
    return this.index.pointOf(key)
  }

  /**
   * Cell of a point at the grid precision
   *
   * @throws InvalidCoordinateError
   */
  computeCell(point: PointInput): CellCode {
    return this.index.computeCell(this.parsePoint(point))
  }

  getStats(): GridStats {
    return {
      entryCount: this.index.size,
      cellCount: this.index.cellCount,
      precision: this.precision,
      averageCellError: this.averageCellError,
    }
  }

  // ===========================================================================
  // Searches
  // ===========================================================================

  /**
   * Keys filed in the first `rings` rings around `cell`, ring by ring.
   * Ring 0 is the cell itself.
   */
  findInAdjacentCells(cell: CellCode, rings: number = 1): IterableIterator<K> {
    return this.search.keysAround(cell, rings)
  }

  /**
   * Find keys near a point.
   *
   * A missing point (null or undefined) yields nothing.
   *
   * @param radius - Kilometers
   * @param doubleCheck - Compute exact distances and drop keys beyond `radius`
   * @throws InvalidCoordinateError for a malformed point
   */
  findNearPoint(
    point: PointInput | null | undefined,
    radius: number = DEFAULT_SEARCH_RADIUS_KM,
    doubleCheck: boolean = false
  ): IterableIterator<Neighbor<K>> {
    if (point == null) {
      return NO_RESULTS.values()
    }
    const origin = this.parsePoint(point)
    return this.search.nearCell(this.index.computeCell(origin), origin, radius, doubleCheck)
  }

  /**
   * Find keys near another key. The key itself is part of the results.
   *
   * A key that was never indexed yields nothing.
   *
   * @param radius - Kilometers
   * @param doubleCheck - Compute exact distances and drop keys beyond `radius`
   */
  findNearKey(
    key: K,
    radius: number = DEFAULT_SEARCH_RADIUS_KM,
    doubleCheck: boolean = false
  ): IterableIterator<Neighbor<K>> {
    const entry = this.index.entryOf(key)
    if (!isOk(entry)) {
      return NO_RESULTS.values()
    }
    return this.search.nearCell(entry.value.cell, entry.value.point, radius, doubleCheck)
  }

  /**
   * Find the `n` keys closest to a point.
   *
   * Without `doubleCheck` every key gathered by the ring search is returned
   * with distance 0, unordered, and there may be more than `n` of them.
   * With it, the first `n` by exact distance are returned, ascending.
   *
   * @throws ValidationError when `n` is not an integer
   * @throws ExpansionExhaustedError when `n` keys cannot be reached
   * @throws InvalidCoordinateError for a malformed point
   */
  findClosestFromPoint(
    point: PointInput | null | undefined,
    n: number = 1,
    options: ClosestOptions<K> = {}
  ): IterableIterator<Neighbor<K>> {
    const fromKeys = options.fromKeys === undefined ? undefined : new Set(options.fromKeys)
    if (point == null || fromKeys?.size === 0) {
      return NO_RESULTS.values()
    }
    return this.search.closest(this.parsePoint(point), n, options.doubleCheck ?? false, fromKeys)
  }

  private parsePoint(point: PointInput): GeoPoint {
    return unwrap(toGeoPoint(point))
  }
}
