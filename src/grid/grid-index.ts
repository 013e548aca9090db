/**
 * GridIndex for GeoGrid
 *
 * Cell bucketing for point entities. Owns the two mappings:
 * - entries: key -> { cell, point } (latest write wins)
 * - buckets: cell -> keys, in insertion order
 *
 * Both are private and only change together through insert() and clear().
 */

import { toGeoPoint } from '../geo/coordinates'
import { KeyNotFoundError, type InvalidCoordinateError } from '../errors'
import { Err, Ok, isErr, type Result } from '../types/result'
import type { CellCode, CellEncoder, GeoPoint, GridEntry } from '../types/geo'

const EMPTY_BUCKET: readonly never[] = Object.freeze([])

export class GridIndex<K = string> {
  /** All entries by key */
  private readonly entries = new Map<K, GridEntry>()

  /** Cell buckets: cell -> keys (duplicates kept) */
  private readonly buckets = new Map<CellCode, K[]>()

  constructor(
    readonly precision: number,
    private readonly encoder: CellEncoder
  ) {}

  /**
   * Number of indexed keys
   */
  get size(): number {
    return this.entries.size
  }

  /**
   * Number of non-empty cells
   */
  get cellCount(): number {
    return this.buckets.size
  }

  /**
   * Cell of a point at this index's precision
   */
  computeCell(point: GeoPoint): CellCode {
    return this.encoder.encode(point, this.precision)
  }

  /**
   * Cells adjacent to `cell`, as given by the encoder
   */
  neighborsOf(cell: CellCode): CellCode[] {
    return this.encoder.neighbors(cell)
  }

  /**
   * Insert a point into the index
   *
   * The point is validated before anything is written. A key inserted again
   * overwrites its entry and is appended to the new cell's bucket; earlier
   * bucket appearances stay where they are.
   */
  insert(key: K, point: unknown): Result<GridEntry, InvalidCoordinateError> {
    const parsed = toGeoPoint(point)
    if (isErr(parsed)) {
      return parsed
    }

    const cell = this.computeCell(parsed.value)
    const entry: GridEntry = Object.freeze({ cell, point: parsed.value })

    this.entries.set(key, entry)

    const bucket = this.buckets.get(cell)
    if (bucket) {
      bucket.push(key)
    } else {
      this.buckets.set(cell, [key])
    }

    return Ok(entry)
  }

  /**
   * Check whether a key was indexed
   */
  has(key: K): boolean {
    return this.entries.has(key)
  }

  /**
   * Get the entry for a key
   */
  entryOf(key: K): Result<GridEntry, KeyNotFoundError> {
    const entry = this.entries.get(key)
    return entry ? Ok(entry) : Err(new KeyNotFoundError(key))
  }

  /**
   * Get the cell a key was filed under
   */
  cellOf(key: K): Result<CellCode, KeyNotFoundError> {
    const entry = this.entries.get(key)
    return entry ? Ok(entry.cell) : Err(new KeyNotFoundError(key))
  }

  /**
   * Get the point stored for a key
   */
  pointOf(key: K): Result<GeoPoint, KeyNotFoundError> {
    const entry = this.entries.get(key)
    return entry ? Ok(entry.point) : Err(new KeyNotFoundError(key))
  }

  /**
   * Keys filed under a cell, in insertion order
   */
  keysInCell(cell: CellCode): readonly K[] {
    return this.buckets.get(cell) ?? EMPTY_BUCKET
  }

  /**
   * Lazily concatenate the buckets of several cells
   */
  *keysInCells(cells: Iterable<CellCode>): Generator<K, void, undefined> {
    for (const cell of cells) {
      yield* this.keysInCell(cell)
    }
  }

  /**
   * Iterate over indexed keys
   */
  keys(): IterableIterator<K> {
    return this.entries.keys()
  }

  /**
   * Clear all entries
   */
  clear(): void {
    this.entries.clear()
    this.buckets.clear()
  }
}
