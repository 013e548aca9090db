/**
 * Nearest search over a GridIndex
 *
 * Two strategies, both driven by ring expansion around the query cell:
 * - radius search walks a fixed number of rings derived from the radius
 * - top-N search keeps adding rings until enough keys were found
 *
 * Without refinement every result carries distance 0 and order follows
 * cell and bucket order; with refinement exact distances are computed.
 */

import { ExpansionExhaustedError, ValidationError } from '../errors'
import { toOption } from '../types/result'
import type { Logger } from '../utils/logger'
import type { CellCode, DistanceFunction, GeoPoint, Neighbor } from '../types/geo'
import type { GridIndex } from './grid-index'
import { FrontierExpander, boundedRings } from './frontier'
import { closestN, withinRadius, type PointLookup } from './refine'

/**
 * Number of rings that cover `radius` on a grid whose cells average
 * `averageCellError` kilometers. Deliberately generous: two rings when the
 * radius is exactly one cell, otherwise floor(radius / cell) + 2.
 */
export function ringCountForRadius(radius: number, averageCellError: number): number {
  if (!Number.isFinite(radius) || radius < 0) {
    throw new ValidationError(`Radius must be a finite, non-negative number, got ${radius}`, { radius })
  }
  if (radius === averageCellError) {
    return 2
  }
  return Math.floor(radius / averageCellError) + 2
}

export interface NearestSearchOptions {
  averageCellError: number
  maxRings: number
  distance: DistanceFunction
  logger: Logger
}

export class NearestSearch<K> {
  private readonly pointOf: PointLookup<K>

  constructor(
    private readonly index: GridIndex<K>,
    private readonly options: NearestSearchOptions
  ) {
    this.pointOf = key => toOption(index.pointOf(key))
  }

  /**
   * Keys found in the first `rings` rings around `cell`, ring by ring
   */
  *keysAround(cell: CellCode, rings: number): Generator<K, void, undefined> {
    for (const ring of boundedRings(cell, rings, c => this.index.neighborsOf(c), this.options.maxRings)) {
      yield* this.index.keysInCells(ring)
    }
  }

  /**
   * Radius search around a cell.
   *
   * @param origin - Exact query point, used for refinement
   */
  nearCell(
    cell: CellCode,
    origin: GeoPoint,
    radius: number,
    doubleCheck: boolean
  ): IterableIterator<Neighbor<K>> {
    const rings = ringCountForRadius(radius, this.options.averageCellError)
    const candidates = this.keysAround(cell, rings)

    if (doubleCheck) {
      return withinRadius(candidates, origin, radius, this.pointOf, this.options.distance)
    }
    return placeholders(candidates)
  }

  /**
   * Top-N search.
   *
   * Rings are added until at least `n` keys were found and the last ring
   * held more than one cell. That stop rule is a heuristic: keys just past
   * the last ring may be closer than some of those found.
   *
   * @param n - Number of keys wanted; negative counts are treated as 0
   * @param fromKeys - Only consider these keys
   * @throws ValidationError when `n` is not an integer
   * @throws ExpansionExhaustedError when expansion stops before the rule is met
   */
  closest(
    origin: GeoPoint,
    n: number,
    doubleCheck: boolean,
    fromKeys?: ReadonlySet<K>
  ): IterableIterator<Neighbor<K>> {
    if (!Number.isInteger(n)) {
      throw new ValidationError(`Result count must be an integer, got ${n}`, { n })
    }
    if (fromKeys && fromKeys.size === 0) {
      return new Array<Neighbor<K>>().values()
    }

    const wanted = Math.max(0, Math.min(n, this.index.size))
    const originCell = this.index.computeCell(origin)
    const expander = new FrontierExpander(originCell, c => this.index.neighborsOf(c), this.options.maxRings)

    const found = new Set<K>()

    for (;;) {
      const step = expander.step()

      if (step.kind === 'exhausted') {
        this.options.logger.warn(
          `Ring expansion exhausted (${step.reason}) after ${step.rings} rings from ${originCell}`,
          { wanted, found: found.size }
        )
        throw new ExpansionExhaustedError(originCell, step.rings, step.reason)
      }

      for (const key of this.index.keysInCells(step.cells)) {
        if (!fromKeys || fromKeys.has(key)) {
          found.add(key)
        }
      }

      if (found.size >= wanted && step.cells.size > 1) {
        break
      }
    }

    if (doubleCheck) {
      return closestN(found, origin, wanted, this.pointOf, this.options.distance).values()
    }
    return placeholders(found)
  }
}

function* placeholders<K>(candidates: Iterable<K>): Generator<Neighbor<K>, void, undefined> {
  for (const key of candidates) {
    yield { distance: 0, key }
  }
}
