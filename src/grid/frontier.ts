/**
 * Frontier expansion
 *
 * Walks concentric rings of cells outwards from an origin:
 * - ring 0 is the origin alone
 * - ring i is every neighbor of ring i-1 that no earlier ring contained
 *
 * On a regular grid away from the poles ring i holds 8*i cells, so N rings
 * cover (2N-1)^2 cells.
 */

import { MAX_FRONTIER_RINGS } from '../constants'
import { ExpansionExhaustedError, ValidationError } from '../errors'
import type { CellCode, FrontierStep } from '../types/geo'

export type NeighborFunction = (cell: CellCode) => Iterable<CellCode>

/**
 * Ring-by-ring expansion state.
 *
 * Each call to step() returns the next ring, or an exhausted result once the
 * ring cap is reached or no unseen cell is reachable. Exhaustion is sticky.
 */
export class FrontierExpander {
  /** Every cell emitted so far */
  private readonly interior: Set<CellCode>

  /** Cells emitted by the latest step */
  private frontier: Set<CellCode>

  /** Index of the next ring to emit */
  private ringIndex = 0

  private exhausted: Extract<FrontierStep, { kind: 'exhausted' }> | undefined

  constructor(
    readonly origin: CellCode,
    private readonly neighbors: NeighborFunction,
    readonly maxRings: number = MAX_FRONTIER_RINGS
  ) {
    if (!Number.isInteger(maxRings) || maxRings < 1) {
      throw new ValidationError(`maxRings must be a positive integer, got ${maxRings}`, { maxRings })
    }
    this.frontier = new Set([origin])
    this.interior = new Set([origin])
  }

  /**
   * Number of rings emitted so far
   */
  get rings(): number {
    return this.ringIndex
  }

  /**
   * Number of distinct cells emitted so far
   */
  get interiorSize(): number {
    return this.interior.size
  }

  /**
   * Emit the next ring
   */
  step(): FrontierStep {
    if (this.exhausted) {
      return this.exhausted
    }

    if (this.ringIndex >= this.maxRings) {
      return this.exhaust('ring-limit')
    }

    if (this.ringIndex > 0) {
      const next = new Set<CellCode>()
      for (const cell of this.frontier) {
        for (const neighbor of this.neighbors(cell)) {
          if (!this.interior.has(neighbor)) {
            next.add(neighbor)
          }
        }
      }

      if (next.size === 0) {
        return this.exhaust('grid-covered')
      }

      for (const cell of next) {
        this.interior.add(cell)
      }
      this.frontier = next
    }

    const index = this.ringIndex
    this.ringIndex++
    return { kind: 'ring', index, cells: this.frontier }
  }

  private exhaust(reason: 'ring-limit' | 'grid-covered'): FrontierStep {
    this.exhausted = { kind: 'exhausted', reason, rings: this.ringIndex }
    return this.exhausted
  }
}

/**
 * Yield exactly `count` rings from `origin`.
 *
 * Ends early when the grid is covered, since every further ring would be
 * empty. Throws ExpansionExhaustedError if the ring cap is hit first.
 */
export function* boundedRings(
  origin: CellCode,
  count: number,
  neighbors: NeighborFunction,
  maxRings: number = MAX_FRONTIER_RINGS
): Generator<ReadonlySet<CellCode>, void, undefined> {
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`Ring count must be a positive integer, got ${count}`, { count })
  }

  const expander = new FrontierExpander(origin, neighbors, maxRings)

  for (let i = 0; i < count; i++) {
    const step = expander.step()
    if (step.kind === 'ring') {
      yield step.cells
      continue
    }
    if (step.reason === 'grid-covered') {
      return
    }
    throw new ExpansionExhaustedError(origin, step.rings, step.reason)
  }
}
