/**
 * Frontier Expansion Tests
 */

import { describe, it, expect } from 'vitest'
import { FrontierExpander, boundedRings } from '../../src/grid/frontier'
import { neighborCells } from '../../src/geo/geohash'
import { ExpansionExhaustedError, ValidationError } from '../../src/errors'
import type { FrontierStep } from '../../src/types/geo'
import { cellAt, createSquareEncoder } from '../factories'

function ringCells(step: FrontierStep): string[] {
  if (step.kind !== 'ring') {
    throw new Error(`expected a ring, got ${step.reason}`)
  }
  return [...step.cells].sort()
}

describe('FrontierExpander', () => {
  describe('on the geohash grid', () => {
    it('emits the origin alone as ring 0', () => {
      const expander = new FrontierExpander('t0dbr', neighborCells)
      expect(expander.step()).toEqual({ kind: 'ring', index: 0, cells: new Set(['t0dbr']) })
    })

    it('emits the 8 adjacent cells as ring 1', () => {
      const expander = new FrontierExpander('t0dbr', neighborCells)
      expander.step()

      expect(ringCells(expander.step())).toEqual(
        ['t0e08', 't0e00', 't0dbn', 't0e02', 't0dbq', 't0dbp', 't0dbw', 't0dbx'].sort()
      )
    })

    it('grows by 8 cells per ring', () => {
      const expander = new FrontierExpander('t0dbr', neighborCells)
      const sizes: number[] = []
      for (let i = 0; i < 5; i++) {
        const step = expander.step()
        if (step.kind === 'ring') sizes.push(step.cells.size)
      }
      expect(sizes).toEqual([1, 8, 16, 24, 32])
    })

    it('covers (2N-1)^2 cells after N rings', () => {
      const expander = new FrontierExpander('t0dbr', neighborCells)
      const covered: number[] = []
      for (let n = 1; n <= 5; n++) {
        expander.step()
        covered.push(expander.interiorSize)
      }
      expect(covered).toEqual([1, 9, 25, 49, 81])
    })

    it('never emits a cell twice', () => {
      const expander = new FrontierExpander('u09t', neighborCells)
      const seen = new Set<string>()
      let total = 0
      for (let i = 0; i < 6; i++) {
        const step = expander.step()
        if (step.kind !== 'ring') break
        for (const cell of step.cells) {
          seen.add(cell)
          total++
        }
      }
      expect(seen.size).toBe(total)
    })

    it('covers the whole precision-1 grid', () => {
      const expander = new FrontierExpander('u', neighborCells)
      let step = expander.step()
      while (step.kind === 'ring') {
        step = expander.step()
      }
      expect(step.reason).toBe('grid-covered')
      expect(expander.interiorSize).toBe(32)
    })
  })

  describe('on a bounded grid', () => {
    const encoder = createSquareEncoder({ minX: 0, maxX: 2, minY: 0, maxY: 2 })

    it('reports grid-covered once no unseen cell is left', () => {
      const expander = new FrontierExpander(cellAt(0, 0), c => encoder.neighbors(c))

      expect(ringCells(expander.step())).toEqual(['0,0'])
      expect(ringCells(expander.step())).toEqual(['0,1', '1,0', '1,1'])
      expect(ringCells(expander.step())).toEqual(['0,2', '1,2', '2,0', '2,1', '2,2'])
      expect(expander.step()).toEqual({ kind: 'exhausted', reason: 'grid-covered', rings: 3 })
    })
  })

  describe('ring limit', () => {
    it('stops after maxRings rings', () => {
      const encoder = createSquareEncoder()
      const expander = new FrontierExpander(cellAt(0, 0), c => encoder.neighbors(c), 3)

      expect(expander.step().kind).toBe('ring')
      expect(expander.step().kind).toBe('ring')
      expect(expander.step().kind).toBe('ring')
      expect(expander.step()).toEqual({ kind: 'exhausted', reason: 'ring-limit', rings: 3 })
      expect(expander.rings).toBe(3)
    })

    it('stays exhausted', () => {
      const expander = new FrontierExpander('t0dbr', neighborCells, 1)
      expander.step()

      const first = expander.step()
      expect(expander.step()).toBe(first)
      expect(expander.step()).toBe(first)
      expect(expander.interiorSize).toBe(1)
    })

    it.each([0, -1, 2.5, Number.NaN])('rejects maxRings %s', maxRings => {
      expect(() => new FrontierExpander('t0dbr', neighborCells, maxRings)).toThrow(ValidationError)
    })
  })
})

describe('boundedRings', () => {
  it('yields exactly the requested number of rings', () => {
    const rings = [...boundedRings('t0dbr', 3, neighborCells)]
    expect(rings.map(r => r.size)).toEqual([1, 8, 16])
  })

  it('ends early when the grid is covered', () => {
    const encoder = createSquareEncoder({ minX: 0, maxX: 2, minY: 0, maxY: 2 })
    const rings = [...boundedRings(cellAt(0, 0), 10, c => encoder.neighbors(c))]
    expect(rings.map(r => r.size)).toEqual([1, 3, 5])
  })

  it('throws when the ring limit is reached first', () => {
    const rings = boundedRings('t0dbr', 5, neighborCells, 3)

    expect(rings.next().done).toBe(false)
    expect(rings.next().done).toBe(false)
    expect(rings.next().done).toBe(false)
    expect(() => rings.next()).toThrow(ExpansionExhaustedError)
  })

  it('reports the origin and ring count on the error', () => {
    try {
      for (const _ring of boundedRings('t0dbr', 5, neighborCells, 2)) {
        // drain
      }
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ExpansionExhaustedError)
      if (error instanceof ExpansionExhaustedError) {
        expect(error.origin).toBe('t0dbr')
        expect(error.rings).toBe(2)
        expect(error.reason).toBe('ring-limit')
      }
    }
  })

  it.each([0, -2, 1.5])('rejects a ring count of %s', count => {
    expect(() => [...boundedRings('t0dbr', count, neighborCells)]).toThrow(ValidationError)
  })
})
