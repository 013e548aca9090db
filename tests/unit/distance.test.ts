import { describe, it, expect } from 'vitest'
import { haversineDistance } from '../../src/geo/distance'
import { CDG, LYS, ORY, ORY_CDG_KM } from '../factories'

describe('haversineDistance', () => {
  it('is zero for identical points', () => {
    expect(haversineDistance(ORY, ORY)).toBe(0)
  })

  it('measures kilometers', () => {
    expect(haversineDistance(ORY, CDG)).toBeCloseTo(ORY_CDG_KM, 6)
    expect(haversineDistance(ORY, LYS)).toBeCloseTo(378.0973, 3)
  })

  it('is symmetric', () => {
    expect(haversineDistance(CDG, ORY)).toBeCloseTo(haversineDistance(ORY, CDG), 12)
  })

  it('gives a quarter meridian from the equator to the pole', () => {
    expect(haversineDistance({ lat: 0, lng: 0 }, { lat: 90, lng: 0 })).toBeCloseTo(10007.5434, 3)
  })

  it('takes the short way across the antimeridian', () => {
    const d = haversineDistance({ lat: 0, lng: 179.5 }, { lat: 0, lng: -179.5 })
    expect(d).toBeCloseTo(111.1949, 3)
  })
})
