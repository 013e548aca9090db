/**
 * Geohash Encoding for GeoGrid
 *
 * Standard geohash implementation used as the default CellEncoder.
 * Geohashes divide the Earth into a hierarchical grid using base32 encoding.
 */

import { InvalidCoordinateError, ValidationError } from '../errors'
import type { CellCode, CellEncoder, GeoPoint } from '../types/geo'

// Base32 character set for geohash (lowercase)
const BASE32 = '0123456789bcdefghjkmnpqrstuvwxyz'

type Direction = 'n' | 's' | 'e' | 'w'
type Parity = 'even' | 'odd'

// Neighbor lookup: the character at index i of the table replaces BASE32[i]
// when stepping in that direction. Parity is that of the hash length.
const NEIGHBORS: Record<Direction, Record<Parity, string>> = {
  n: { even: 'p0r21436x8zb9dcf5h7kjnmqesgutwvy', odd: 'bc01fg45238967deuvhjyznpkmstqrwx' },
  s: { even: '14365h7k9dcfesgujnmqp0r2twvyx8zb', odd: '238967debc01fg45kmstqrwxuvhjyznp' },
  e: { even: 'bc01fg45238967deuvhjyznpkmstqrwx', odd: 'p0r21436x8zb9dcf5h7kjnmqesgutwvy' },
  w: { even: '238967debc01fg45kmstqrwxuvhjyznp', odd: '14365h7k9dcfesgujnmqp0r2twvyx8zb' },
}

// Characters on the edge of their parent cell in each direction
const BORDERS: Record<Direction, Record<Parity, string>> = {
  n: { even: 'prxz', odd: 'bcfguvyz' },
  s: { even: '028b', odd: '0145hjnp' },
  e: { even: 'bcfguvyz', odd: 'prxz' },
  w: { even: '0145hjnp', odd: '028b' },
}

/**
 * Encode latitude/longitude to geohash
 *
 * @param lat - Latitude (-90 to 90)
 * @param lng - Longitude (-180 to 180)
 * @param precision - Number of characters
 * @throws InvalidCoordinateError for non-finite or out-of-range coordinates
 */
export function encodeGeohash(lat: number, lng: number, precision: number): string {
  if (!Number.isFinite(lat) || !Number.isFinite(lng) || Math.abs(lat) > 90 || Math.abs(lng) > 180) {
    throw new InvalidCoordinateError({ lat, lng }, 'latitude must be within [-90, 90] and longitude within [-180, 180]')
  }
  if (!Number.isInteger(precision) || precision < 1) {
    throw new ValidationError(`Geohash precision must be a positive integer, got ${precision}`, { precision })
  }

  let minLat = -90
  let maxLat = 90
  let minLng = -180
  let maxLng = 180

  let hash = ''
  let bit = 0
  let ch = 0
  let isLng = true // Start with longitude

  while (hash.length < precision) {
    if (isLng) {
      const mid = (minLng + maxLng) / 2
      if (lng >= mid) {
        ch |= 1 << (4 - bit)
        minLng = mid
      } else {
        maxLng = mid
      }
    } else {
      const mid = (minLat + maxLat) / 2
      if (lat >= mid) {
        ch |= 1 << (4 - bit)
        minLat = mid
      } else {
        maxLat = mid
      }
    }

    isLng = !isLng
    bit++

    if (bit === 5) {
      hash += BASE32.charAt(ch)
      bit = 0
      ch = 0
    }
  }

  return hash
}

/**
 * Get adjacent geohash in a direction
 *
 * East and west wrap around the antimeridian. North of the northernmost row
 * and south of the southernmost row there is nothing, and '' is returned.
 */
export function getNeighbor(hash: string, direction: Direction): string {
  if (hash.length === 0) {
    return ''
  }

  hash = hash.toLowerCase()
  const lastChar = hash.charAt(hash.length - 1)
  const type: Parity = hash.length % 2 === 0 ? 'even' : 'odd'
  let parent = hash.slice(0, -1)

  if (BORDERS[direction][type].includes(lastChar)) {
    if (parent === '') {
      // Top-level cell on the edge of the world
      if (direction === 'n' || direction === 's') return ''
    } else {
      parent = getNeighbor(parent, direction)
      if (parent === '') {
        return ''
      }
    }
  }

  const idx = NEIGHBORS[direction][type].indexOf(lastChar)
  if (idx === -1) {
    throw new ValidationError(`Invalid geohash character: ${lastChar}`, { hash })
  }

  return parent + BASE32.charAt(idx)
}

/**
 * Get all 8 neighbors of a geohash cell
 *
 * @returns Object with neighbors in all 8 directions ('' past a pole)
 */
export function getNeighbors(hash: string): {
  n: string
  ne: string
  e: string
  se: string
  s: string
  sw: string
  w: string
  nw: string
} {
  const n = getNeighbor(hash, 'n')
  const s = getNeighbor(hash, 's')
  const e = getNeighbor(hash, 'e')
  const w = getNeighbor(hash, 'w')

  return {
    n,
    ne: n ? getNeighbor(n, 'e') : '',
    e,
    se: s ? getNeighbor(s, 'e') : '',
    s,
    sw: s ? getNeighbor(s, 'w') : '',
    w,
    nw: n ? getNeighbor(n, 'w') : '',
  }
}

/**
 * Adjacent cells as a list: up to 8, without blanks or repeats
 */
export function neighborCells(hash: string): CellCode[] {
  const cells = new Set<string>()
  for (const cell of Object.values(getNeighbors(hash))) {
    if (cell && cell !== hash) {
      cells.add(cell)
    }
  }
  return [...cells]
}

/**
 * Default CellEncoder backed by geohashes
 */
export const geohashEncoder: CellEncoder = {
  encode(point: GeoPoint, precision: number): CellCode {
    return encodeGeohash(point.lat, point.lng, precision)
  },
  neighbors: neighborCells,
}
