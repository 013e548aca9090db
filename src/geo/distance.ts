/**
 * Distance Functions for GeoGrid
 *
 * Haversine great-circle distance, used as the default DistanceFunction.
 * Kilometers, to match the precision table.
 */

import { EARTH_RADIUS_KM } from '../constants'
import type { GeoPoint } from '../types/geo'

const toRadians = (deg: number) => deg * (Math.PI / 180)

/**
 * Haversine distance between two points on Earth
 *
 * Accurate for most distances, slight error for antipodal points.
 *
 * @returns Distance in kilometers
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.lat - a.lat)
  const dLng = toRadians(b.lng - a.lng)
  const lat1Rad = toRadians(a.lat)
  const lat2Rad = toRadians(b.lat)

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1Rad) * Math.cos(lat2Rad) * Math.sin(dLng / 2) * Math.sin(dLng / 2)

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))

  return EARTH_RADIUS_KM * c
}
