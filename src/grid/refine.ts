/**
 * Exact-distance refinement of grid candidates
 */

import type { DistanceFunction, GeoPoint, Neighbor } from '../types/geo'

export type PointLookup<K> = (key: K) => GeoPoint | undefined

/**
 * Keep the candidates within `radius` of `origin`, in candidate order.
 */
export function* withinRadius<K>(
  candidates: Iterable<K>,
  origin: GeoPoint,
  radius: number,
  pointOf: PointLookup<K>,
  distance: DistanceFunction
): Generator<Neighbor<K>, void, undefined> {
  for (const key of candidates) {
    const point = pointOf(key)
    if (!point) continue

    const d = distance(origin, point)
    if (d <= radius) {
      yield { distance: d, key }
    }
  }
}

/**
 * The `n` candidates nearest to `origin`, ascending. Ties keep candidate order.
 */
export function closestN<K>(
  candidates: Iterable<K>,
  origin: GeoPoint,
  n: number,
  pointOf: PointLookup<K>,
  distance: DistanceFunction
): Neighbor<K>[] {
  const scored = [...withinRadius(candidates, origin, Infinity, pointOf, distance)]
  scored.sort((a, b) => a.distance - b.distance)
  return scored.slice(0, n)
}
