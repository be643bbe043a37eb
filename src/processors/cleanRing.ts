import type { Position } from 'geojson'
import type { LatLon } from '../services/overpass/types'
import type { Ring } from '../types/types'

export const MIN_RING_POINTS = 3

const samePosition = (a: Position, b: Position) => a[0] === b[0] && a[1] === b[1]

/**
 * Turns Overpass geometry into an open [lon, lat] ring: consecutive duplicates
 * are collapsed and a closing point equal to the first one is dropped.
 */
export const cleanRing = (points: LatLon[]): Ring => {
    const ring: Ring = []
    for (const { lat, lon } of points) {
        const position = [lon, lat]
        const previous = ring[ring.length - 1]
        if (!previous || !samePosition(previous, position)) {
            ring.push(position)
        }
    }

    if (ring.length > 2 && samePosition(ring[0], ring[ring.length - 1])) {
        ring.pop()
    }
    return ring
}

export const isPolygonRing = (ring: Ring) => ring.length >= MIN_RING_POINTS

export const closeRing = (ring: Ring): Ring =>
    ring.length > 0 ? [...ring, ring[0]] : []
