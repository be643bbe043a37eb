import type { Position } from 'geojson'
import type { Ring } from '../types/types'

// Twice the signed shoelace area; positive for counter-clockwise rings.
const doubleSignedArea = (ring: Ring) => {
    let sum = 0
    for (let i = 0; i < ring.length; i++) {
        const [x1, y1] = ring[i]
        const [x2, y2] = ring[(i + 1) % ring.length]
        sum += x1 * y2 - x2 * y1
    }
    return sum
}

export const planarArea = (ring: Ring) => Math.abs(doubleSignedArea(ring)) / 2

/** Area-weighted centroid of an open ring. */
export const ringCentroid = (ring: Ring): Position => {
    const doubled = doubleSignedArea(ring)
    if (doubled === 0) {
        const n = ring.length
        return [
            ring.reduce((sum, [x]) => sum + x, 0) / n,
            ring.reduce((sum, [, y]) => sum + y, 0) / n,
        ]
    }
    let cx = 0
    let cy = 0
    for (let i = 0; i < ring.length; i++) {
        const [x1, y1] = ring[i]
        const [x2, y2] = ring[(i + 1) % ring.length]
        const cross = x1 * y2 - x2 * y1
        cx += (x1 + x2) * cross
        cy += (y1 + y2) * cross
    }
    return [cx / (3 * doubled), cy / (3 * doubled)]
}

const orientation = (p: Position, q: Position, r: Position) => {
    const value = (q[1] - p[1]) * (r[0] - q[0]) - (q[0] - p[0]) * (r[1] - q[1])
    if (value === 0) return 0
    return value > 0 ? 1 : 2
}

// q lies on segment pr, given the three are collinear
const onSegment = (p: Position, q: Position, r: Position) =>
    q[0] <= Math.max(p[0], r[0]) &&
    q[0] >= Math.min(p[0], r[0]) &&
    q[1] <= Math.max(p[1], r[1]) &&
    q[1] >= Math.min(p[1], r[1])

const foldsBack = (a: Position, b: Position, c: Position) =>
    (b[0] - a[0]) * (c[0] - b[0]) + (b[1] - a[1]) * (c[1] - b[1]) < 0

const segmentsIntersect = (
    p1: Position,
    q1: Position,
    p2: Position,
    q2: Position
) => {
    const o1 = orientation(p1, q1, p2)
    const o2 = orientation(p1, q1, q2)
    const o3 = orientation(p2, q2, p1)
    const o4 = orientation(p2, q2, q1)

    if (o1 !== o2 && o3 !== o4) return true
    if (o1 === 0 && onSegment(p1, p2, q1)) return true
    if (o2 === 0 && onSegment(p1, q2, q1)) return true
    if (o3 === 0 && onSegment(p2, p1, q2)) return true
    if (o4 === 0 && onSegment(p2, q1, q2)) return true
    return false
}

/**
 * A ring is valid when it bounds a simple polygon: finite coordinates, no
 * edges touching except neighbours at their shared vertex, no edge folding
 * back onto the previous one, and a non-zero area.
 */
export const isValidRing = (ring: Ring) => {
    const n = ring.length
    if (n < 3) return false
    if (!ring.every(([x, y]) => Number.isFinite(x) && Number.isFinite(y))) {
        return false
    }

    for (let i = 0; i < n; i++) {
        const a = ring[i]
        const b = ring[(i + 1) % n]
        const c = ring[(i + 2) % n]
        // spike: the next edge turns straight back along this one
        if (orientation(a, b, c) === 0 && foldsBack(a, b, c)) {
            return false
        }
        for (let j = i + 2; j < n; j++) {
            if (i === 0 && j === n - 1) continue
            if (segmentsIntersect(a, b, ring[j], ring[(j + 1) % n])) {
                return false
            }
        }
    }

    return planarArea(ring) > 0
}
