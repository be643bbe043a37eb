import type { MapView, ParkingLot } from '../types/types'
import { planarArea, ringCentroid } from './polygon'

export const DEFAULT_ZOOM = 15

/**
 * Lays out parking lots for the Leaflet page. Labels default to 1..n and must
 * match the lots one to one.
 */
export const buildMapView = (
    lots: ParkingLot[],
    labels?: string[],
    zoom: number = DEFAULT_ZOOM
): MapView => {
    if (lots.length === 0) {
        throw new Error('Cannot build a map without polygons')
    }
    const polygonLabels = labels ?? lots.map((_lot, index) => String(index + 1))
    if (polygonLabels.length !== lots.length) {
        throw new Error('Length of labels must match number of polygons')
    }

    // combined centroid, weighted by each polygon's area in degrees
    let weight = 0
    let lonSum = 0
    let latSum = 0
    for (const lot of lots) {
        const area = planarArea(lot.coordinates)
        const [lon, lat] = ringCentroid(lot.coordinates)
        weight += area
        lonSum += lon * area
        latSum += lat * area
    }

    return {
        center: [latSum / weight, lonSum / weight],
        zoom,
        polygons: lots.map((lot, index) => ({
            latLngs: lot.polygon.coordinates[0].map(
                ([lon, lat]): [number, number] => [lat, lon]
            ),
            label: polygonLabels[index],
        })),
    }
}
