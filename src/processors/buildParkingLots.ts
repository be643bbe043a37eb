import _ from 'lodash'
import type { OverpassElement } from '../services/overpass/types'
import type { ParkingLot } from '../types/types'
import { errorMessage } from '../utils/errors'
import { log } from '../utils/logger'
import { cleanRing, closeRing, isPolygonRing } from './cleanRing'
import { isValidRing, planarArea, ringCentroid } from './polygon'
import { getUtmEpsg, projectRingToUtm } from './utm'

export const buildParkingLot = (element: OverpassElement): ParkingLot | null => {
    if (element.type === 'node' || !element.geometry) {
        return null
    }

    const coordinates = cleanRing(element.geometry)
    if (!isPolygonRing(coordinates)) {
        log.debug(`Skipping ${element.type} ${element.id}: not a polygon`)
        return null
    }
    if (!isValidRing(coordinates)) {
        log.debug(`Skipping ${element.type} ${element.id}: invalid polygon`)
        return null
    }

    let area: number
    let epsg: number
    try {
        const [lon, lat] = ringCentroid(coordinates)
        epsg = getUtmEpsg(lon, lat)
        area = planarArea(projectRingToUtm(coordinates, epsg))
    } catch (e) {
        log.error(
            `Failed to compute area for element ${element.id}: ${errorMessage(e)}`
        )
        return null
    }

    return {
        id: element.id,
        type: element.type,
        coordinates,
        polygon: {
            type: 'Polygon',
            coordinates: [closeRing(coordinates)],
        },
        areaM2: _.round(area, 2),
        epsg,
        tags: element.tags,
    }
}

export const buildParkingLots = (elements: OverpassElement[]): ParkingLot[] =>
    elements
        .map(buildParkingLot)
        .filter((lot): lot is ParkingLot => lot !== null)

export const getTotalArea = (lots: ParkingLot[]) => _.sumBy(lots, 'areaM2')
