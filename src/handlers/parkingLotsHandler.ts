import type { Request } from 'express'
import type { Logger } from 'pino'
import { getTotalArea } from '../processors/buildParkingLots'
import type { Tags } from '../services/overpass/types'
import { NotFoundError } from '../utils/errors'
import { findParkingLots } from './findParkingLots'
import {
    readFlag,
    readOptionalString,
    readRadius,
    readRequiredString,
} from './params'

export type ParkingLotsResponse = {
    station_name: string
    total_area_m2: number
    parking_lots: {
        id: number
        type: string
        area_m2: number
        tags: Tags
    }[]
}

export const parkingLotsHandler = async (
    request: Request,
    log: Logger
): Promise<ParkingLotsResponse> => {
    const stationName = readRequiredString(request.body, 'station_name')
    const result = await findParkingLots(
        {
            stationName,
            city: readOptionalString(request.body, 'city'),
            radius: readRadius(request.body),
            surface: readFlag(request.body, 'surface'),
        },
        log
    )

    if (result.status === 'stationNotFound') {
        throw new NotFoundError(
            `Could not find location for station: ${stationName}`
        )
    }

    const totalArea = getTotalArea(result.lots)
    log.info(`Total area of parking lots near ${stationName}: ${totalArea} m²`)
    if (result.lots.length === 0) {
        throw new NotFoundError(`No parking lots found near ${stationName}`)
    }

    return {
        station_name: stationName,
        total_area_m2: totalArea,
        parking_lots: result.lots.map((lot) => ({
            id: lot.id,
            type: lot.type,
            area_m2: lot.areaM2,
            tags: lot.tags,
        })),
    }
}
