import type { Logger } from 'pino'
import { buildParkingLots } from '../processors/buildParkingLots'
import { getParkingLotElements } from '../services/overpass/getParkingLotElements'
import { getStationLocation } from '../services/overpass/getStationLocation'
import type { ParkingLot, Station } from '../types/types'

export type ParkingLotSearch = {
    stationName: string
    city?: string
    radius: number
    surface: boolean
}

export type ParkingLotSearchResult =
    | { status: 'stationNotFound' }
    | { status: 'found'; station: Station; lots: ParkingLot[] }

/** Locates the station (first match wins) and measures the lots around it. */
export const findParkingLots = async (
    { stationName, city, radius, surface }: ParkingLotSearch,
    log: Logger
): Promise<ParkingLotSearchResult> => {
    const stations = await getStationLocation(stationName, city)
    if (stations.length === 0) {
        return { status: 'stationNotFound' }
    }

    const station = stations[0]
    log.info(`Using coordinates for ${stationName}: (${station.lat}, ${station.lon})`)

    const elements = await getParkingLotElements(
        station.lat,
        station.lon,
        radius,
        surface
    )
    const lots = buildParkingLots(elements)
    log.info(
        `Built ${lots.length} parking lot polygons from ${elements.length} elements near ${stationName}`
    )
    return { status: 'found', station, lots }
}
