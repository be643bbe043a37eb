import type { Request } from 'express'
import type { Logger } from 'pino'
import { config } from '../config'
import { getStationNames } from '../services/overpass/getStationNames'
import { renderView } from '../utils/views'
import { readRequiredString } from './params'

const mapUrl = (stationName: string, city: string) =>
    `/map?${new URLSearchParams({ station_name: stationName, city })}`

export const searchHandler = async (request: Request, log: Logger) => {
    const city = readRequiredString(request.body, 'city')
    const stationNames = await getStationNames(city)
    log.info(`Found ${stationNames.length} subway stations in ${city}`)

    return renderView('search_results', {
        city,
        defaultRadius: config.defaultRadius,
        stations: stationNames.map((name) => ({
            name,
            mapUrl: mapUrl(name, city),
        })),
    })
}
