import {
    parseOverpassElements,
    parseRequestBody,
    sendOverpassApiRequest,
} from '../../utils/overpass'
import type { Station } from '../../types/types'
import type { NodeElement } from './types'
import { buildStationLocationQuery } from './queries'

export const getStationLocation = async (
    stationName: string,
    city?: string
): Promise<Station[]> => {
    const requestBody = parseRequestBody({
        data: buildStationLocationQuery(stationName, city),
    })
    const result = await sendOverpassApiRequest(requestBody)

    return parseOverpassElements(result)
        .filter((element): element is NodeElement => element.type === 'node')
        .map((node) => ({
            name: node.tags.name ?? stationName,
            lat: node.lat,
            lon: node.lon,
        }))
}
