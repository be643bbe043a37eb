import {
    parseOverpassElements,
    parseRequestBody,
    sendOverpassApiRequest,
} from '../../utils/overpass'
import type { OverpassElement } from './types'
import { buildParkingLotsQuery } from './queries'

export const getParkingLotElements = async (
    lat: number,
    lon: number,
    radius: number,
    surface = false
): Promise<OverpassElement[]> => {
    const requestBody = parseRequestBody({
        data: buildParkingLotsQuery(lat, lon, radius, surface),
    })
    const result = await sendOverpassApiRequest(requestBody)
    return parseOverpassElements(result)
}
