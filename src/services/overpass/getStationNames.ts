import _ from 'lodash'
import {
    parseOverpassElements,
    parseRequestBody,
    sendOverpassApiRequest,
} from '../../utils/overpass'
import { buildStationNamesQuery } from './queries'

/** Sorted, unique names of every subway station in the city. */
export const getStationNames = async (city: string): Promise<string[]> => {
    const requestBody = parseRequestBody({ data: buildStationNamesQuery(city) })
    const result = await sendOverpassApiRequest(requestBody)

    const names = parseOverpassElements(result)
        .map((element) => element.tags.name)
        .filter((name): name is string => name !== undefined)

    return _.uniq(names).sort()
}
