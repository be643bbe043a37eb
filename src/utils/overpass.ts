import _ from 'lodash'
import { setTimeout as sleepFor } from 'node:timers/promises'
import { config } from '../config'
import type {
    LatLon,
    OverpassElement,
    OverpassResponse,
    Tags,
} from '../services/overpass/types'
import {
    errorMessage,
    OverpassError,
    OverpassUnavailableError,
} from './errors'
import { log } from './logger'

const retryableStatuses = [429, 500, 502, 503, 504]

export type OverpassRequestOptions = {
    urls?: string[]
    retries?: number
    backoffFactor?: number
    timeoutMs?: number
    sleep?: (ms: number) => Promise<unknown>
}

export const parseRequestBody = (body: Record<string, string>) => {
    const requestBodyArr: string[] = []
    for (const property in body) {
        const encodedKey = encodeURIComponent(property)
        const encodedValue = encodeURIComponent(body[property])
        requestBodyArr.push(encodedKey + '=' + encodedValue)
    }
    return requestBodyArr.join('&')
}

/** Escapes a value for use inside a double-quoted Overpass QL string. */
export const escapeOverpassString = (value: string) =>
    value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')

/** Delay before the n-th retry (1-based), in milliseconds. */
export const getBackoffDelay = (retry: number, backoffFactor: number) =>
    backoffFactor * 1000 * 2 ** (retry - 1)

const isRecord = (value: unknown): value is Record<string, unknown> =>
    _.isObject(value) && !_.isArray(value)

const isOverpassResponse = (
    value: unknown
): value is OverpassResponse<unknown> =>
    isRecord(value) && _.isArray(value.elements)

export const sendOverpassApiRequest = async (
    requestBody: string,
    options: OverpassRequestOptions = {}
): Promise<OverpassResponse<unknown>> => {
    const urls = options.urls ?? config.overpass.urls
    const retries = options.retries ?? config.overpass.retries
    const backoffFactor = options.backoffFactor ?? config.overpass.backoffFactor
    const timeoutMs = options.timeoutMs ?? config.overpass.timeoutMs
    const sleep = options.sleep ?? sleepFor

    let attempts = 0
    let lastError: unknown

    for (const url of urls) {
        for (let retry = 0; retry <= retries; retry++) {
            if (retry > 0) {
                await sleep(getBackoffDelay(retry, backoffFactor))
            }
            attempts++

            let response: Response
            try {
                response = await fetch(url, {
                    method: 'POST',
                    headers: {
                        'Content-Type':
                            'application/x-www-form-urlencoded;charset=UTF-8',
                    },
                    body: requestBody,
                    signal: AbortSignal.timeout(timeoutMs),
                })
            } catch (e) {
                lastError = e
                log.warn(
                    `Overpass request to ${url} failed: ${errorMessage(e)}`
                )
                continue
            }

            if (retryableStatuses.includes(response.status)) {
                lastError = new OverpassError(
                    `Overpass API error: ${response.status}`,
                    response.status
                )
                log.warn(`Overpass mirror ${url} answered ${response.status}`)
                await response.body?.cancel()
                continue
            }
            if (!response.ok) {
                await response.body?.cancel()
                throw new OverpassError(
                    `Overpass API error: ${response.status}`,
                    response.status
                )
            }

            let responseBody: unknown
            try {
                responseBody = await response.json()
            } catch (e) {
                throw new OverpassError(
                    `Overpass API returned invalid JSON: ${errorMessage(e)}`
                )
            }
            if (!isOverpassResponse(responseBody)) {
                throw new OverpassError('Overpass API response has no elements')
            }
            return responseBody
        }
        log.warn(`Overpass mirror ${url} exhausted, trying next mirror`)
    }

    log.error(`All Overpass mirrors failed after ${attempts} attempts`)
    throw new OverpassUnavailableError(attempts, lastError)
}

const parseTags = (value: unknown): Tags => {
    if (!isRecord(value)) return {}
    const tags: Tags = {}
    for (const [key, tag] of Object.entries(value)) {
        if (_.isString(tag)) tags[key] = tag
    }
    return tags
}

const parseGeometry = (value: unknown): LatLon[] | undefined => {
    if (!_.isArray(value)) return undefined
    const points: unknown[] = value
    const geometry: LatLon[] = []
    for (const point of points) {
        if (!isRecord(point) || !_.isNumber(point.lat) || !_.isNumber(point.lon)) {
            return undefined
        }
        geometry.push({ lat: point.lat, lon: point.lon })
    }
    return geometry
}

export const parseOverpassElement = (value: unknown): OverpassElement | null => {
    if (!isRecord(value)) return null
    const { id, type, lat, lon } = value
    if (!_.isNumber(id)) return null
    const tags = parseTags(value.tags)

    if (type === 'node') {
        if (!_.isNumber(lat) || !_.isNumber(lon)) return null
        return { type, id, lat, lon, tags }
    }
    if (type === 'way' || type === 'relation') {
        return { type, id, tags, geometry: parseGeometry(value.geometry) }
    }
    return null
}

export const parseOverpassElements = (
    response: OverpassResponse<unknown>
): OverpassElement[] =>
    response.elements
        .map(parseOverpassElement)
        .filter((element): element is OverpassElement => element !== null)
