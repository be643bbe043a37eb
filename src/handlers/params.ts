import _ from 'lodash'
import { config } from '../config'
import { BadRequestError } from '../utils/errors'

const readRaw = (source: unknown, name: string): string | undefined => {
    if (!_.isObject(source) || !(name in source)) return undefined
    const value: unknown = _.get(source, name)
    if (!_.isString(value)) return undefined
    const trimmed = value.trim()
    return trimmed.length > 0 ? trimmed : undefined
}

export const readOptionalString = (source: unknown, name: string) =>
    readRaw(source, name)

export const readRequiredString = (source: unknown, name: string) => {
    const value = readRaw(source, name)
    if (value === undefined) {
        throw new BadRequestError(`Missing required parameter: ${name}`)
    }
    return value
}

export const readRadius = (source: unknown, fallback = config.defaultRadius) => {
    const raw = readRaw(source, 'radius')
    if (raw === undefined) return fallback
    const radius = Number(raw)
    if (!Number.isInteger(radius) || radius <= 0) {
        throw new BadRequestError('radius must be a positive integer')
    }
    return radius
}

export const readFlag = (source: unknown, name: string) => {
    const raw = readRaw(source, name)
    return raw !== undefined && ['1', 'true', 'on', 'yes'].includes(raw.toLowerCase())
}
