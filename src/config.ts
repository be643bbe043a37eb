import 'dotenv/config'

const defaultOverpassUrls = [
    'https://overpass-api.de/api/interpreter',
    'https://overpass.kumi.systems/api/interpreter',
    'https://overpass.private.coffee/api/interpreter',
]

const readNumber = (name: string, fallback: number): number => {
    const raw = process.env[name]
    if (raw === undefined || raw.trim() === '') return fallback
    const value = Number(raw)
    if (!Number.isFinite(value)) {
        throw new Error(`Environment variable ${name} must be a number, got "${raw}"`)
    }
    return value
}

const readBoolean = (name: string, fallback: boolean): boolean => {
    const raw = process.env[name]
    if (raw === undefined || raw.trim() === '') return fallback
    return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

const readList = (name: string, fallback: string[]): string[] => {
    const raw = process.env[name]
    if (!raw) return fallback
    const items = raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    return items.length > 0 ? items : fallback
}

export type Config = {
    port: number
    clientUrl: string | undefined
    overpass: {
        urls: string[]
        timeoutMs: number
        retries: number
        backoffFactor: number
    }
    defaultRadius: number
    log: {
        level: string
        pretty: boolean
    }
}

export const config: Config = {
    port: readNumber('PORT', 3000),
    clientUrl: process.env.CLIENT_URL,
    overpass: {
        urls: readList('OVERPASS_URLS', defaultOverpassUrls),
        timeoutMs: readNumber('OVERPASS_TIMEOUT_MS', 30000),
        retries: readNumber('OVERPASS_RETRIES', 3),
        backoffFactor: readNumber('OVERPASS_BACKOFF_FACTOR', 1),
    },
    defaultRadius: readNumber('DEFAULT_RADIUS', 500),
    log: {
        level: process.env.LOG_LEVEL ?? 'info',
        pretty: readBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'test'),
    },
}
