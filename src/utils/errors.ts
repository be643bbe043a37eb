import _ from 'lodash'

export class HttpError extends Error {
    readonly status: number

    constructor(status: number, message: string) {
        super(message)
        this.name = 'HttpError'
        this.status = status
    }
}

export class BadRequestError extends HttpError {
    constructor(message: string) {
        super(400, message)
        this.name = 'BadRequestError'
    }
}

export class NotFoundError extends HttpError {
    constructor(message: string) {
        super(404, message)
        this.name = 'NotFoundError'
    }
}

/** The Overpass API rejected the query or answered with something unreadable. */
export class OverpassError extends HttpError {
    readonly upstreamStatus: number | undefined

    constructor(message: string, upstreamStatus?: number) {
        super(502, message)
        this.name = 'OverpassError'
        this.upstreamStatus = upstreamStatus
    }
}

/** Every configured mirror failed after its retries. */
export class OverpassUnavailableError extends HttpError {
    readonly attempts: number

    constructor(attempts: number, cause?: unknown) {
        super(503, `Overpass API unavailable after ${attempts} attempts`)
        this.name = 'OverpassUnavailableError'
        this.attempts = attempts
        this.cause = cause
    }
}

export const errorMessage = (e: unknown) =>
    e instanceof Error ? e.message : String(e)

/**
 * Known HTTP errors, including the 4xx ones express body parsers raise with
 * `expose` set. Anything else is left to the caller as a server error.
 */
export const toHttpError = (err: unknown): HttpError | undefined => {
    if (err instanceof HttpError) return err
    if (!_.isObject(err)) return undefined

    const status: unknown = _.get(err, 'status')
    const expose: unknown = _.get(err, 'expose')
    const message: unknown = _.get(err, 'message')
    if (_.isNumber(status) && status >= 400 && status < 500 && expose === true) {
        return new HttpError(status, _.isString(message) ? message : 'Bad request')
    }
    return undefined
}
