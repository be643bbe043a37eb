import express from 'express'
import type { NextFunction, Request, Response } from 'express'
import cors from 'cors'
import type { Logger } from 'pino'
import { v4 } from 'uuid'
import { config } from './config'
import { homeHandler } from './handlers/homeHandler'
import { mapHandler } from './handlers/mapHandler'
import { parkingLotsHandler } from './handlers/parkingLotsHandler'
import { searchHandler } from './handlers/searchHandler'
import { toHttpError } from './utils/errors'
import { log } from './utils/logger'

type ErrorFormat = 'json' | 'text'

type Handler<T> = (request: Request, log: Logger) => Promise<T>

const requestLogger = (request: Request) =>
    log.child({ requestId: v4(), route: `${request.method} ${request.path}` })

const htmlRoute =
    (handler: Handler<string>) =>
    (req: Request, res: Response, next: NextFunction) => {
        res.locals.errorFormat = 'text' satisfies ErrorFormat
        handler(req, requestLogger(req))
            .then((html) => {
                res.type('html').send(html)
            })
            .catch(next)
    }

const jsonRoute =
    <T>(handler: Handler<T>) =>
    (req: Request, res: Response, next: NextFunction) => {
        res.locals.errorFormat = 'json' satisfies ErrorFormat
        handler(req, requestLogger(req))
            .then((body) => {
                res.json(body)
            })
            .catch(next)
    }

const errorHandler = (
    err: unknown,
    req: Request,
    res: Response,
    // express recognises error middleware by its arity
    _next: NextFunction
) => {
    const httpError = toHttpError(err)
    const status = httpError?.status ?? 500
    const message = httpError?.message ?? 'Internal server error'

    if (status >= 500) {
        log.error(err, `${req.method} ${req.path} failed`)
    } else {
        log.warn(`${req.method} ${req.path} answered ${status}: ${message}`)
    }

    if (res.locals.errorFormat === 'text') {
        res.status(status).type('text/plain').send(message)
    } else {
        res.status(status).json({ error: message })
    }
}

export const createApp = () => {
    const app = express()

    app.use(cors({ origin: config.clientUrl }))
    app.use(express.json()) // for parsing application/json
    app.use(express.urlencoded({ extended: true })) // for parsing application/x-www-form-urlencoded

    app.get('/', htmlRoute(homeHandler))
    app.post('/search', htmlRoute(searchHandler))
    app.post('/get_parking_lots', jsonRoute(parkingLotsHandler))
    app.get('/map', htmlRoute(mapHandler))

    app.use(errorHandler)
    return app
}
