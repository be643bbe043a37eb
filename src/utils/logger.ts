import logger from 'pino'
import { config } from '../config'

export const log = logger({
    level: config.log.level,
    ...(config.log.pretty
        ? {
              transport: {
                  target: 'pino-pretty',
              },
          }
        : {}),
})
