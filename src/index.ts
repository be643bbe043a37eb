import { createApp } from './app'
import { config } from './config'
import { log } from './utils/logger'

const app = createApp()

app.listen(config.port, () => {
    log.info(`Listening on port ${config.port}...`)
})
