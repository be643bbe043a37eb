import { config } from '../config'
import { renderView } from '../utils/views'

export const homeHandler = async () =>
    renderView('base', { defaultRadius: config.defaultRadius })
