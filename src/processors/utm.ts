import proj4 from 'proj4'
import type { Ring } from '../types/types'

const WGS84 = 'EPSG:4326'

export const getUtmZone = (lon: number) =>
    Math.min(Math.max(Math.floor((lon + 180) / 6) + 1, 1), 60)

export const getUtmEpsg = (lon: number, lat: number) =>
    (lat < 0 ? 32700 : 32600) + getUtmZone(lon)

const utmDefinition = (epsg: number) => {
    const zone = epsg % 100
    const south = epsg >= 32700 ? ' +south' : ''
    return `+proj=utm +zone=${zone}${south} +datum=WGS84 +units=m +no_defs`
}

type Forward = (position: number[]) => number[]

const converters = new Map<number, Forward>()

const getForward = (epsg: number): Forward => {
    let forward = converters.get(epsg)
    if (!forward) {
        const converter = proj4(WGS84, utmDefinition(epsg))
        forward = (position) => converter.forward(position)
        converters.set(epsg, forward)
    }
    return forward
}

/** Projects a [lon, lat] ring into meters in the given UTM zone. */
export const projectRingToUtm = (ring: Ring, epsg: number): Ring => {
    const forward = getForward(epsg)
    return ring.map((position) => {
        const [x, y] = forward([position[0], position[1]])
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            throw new Error(
                `Cannot project [${position.join(', ')}] to EPSG:${epsg}`
            )
        }
        return [x, y]
    })
}
