import type { Request } from 'express'
import type { Logger } from 'pino'
import { buildMapView } from '../processors/buildMapView'
import { NotFoundError } from '../utils/errors'
import { renderView, toScriptJson } from '../utils/views'
import { findParkingLots } from './findParkingLots'
import {
    readFlag,
    readOptionalString,
    readRadius,
    readRequiredString,
} from './params'

export const mapHandler = async (request: Request, log: Logger) => {
    const stationName = readRequiredString(request.query, 'station_name')
    const result = await findParkingLots(
        {
            stationName,
            city: readOptionalString(request.query, 'city'),
            radius: readRadius(request.query),
            surface: readFlag(request.query, 'surface'),
        },
        log
    )

    if (result.status === 'stationNotFound') {
        throw new NotFoundError('Error: Could not find location for station.')
    }
    if (result.lots.length === 0) {
        throw new NotFoundError('Error: No parking lots found near station.')
    }

    const mapView = buildMapView(
        result.lots,
        result.lots.map((lot) => String(lot.areaM2))
    )
    return renderView('map', {
        stationName: result.station.name,
        mapView: toScriptJson(mapView),
    })
}
