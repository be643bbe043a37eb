import type { Polygon, Position } from 'geojson'
import type { OverpassElementType, Tags } from '../services/overpass/types'

export type Station = {
    name: string
    lat: number
    lon: number
}

/** [lon, lat] pairs, open: the first point is not repeated at the end. */
export type Ring = Position[]

export type ParkingLot = {
    id: number
    type: OverpassElementType
    coordinates: Ring
    polygon: Polygon
    areaM2: number
    /** UTM zone the area was measured in. */
    epsg: number
    tags: Tags
}

export type MapPolygon = {
    latLngs: [number, number][]
    label: string
}

export type MapView = {
    center: [number, number]
    zoom: number
    polygons: MapPolygon[]
}
