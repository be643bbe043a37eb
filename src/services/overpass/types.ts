export type Tags = Record<string, string>

export type LatLon = {
    lat: number
    lon: number
}

export type OverpassResponse<ElementsType> = {
    elements: ElementsType[]
    generator?: string
    osm3s?: {
        timestamp_osm_base: string
        copyright: string
    }
    version?: number
}

export type NodeElement = {
    type: 'node'
    id: number
    lat: number
    lon: number
    tags: Tags
}

export type WayElement = {
    type: 'way'
    id: number
    geometry?: LatLon[]
    tags: Tags
}

export type RelationElement = {
    type: 'relation'
    id: number
    geometry?: LatLon[]
    tags: Tags
}

export type OverpassElement = NodeElement | WayElement | RelationElement

export type OverpassElementType = OverpassElement['type']
