import { describe, expect, it } from 'vitest'
import {
    buildParkingLotsQuery,
    buildStationLocationQuery,
    buildStationNamesQuery,
} from '../queries'

describe('buildStationNamesQuery', () => {
    it('searches subway stations inside the administrative area', () => {
        const query = buildStationNamesQuery('Oslo')

        expect(query).toContain(
            'area["name:en"="Oslo"]["boundary"="administrative"]->.searchArea;'
        )
        expect(query).toContain(
            'node["railway"="station"]["station"="subway"](area.searchArea);'
        )
    })
})

describe('buildStationLocationQuery', () => {
    it('matches the name and the English name', () => {
        const query = buildStationLocationQuery('Majorstuen', 'Oslo')

        expect(query).toContain('area["name:en"="Oslo"]->.searchArea;')
        expect(query).toContain(
            'node["railway"="station"]["station"="subway"]["name"="Majorstuen"](area.searchArea);'
        )
        expect(query).toContain(
            'node["railway"="station"]["station"="subway"]["name:en"="Majorstuen"](area.searchArea);'
        )
    })

    it('searches every area without a city', () => {
        expect(buildStationLocationQuery('Majorstuen')).toContain(
            'area->.searchArea;'
        )
    })

    it('escapes quotes in names', () => {
        expect(buildStationLocationQuery('Gate "A"')).toContain(
            '["name"="Gate \\"A\\""]'
        )
    })
})

describe('buildParkingLotsQuery', () => {
    it('limits surface searches to surface ways and relations', () => {
        const query = buildParkingLotsQuery(59.9, 10.7, 500, true)

        expect(query).toContain(
            'way["amenity"="parking"]["parking"="surface"](around:500,59.9,10.7);'
        )
        expect(query).toContain(
            'relation["amenity"="parking"]["parking"="surface"](around:500,59.9,10.7);'
        )
        expect(query).not.toContain('node[')
        expect(query).toContain('out tags geom;')
    })

    it('excludes structured and covered parking otherwise', () => {
        const query = buildParkingLotsQuery(59.9, 10.7, 800, false)

        expect(query).toContain('node["amenity"="parking"](around:800,59.9,10.7);')
        expect(query).toContain(
            'way["amenity"="parking"]["parking"!="multi-storey"]["parking"!="lane"]["parking"!="street_side"]["parking"!="underground"]["covered"!="yes"](around:800,59.9,10.7);'
        )
        expect(query).toContain(
            'relation["amenity"="parking"]["parking"!="multi-storey"]["parking"!="lane"]["parking"!="street_side"]["parking"!="underground"](around:800,59.9,10.7);'
        )
    })
})
