import type { Server } from 'node:http'
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app'
import { buildParkingLots } from '../processors/buildParkingLots'
import { getParkingLotElements } from '../services/overpass/getParkingLotElements'
import { getStationLocation } from '../services/overpass/getStationLocation'
import { getStationNames } from '../services/overpass/getStationNames'
import type { OverpassElement } from '../services/overpass/types'
import { OverpassUnavailableError } from '../utils/errors'

vi.mock('../services/overpass/getStationNames', () => ({
    getStationNames: vi.fn(),
}))
vi.mock('../services/overpass/getStationLocation', () => ({
    getStationLocation: vi.fn(),
}))
vi.mock('../services/overpass/getParkingLotElements', () => ({
    getParkingLotElements: vi.fn(),
}))

const majorstuen = { name: 'Majorstuen', lat: 59.93, lon: 10.71 }

const parkingWay: OverpassElement = {
    type: 'way',
    id: 101,
    tags: { amenity: 'parking' },
    geometry: [
        { lat: 59.93, lon: 10.71 },
        { lat: 59.93, lon: 10.711 },
        { lat: 59.931, lon: 10.711 },
        { lat: 59.931, lon: 10.71 },
        { lat: 59.93, lon: 10.71 },
    ],
}

let server: Server
let baseUrl: string

beforeAll(async () => {
    server = createApp().listen(0)
    await new Promise<void>((resolve) => server.once('listening', resolve))
    const address = server.address()
    if (address === null || typeof address === 'string') {
        throw new Error('Test server is not listening on a port')
    }
    baseUrl = `http://127.0.0.1:${address.port}`
})

afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
    )
})

beforeEach(() => {
    vi.mocked(getStationNames).mockReset()
    vi.mocked(getStationLocation).mockReset()
    vi.mocked(getParkingLotElements).mockReset()
})

const postForm = (path: string, form: Record<string, string>) =>
    fetch(`${baseUrl}${path}`, {
        method: 'POST',
        body: new URLSearchParams(form),
    })

describe('GET /', () => {
    it('renders the search form', async () => {
        const response = await fetch(`${baseUrl}/`)

        expect(response.status).toBe(200)
        expect(response.headers.get('content-type')).toContain('text/html')
        expect(await response.text()).toContain(
            '<form action="/search" method="post">'
        )
    })
})

describe('POST /search', () => {
    it('lists the stations of the city with map links', async () => {
        vi.mocked(getStationNames).mockResolvedValueOnce(['Holmlia', 'Storo'])

        const response = await postForm('/search', { city: 'Oslo' })
        const html = await response.text()

        expect(response.status).toBe(200)
        expect(getStationNames).toHaveBeenCalledWith('Oslo')
        expect(html).toContain('<strong>Holmlia</strong>')
        expect(html).toContain('<strong>Storo</strong>')
        expect(html).toContain('href="/map?station_name=Holmlia&amp;city=Oslo"')
    })

    it('escapes the city name', async () => {
        vi.mocked(getStationNames).mockResolvedValueOnce([])

        const response = await postForm('/search', { city: '<b>Oslo</b>' })

        expect(await response.text()).toContain(
            '<h1>Subway stations in &lt;b&gt;Oslo&lt;/b&gt;</h1>'
        )
    })

    it('requires a city', async () => {
        const response = await postForm('/search', {})

        expect(response.status).toBe(400)
        expect(await response.text()).toBe('Missing required parameter: city')
    })
})

describe('POST /get_parking_lots', () => {
    it('answers the total area of the lots around the station', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([majorstuen])
        vi.mocked(getParkingLotElements).mockResolvedValueOnce([parkingWay])

        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
            city: 'Oslo',
        })
        const [lot] = buildParkingLots([parkingWay])

        expect(response.status).toBe(200)
        expect(getStationLocation).toHaveBeenCalledWith('Majorstuen', 'Oslo')
        expect(getParkingLotElements).toHaveBeenCalledWith(59.93, 10.71, 500, false)
        expect(await response.json()).toEqual({
            station_name: 'Majorstuen',
            total_area_m2: lot.areaM2,
            parking_lots: [
                {
                    id: 101,
                    type: 'way',
                    area_m2: lot.areaM2,
                    tags: { amenity: 'parking' },
                },
            ],
        })
    })

    it('passes the radius and the surface flag', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([majorstuen])
        vi.mocked(getParkingLotElements).mockResolvedValueOnce([parkingWay])

        await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
            radius: '1200',
            surface: 'true',
        })

        expect(getStationLocation).toHaveBeenCalledWith('Majorstuen', undefined)
        expect(getParkingLotElements).toHaveBeenCalledWith(59.93, 10.71, 1200, true)
    })

    it('answers 404 for an unknown station', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([])

        const response = await postForm('/get_parking_lots', {
            station_name: 'Nowhere',
        })

        expect(response.status).toBe(404)
        expect(await response.json()).toEqual({
            error: 'Could not find location for station: Nowhere',
        })
        expect(getParkingLotElements).not.toHaveBeenCalled()
    })

    it('answers 404 when no lot forms a polygon', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([majorstuen])
        vi.mocked(getParkingLotElements).mockResolvedValueOnce([
            { type: 'node', id: 5, lat: 59.93, lon: 10.71, tags: {} },
        ])

        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
        })

        expect(response.status).toBe(404)
        expect(await response.json()).toEqual({
            error: 'No parking lots found near Majorstuen',
        })
    })

    it('rejects a malformed radius', async () => {
        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
            radius: 'far',
        })

        expect(response.status).toBe(400)
        expect(await response.json()).toEqual({
            error: 'radius must be a positive integer',
        })
    })

    it.each(['0', '-5', '1.5'])('rejects radius %s', async (radius) => {
        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
            radius,
        })

        expect(response.status).toBe(400)
        expect(await response.json()).toEqual({
            error: 'radius must be a positive integer',
        })
        expect(getStationLocation).not.toHaveBeenCalled()
    })

    it('answers 400 for a malformed JSON body', async () => {
        const response = await fetch(`${baseUrl}/get_parking_lots`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{"station_name": ',
        })

        expect(response.status).toBe(400)
        expect(await response.json()).toEqual({ error: expect.any(String) })
        expect(getStationLocation).not.toHaveBeenCalled()
    })

    it('requires a station name', async () => {
        const response = await postForm('/get_parking_lots', {})

        expect(response.status).toBe(400)
        expect(await response.json()).toEqual({
            error: 'Missing required parameter: station_name',
        })
    })

    it('answers 503 when the upstream is unavailable', async () => {
        vi.mocked(getStationLocation).mockRejectedValueOnce(
            new OverpassUnavailableError(4)
        )

        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
        })

        expect(response.status).toBe(503)
        expect(await response.json()).toEqual({
            error: 'Overpass API unavailable after 4 attempts',
        })
    })

    it('hides unexpected errors', async () => {
        vi.mocked(getStationLocation).mockRejectedValueOnce(new Error('boom'))

        const response = await postForm('/get_parking_lots', {
            station_name: 'Majorstuen',
        })

        expect(response.status).toBe(500)
        expect(await response.json()).toEqual({ error: 'Internal server error' })
    })
})

describe('GET /map', () => {
    it('renders the lots on a Leaflet map', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([majorstuen])
        vi.mocked(getParkingLotElements).mockResolvedValueOnce([parkingWay])

        const response = await fetch(
            `${baseUrl}/map?station_name=Majorstuen&city=Oslo&radius=300`
        )
        const html = await response.text()

        expect(response.status).toBe(200)
        expect(response.headers.get('content-type')).toContain('text/html')
        expect(getParkingLotElements).toHaveBeenCalledWith(59.93, 10.71, 300, false)
        expect(html).toContain('<title>Parking lots near Majorstuen</title>')
        expect(html).toContain('"zoom":15')
        expect(html).toContain('[59.93,10.71]')
    })

    it('answers 404 text for an unknown station', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([])

        const response = await fetch(`${baseUrl}/map?station_name=Nowhere`)

        expect(response.status).toBe(404)
        expect(await response.text()).toBe(
            'Error: Could not find location for station.'
        )
    })

    it('answers 404 text without parking lots', async () => {
        vi.mocked(getStationLocation).mockResolvedValueOnce([majorstuen])
        vi.mocked(getParkingLotElements).mockResolvedValueOnce([])

        const response = await fetch(`${baseUrl}/map?station_name=Majorstuen`)

        expect(response.status).toBe(404)
        expect(await response.text()).toBe(
            'Error: No parking lots found near station.'
        )
    })
})
