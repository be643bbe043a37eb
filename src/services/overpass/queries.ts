import { escapeOverpassString } from '../../utils/overpass'

const subwayStationFilter = '["railway"="station"]["station"="subway"]'

const excludedParkingFilter = [
    'multi-storey',
    'lane',
    'street_side',
    'underground',
]
    .map((parking) => `["parking"!="${parking}"]`)
    .join('')

export const buildStationNamesQuery = (city: string) =>
    `[out:json][timeout:25];
area["name:en"="${escapeOverpassString(city)}"]["boundary"="administrative"]->.searchArea;
node${subwayStationFilter}(area.searchArea);
out body;`

export const buildStationLocationQuery = (
    stationName: string,
    city?: string
) => {
    const name = escapeOverpassString(stationName)
    const cityFilter = city ? `["name:en"="${escapeOverpassString(city)}"]` : ''
    return `[out:json][timeout:25];
area${cityFilter}->.searchArea;
(
  node${subwayStationFilter}["name"="${name}"](area.searchArea);
  node${subwayStationFilter}["name:en"="${name}"](area.searchArea);
);
out body;`
}

export const buildParkingLotsQuery = (
    lat: number,
    lon: number,
    radius: number,
    surface: boolean
) => {
    const around = `(around:${radius},${lat},${lon})`
    if (surface) {
        return `[out:json][timeout:25];
(
  way["amenity"="parking"]["parking"="surface"]${around};
  relation["amenity"="parking"]["parking"="surface"]${around};
);
out tags geom;`
    }
    return `[out:json][timeout:25];
(
  node["amenity"="parking"]${around};
  way["amenity"="parking"]${excludedParkingFilter}["covered"!="yes"]${around};
  relation["amenity"="parking"]${excludedParkingFilter}${around};
);
out tags geom;`
}
