/**
 * data.gov.sg Taxi Availability Fixtures
 *
 * Positions are [lng, lat] as the API sends them. Against the OneMap
 * fixtures: two in DOWNTOWN, one in ORCHARD, two in BEDOK (one on its
 * island), one outside every area.
 */

export const TAXI_COORDINATES: ReadonlyArray<readonly [number, number]> = [
  [103.85, 1.3],
  [103.845, 1.29],
  [103.83, 1.3],
  [103.92, 1.32],
  [103.965, 1.305],
  [103.87, 1.35],
];

export const TAXI_AVAILABILITY_RESPONSE = {
  type: 'FeatureCollection',
  crs: { type: 'link', properties: { href: 'http://spatialreference.org/ref/epsg/4326/ogcwkt/', type: 'ogcwkt' } },
  features: [
    {
      type: 'Feature',
      geometry: {
        type: 'MultiPoint',
        coordinates: TAXI_COORDINATES.map(([lng, lat]) => [lng, lat]),
      },
      properties: {
        timestamp: '2026-10-19T08:30:00+08:00',
        taxi_count: TAXI_COORDINATES.length,
        api_info: { status: 'healthy' },
      },
    },
  ],
};
