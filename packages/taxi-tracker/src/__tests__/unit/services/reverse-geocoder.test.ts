/**
 * Reverse Geocoder Tests
 */

import { describe, it, expect } from 'vitest';
import { HTTPClient } from '../../../core/http-client.js';
import { ReverseGeocoder } from '../../../services/reverse-geocoder.js';
import { jsonResponse, stubFetch } from '../../utils/mock-fetch.js';

const NOMINATIM_URL = 'https://nominatim.openstreetmap.org/reverse';

function createGeocoder(concurrency = 2): ReverseGeocoder {
  return new ReverseGeocoder(new HTTPClient({ maxRetries: 0 }), {
    url: NOMINATIM_URL,
    timeoutMs: 1000,
    concurrency,
    retries: 0,
  });
}

describe('ReverseGeocoder', () => {
  it('builds a Nominatim reverse query', () => {
    expect(createGeocoder().buildUrl({ lat: 1.3, lng: 103.85 })).toBe(
      `${NOMINATIM_URL}?format=json&lat=1.3&lon=103.85&zoom=16&addressdetails=1`
    );
  });

  it('returns the display name', async () => {
    stubFetch(() => jsonResponse({ display_name: 'Raffles Place, Downtown Core, Singapore' }));

    await expect(createGeocoder().describe({ lat: 1.284, lng: 103.851 })).resolves.toBe(
      'Raffles Place, Downtown Core, Singapore'
    );
  });

  it('returns null when the location cannot be described', async () => {
    stubFetch(() => jsonResponse({ error: 'Unable to geocode' }));

    await expect(createGeocoder().describe({ lat: 0, lng: 0 })).resolves.toBeNull();
  });

  it('returns null when the request fails', async () => {
    stubFetch(() => jsonResponse({}, 500));

    await expect(createGeocoder().describe({ lat: 1.3, lng: 103.85 })).resolves.toBeNull();
  });

  it('describes many locations in input order with bounded concurrency', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchMock = stubFetch(async (url) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      const lat = new URL(url).searchParams.get('lat');
      // Later requests finish first
      await new Promise((resolve) => setTimeout(resolve, 20 - Number(lat) * 4));
      inFlight--;
      return lat === '3' ? jsonResponse({}) : jsonResponse({ display_name: `Place ${lat}` });
    });

    const points = [1, 2, 3, 4, 5].map((lat) => ({ lat, lng: 103.8 }));
    const names = await createGeocoder(2).describeAll(points);

    expect(names).toEqual(['Place 1', 'Place 2', null, 'Place 4', 'Place 5']);
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(maxInFlight).toBe(2);
  });
});
