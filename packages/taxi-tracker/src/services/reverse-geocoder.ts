/**
 * Reverse Geocoder
 *
 * Human-readable place descriptions from OpenStreetMap Nominatim.
 * Descriptions are decoration: a failed lookup is logged and yields null,
 * and the report falls back to the planning area's own description.
 *
 * Nominatim's usage policy allows about one request per second, so lookups
 * run in small batches.
 */

import { z } from 'zod';
import type { HTTPClient } from '../core/http-client.js';
import type { LatLng } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger('reverse-geocoder');

const nominatimReverseSchema = z.object({
  display_name: z.string().min(1),
});

export interface ReverseGeocoderConfig {
  readonly url: string;
  readonly timeoutMs: number;
  /** Lookups in flight at once (default: 2) */
  readonly concurrency?: number;
  readonly retries?: number;
}

export class ReverseGeocoder {
  private readonly concurrency: number;

  constructor(
    private readonly client: HTTPClient,
    private readonly config: ReverseGeocoderConfig
  ) {
    this.concurrency = Math.max(1, config.concurrency ?? 2);
  }

  buildUrl(point: LatLng): string {
    const url = new URL(this.config.url);
    url.searchParams.set('format', 'json');
    url.searchParams.set('lat', String(point.lat));
    url.searchParams.set('lon', String(point.lng));
    url.searchParams.set('zoom', '16');
    url.searchParams.set('addressdetails', '1');
    return url.toString();
  }

  /**
   * Describe one location, or null if the lookup failed
   */
  async describe(point: LatLng): Promise<string | null> {
    const url = this.buildUrl(point);

    try {
      const body = await this.client.fetchJSON(url, {
        timeoutMs: this.config.timeoutMs,
        retries: this.config.retries,
      });
      const parsed = nominatimReverseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn('Reverse geocoding returned no display name', { lat: point.lat, lng: point.lng });
        return null;
      }
      return parsed.data.display_name;
    } catch (error) {
      logger.warn('Reverse geocoding failed', {
        lat: point.lat,
        lng: point.lng,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Describe many locations; results keep input order
   */
  async describeAll(points: readonly LatLng[]): Promise<(string | null)[]> {
    const results: (string | null)[] = [];

    for (let i = 0; i < points.length; i += this.concurrency) {
      const batch = points.slice(i, i + this.concurrency);
      results.push(...(await Promise.all(batch.map((point) => this.describe(point)))));
    }

    return results;
  }
}

export function createReverseGeocoder(
  client: HTTPClient,
  config: ReverseGeocoderConfig
): ReverseGeocoder {
  return new ReverseGeocoder(client, config);
}
