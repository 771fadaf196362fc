/**
 * Taxi Availability Provider
 *
 * Current positions of every available taxi in Singapore.
 *
 * Data Source:
 * - data.gov.sg Transport API: https://api.data.gov.sg/v1/transport/taxi-availability
 * - Auth: `X-Api-Key` header
 *
 * The response is a GeoJSON FeatureCollection with a single MultiPoint
 * feature; each [lng, lat] pair is one available taxi.
 */

import { z } from 'zod';
import { FetchError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import type { TaxiPosition } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { toFetchError } from './provider-utils.js';

const logger = createLogger('taxi-availability');

const SOURCE = 'Taxi availability';

const taxiAvailabilitySchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z
    .array(
      z.object({
        geometry: z.object({
          type: z.literal('MultiPoint'),
          coordinates: z.array(z.array(z.number()).min(2)),
        }),
        properties: z
          .object({
            timestamp: z.string().optional(),
            taxi_count: z.number().optional(),
          })
          .passthrough()
          .nullish(),
      })
    )
    .min(1, 'expected at least one feature'),
});

export interface TaxiAvailabilityProviderConfig {
  readonly url: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
  readonly retries?: number;
}

export class TaxiAvailabilityProvider {
  readonly name = 'data.gov.sg Taxi Availability';

  constructor(
    private readonly client: HTTPClient,
    private readonly config: TaxiAvailabilityProviderConfig
  ) {}

  /**
   * Fetch current taxi positions
   *
   * @throws {FetchError} On network, timeout, auth or response-shape failure
   */
  async fetchPositions(): Promise<TaxiPosition[]> {
    const { url } = this.config;
    logger.debug('Fetching taxi availability', { url });

    let body: unknown;
    try {
      body = await this.client.fetchJSON(url, {
        headers: { 'X-Api-Key': this.config.apiKey },
        timeoutMs: this.config.timeoutMs,
        retries: this.config.retries,
      });
    } catch (error) {
      throw toFetchError(SOURCE, url, error);
    }

    const parsed = taxiAvailabilitySchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new FetchError(
        `${SOURCE} response is malformed${where}: ${issue?.message ?? 'unknown issue'}`,
        SOURCE,
        url
      );
    }

    const [feature] = parsed.data.features;
    const positions = feature.geometry.coordinates.map(
      ([lng, lat]): TaxiPosition => ({ lat, lng })
    );

    const reportedCount = feature.properties?.taxi_count;
    if (reportedCount !== undefined && reportedCount !== positions.length) {
      logger.warn('Reported taxi count differs from coordinate count', {
        reportedCount,
        coordinateCount: positions.length,
      });
    }

    logger.debug('Fetched taxi positions', {
      count: positions.length,
      timestamp: feature.properties?.timestamp,
    });

    return positions;
  }
}

export function createTaxiAvailabilityProvider(
  client: HTTPClient,
  config: TaxiAvailabilityProviderConfig
): TaxiAvailabilityProvider {
  return new TaxiAvailabilityProvider(client, config);
}
