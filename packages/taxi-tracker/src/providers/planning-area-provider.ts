/**
 * Planning Area Provider
 *
 * Official URA Master Plan planning-area boundaries.
 *
 * Data Source:
 * - OneMap Population Query API:
 *   https://www.onemap.gov.sg/api/public/popapi/getAllPlanningarea?year=2019
 * - Auth: `Authorization` header carrying the OneMap access token
 *
 * Each record's `geojson` field is itself a JSON-encoded Polygon or
 * MultiPolygon. Records that cannot be decoded, or whose rings are open or
 * too short, are skipped with a warning; an empty result is an error.
 */

import { bbox } from '@turf/turf';
import { z } from 'zod';
import { LookupError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import type { AreaGeometry, BBox, PlanningArea } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { PointInPolygonEngine } from '../services/pip-engine.js';
import { toFetchError } from './provider-utils.js';

const logger = createLogger('planning-areas');

const SOURCE = 'Planning areas';

const planningAreaResponseSchema = z.object({
  SearchResults: z.array(
    z.object({
      pln_area_n: z.string(),
      geojson: z.unknown(),
    })
  ),
});

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema);

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ringSchema) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ringSchema)) }),
]);

export interface PlanningAreaProviderConfig {
  readonly url: string;
  readonly token: string;
  readonly year: number;
  readonly timeoutMs: number;
  readonly retries?: number;
}

/**
 * "BUKIT MERAH" → "Bukit Merah planning area"
 */
export function describePlanningArea(name: string): string {
  const titled = name
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
  return `${titled} planning area`;
}

/**
 * Decode one record's geometry; null if unusable
 */
export function parseAreaGeometry(raw: unknown): AreaGeometry | null {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
  }

  const parsed = geometrySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function computeBBox(geometry: AreaGeometry): BBox {
  const box = bbox(geometry);
  return [box[0], box[1], box[2], box[3]];
}

/**
 * Build a PlanningArea record with its default description and bbox
 */
export function buildPlanningArea(name: string, geometry: AreaGeometry): PlanningArea {
  return {
    name,
    geometry,
    description: describePlanningArea(name),
    bbox: computeBBox(geometry),
  };
}

export class PlanningAreaProvider {
  readonly name = 'OneMap Planning Areas';

  private readonly engine = new PointInPolygonEngine();

  constructor(
    private readonly client: HTTPClient,
    private readonly config: PlanningAreaProviderConfig
  ) {}

  buildUrl(): string {
    const url = new URL(this.config.url);
    url.searchParams.set('year', String(this.config.year));
    return url.toString();
  }

  /**
   * Fetch and decode all planning areas, in the order the source lists them
   *
   * @throws {FetchError} On network, timeout or auth failure
   * @throws {LookupError} If the dataset is missing, malformed or empty
   */
  async fetchPlanningAreas(): Promise<PlanningArea[]> {
    const url = this.buildUrl();
    logger.debug('Fetching planning areas', { url });

    let body: unknown;
    try {
      body = await this.client.fetchJSON(url, {
        headers: { Authorization: this.config.token },
        timeoutMs: this.config.timeoutMs,
        retries: this.config.retries,
      });
    } catch (error) {
      throw toFetchError(SOURCE, url, error);
    }

    const parsed = planningAreaResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LookupError(
        'Planning-area response is malformed: expected SearchResults array',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const areas: PlanningArea[] = [];
    const skipped: string[] = [];

    for (const record of parsed.data.SearchResults) {
      const name = record.pln_area_n.trim();
      const geometry = parseAreaGeometry(record.geojson);
      const problems =
        geometry === null
          ? ['Boundary could not be decoded']
          : this.engine.validateGeometry(geometry);

      if (name.length === 0 || geometry === null || problems.length > 0) {
        skipped.push(name || '(unnamed)');
        logger.warn('Skipping planning area with unusable boundary', { name, problems });
        continue;
      }

      areas.push(buildPlanningArea(name, geometry));
    }

    if (areas.length === 0) {
      throw new LookupError(
        `No usable planning areas for year ${this.config.year}`,
        skipped
      );
    }

    logger.debug('Fetched planning areas', {
      count: areas.length,
      skipped: skipped.length,
    });

    return areas;
  }
}

export function createPlanningAreaProvider(
  client: HTTPClient,
  config: PlanningAreaProviderConfig
): PlanningAreaProvider {
  return new PlanningAreaProvider(client, config);
}
