/**
 * Taxi Tracker Service
 *
 * Runs the pipeline once: fetch taxi positions and planning areas
 * concurrently, resolve each taxi to an area, rank the areas and describe
 * the top entries. Any FetchError, LookupError or EmptyResultError aborts
 * the run; nothing partial is returned.
 */

import type { TrackerConfig } from '../cli/lib/config.js';
import { EmptyResultError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import type { AreaCount, LatLng, PlanningArea, TaxiPosition, TaxiReport } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { PlanningAreaProvider } from '../providers/planning-area-provider.js';
import { TaxiAvailabilityProvider } from '../providers/taxi-availability-provider.js';
import { buildAreaCounts, countByArea, DEFAULT_TOP_K, rankAreaCounts } from './aggregator.js';
import { AreaResolver } from './area-resolver.js';
import { ReverseGeocoder } from './reverse-geocoder.js';

const logger = createLogger('service');

// ============================================================================
// Collaborator Interfaces
// ============================================================================

export interface TaxiPositionSource {
  fetchPositions(): Promise<TaxiPosition[]>;
}

export interface PlanningAreaSource {
  fetchPlanningAreas(): Promise<PlanningArea[]>;
}

export interface AreaDescriber {
  describeAll(points: readonly LatLng[]): Promise<(string | null)[]>;
}

export interface TaxiTrackerDependencies {
  readonly taxis: TaxiPositionSource;
  readonly planningAreas: PlanningAreaSource;
  /** Omit to keep the planning areas' own descriptions */
  readonly describer?: AreaDescriber;
  readonly now?: () => Date;
}

export interface RunOptions {
  /** Areas to report (default: 10) */
  readonly topK?: number;
  /** Reverse-geocode the top areas (default: true when a describer exists) */
  readonly describe?: boolean;
}

// ============================================================================
// Service
// ============================================================================

export class TaxiTrackerService {
  private readonly now: () => Date;

  constructor(private readonly deps: TaxiTrackerDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws {FetchError} If either source fails
   * @throws {LookupError} If the planning-area dataset is empty or malformed
   * @throws {EmptyResultError} If no taxi falls inside any planning area
   */
  async run(options: RunOptions = {}): Promise<TaxiReport> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const startTime = Date.now();

    logger.info('Fetching taxi positions and planning areas');
    const [positions, areas] = await Promise.all([
      this.deps.taxis.fetchPositions(),
      this.deps.planningAreas.fetchPlanningAreas(),
    ]);
    logger.info('Sources fetched', { taxis: positions.length, planningAreas: areas.length });

    const resolver = new AreaResolver(areas);
    const assignments = resolver.assignAll(positions);
    const counts = countByArea(assignments);

    const assignedTaxis = [...counts.values()].reduce((sum, count) => sum + count, 0);
    if (assignedTaxis === 0) {
      throw new EmptyResultError(positions.length, resolver.areaCount);
    }

    const ranked = rankAreaCounts(counts, topK);
    const rows = await this.describe(
      buildAreaCounts(ranked, assignments, (name) => resolver.findArea(name)),
      options.describe ?? true
    );

    logger.info('Report ready', {
      assignedTaxis,
      unassignedTaxis: positions.length - assignedTaxis,
      areas: rows.length,
      duration_ms: Date.now() - startTime,
    });

    return {
      generatedAt: this.now().toISOString(),
      totalTaxis: positions.length,
      assignedTaxis,
      unassignedTaxis: positions.length - assignedTaxis,
      planningAreaCount: resolver.areaCount,
      areas: rows,
    };
  }

  /**
   * Replace default descriptions with reverse-geocoded ones where available
   */
  private async describe(rows: AreaCount[], enabled: boolean): Promise<AreaCount[]> {
    const describer = this.deps.describer;
    if (!enabled || !describer) {
      return rows;
    }

    const located = rows.flatMap((row) => (row.centroid ? [{ area: row.area, centroid: row.centroid }] : []));

    logger.info('Fetching area descriptions', { count: located.length });
    const descriptions = await describer.describeAll(located.map((entry) => entry.centroid));

    const byArea = new Map<string, string>();
    located.forEach((entry, index) => {
      const description = descriptions[index];
      if (description) {
        byArea.set(entry.area, description);
      }
    });

    return rows.map((row) => ({
      ...row,
      description: byArea.get(row.area) ?? row.description,
    }));
  }
}

/**
 * Wire the service to the live data sources
 */
export function createTaxiTrackerService(config: TrackerConfig): TaxiTrackerService {
  const client = new HTTPClient({ maxRetries: config.report.retries });
  const { services, credentials, report } = config;

  return new TaxiTrackerService({
    taxis: new TaxiAvailabilityProvider(client, {
      url: services.taxiAvailability.url,
      apiKey: credentials.dataGovApiKey,
      timeoutMs: services.taxiAvailability.timeout,
    }),
    planningAreas: new PlanningAreaProvider(client, {
      url: services.planningAreas.url,
      token: credentials.oneMapToken,
      year: services.planningAreas.year,
      timeoutMs: services.planningAreas.timeout,
    }),
    describer: report.describe
      ? new ReverseGeocoder(client, {
          url: services.reverseGeocoding.url,
          timeoutMs: services.reverseGeocoding.timeout,
          concurrency: report.describeConcurrency,
        })
      : undefined,
  });
}
