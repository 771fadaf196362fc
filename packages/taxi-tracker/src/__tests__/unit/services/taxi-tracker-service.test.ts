/**
 * Taxi Tracker Service Tests
 *
 * Runs the whole pipeline against in-memory sources.
 */

import { describe, it, expect, vi } from 'vitest';
import { EmptyResultError, FetchError, LookupError } from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import type { PlanningArea, TaxiPosition } from '../../../core/types.js';
import {
  PlanningAreaProvider,
  buildPlanningArea,
} from '../../../providers/planning-area-provider.js';
import {
  TaxiTrackerService,
  type AreaDescriber,
  type TaxiTrackerDependencies,
} from '../../../services/taxi-tracker-service.js';
import { TAXI_COORDINATES } from '../../fixtures/api-responses/data-gov-sg.js';
import {
  BEDOK_GEOMETRY,
  DOWNTOWN_GEOMETRY,
  ONEMAP_RESPONSE_WITH_DEGENERATE_RECORDS,
  ORCHARD_GEOMETRY,
} from '../../fixtures/api-responses/onemap.js';
import { jsonResponse, stubFetch } from '../../utils/mock-fetch.js';

const POSITIONS: TaxiPosition[] = TAXI_COORDINATES.map(([lng, lat]) => ({ lat, lng }));

const AREAS: PlanningArea[] = [
  buildPlanningArea('DOWNTOWN', DOWNTOWN_GEOMETRY),
  buildPlanningArea('ORCHARD', ORCHARD_GEOMETRY),
  buildPlanningArea('BEDOK', BEDOK_GEOMETRY),
];

const NOW = new Date('2026-10-19T00:30:00.000Z');

function createService(
  overrides: Partial<TaxiTrackerDependencies> & {
    positions?: TaxiPosition[];
    areas?: PlanningArea[];
  } = {}
): TaxiTrackerService {
  const positions = overrides.positions ?? POSITIONS;
  const areas = overrides.areas ?? AREAS;

  return new TaxiTrackerService({
    taxis: overrides.taxis ?? { fetchPositions: async () => positions },
    planningAreas: overrides.planningAreas ?? { fetchPlanningAreas: async () => areas },
    describer: overrides.describer,
    now: () => NOW,
  });
}

describe('TaxiTrackerService', () => {
  it('ranks planning areas by available taxis', async () => {
    const report = await createService().run();

    expect(report).toMatchObject({
      generatedAt: '2026-10-19T00:30:00.000Z',
      totalTaxis: 6,
      assignedTaxis: 5,
      unassignedTaxis: 1,
      planningAreaCount: 3,
    });
    expect(report.areas.map(({ rank, area, count }) => [rank, area, count])).toEqual([
      [1, 'BEDOK', 2],
      [2, 'DOWNTOWN', 2],
      [3, 'ORCHARD', 1],
    ]);
  });

  it('limits the report to the top k areas', async () => {
    const report = await createService().run({ topK: 1 });

    expect(report.areas.map((row) => row.area)).toEqual(['BEDOK']);
  });

  it('uses reverse-geocoded descriptions where the lookup succeeded', async () => {
    const describeAll = vi.fn<AreaDescriber['describeAll']>(async () => [
      'Bedok North, Singapore',
      null,
      'Orchard Road, Singapore',
    ]);

    const report = await createService({ describer: { describeAll } }).run();

    expect(describeAll).toHaveBeenCalledTimes(1);
    expect(describeAll.mock.calls[0][0]).toHaveLength(3);
    expect(report.areas.map((row) => row.description)).toEqual([
      'Bedok North, Singapore',
      'Downtown planning area',
      'Orchard Road, Singapore',
    ]);
  });

  it('skips reverse geocoding when disabled', async () => {
    const describeAll = vi.fn<AreaDescriber['describeAll']>(async () => []);

    const report = await createService({ describer: { describeAll } }).run({ describe: false });

    expect(describeAll).not.toHaveBeenCalled();
    expect(report.areas[0].description).toBe('Bedok planning area');
  });

  it('fails when no taxi falls inside a planning area', async () => {
    const error = await createService({ positions: [{ lat: 1.35, lng: 103.87 }] })
      .run()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmptyResultError);
    expect(error).toMatchObject({
      message: 'None of 1 taxi positions fell inside any of 3 planning areas',
    });
  });

  it('fails when the taxi source is empty', async () => {
    await expect(createService({ positions: [] }).run()).rejects.toThrow(
      'Taxi source returned no positions'
    );
  });

  it('fails when the planning-area dataset is empty', async () => {
    await expect(createService({ areas: [] }).run()).rejects.toBeInstanceOf(LookupError);
  });

  it('reports on the usable areas when OneMap sends degenerate records', async () => {
    stubFetch(() => jsonResponse(ONEMAP_RESPONSE_WITH_DEGENERATE_RECORDS));
    const planningAreas = new PlanningAreaProvider(new HTTPClient({ maxRetries: 0 }), {
      url: 'https://www.onemap.gov.sg/api/public/popapi/getAllPlanningarea',
      token: 'test-token',
      year: 2019,
      timeoutMs: 1000,
    });

    const report = await createService({
      positions: [{ lat: 1.3, lng: 103.85 }],
      planningAreas,
    }).run();

    expect(report).toMatchObject({ assignedTaxis: 1, planningAreaCount: 1 });
    expect(report.areas.map((row) => row.area)).toEqual(['DOWNTOWN']);
  });

  it('propagates fetch failures', async () => {
    const failure = new FetchError(
      'Taxi availability request failed with HTTP 401 (check credentials)',
      'Taxi availability',
      'https://example.test',
      401
    );

    const service = createService({
      taxis: {
        fetchPositions: async () => {
          throw failure;
        },
      },
    });

    await expect(service.run()).rejects.toBe(failure);
  });
});
