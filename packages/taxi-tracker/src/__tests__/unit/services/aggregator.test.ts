/**
 * Aggregator Tests
 *
 * Counting, ranking order, centroids and map links for report rows.
 */

import { describe, it, expect } from 'vitest';
import { UNASSIGNED, type AreaAssignment, type PlanningArea } from '../../../core/types.js';
import { buildPlanningArea } from '../../../providers/planning-area-provider.js';
import {
  buildAreaCounts,
  centroidOf,
  compareRankedAreas,
  countByArea,
  rankAreaCounts,
} from '../../../services/aggregator.js';
import { AreaResolver } from '../../../services/area-resolver.js';
import { TAXI_COORDINATES } from '../../fixtures/api-responses/data-gov-sg.js';
import {
  BEDOK_GEOMETRY,
  DOWNTOWN_GEOMETRY,
  ORCHARD_GEOMETRY,
} from '../../fixtures/api-responses/onemap.js';

const MAPS = 'https://www.google.com/maps/search/?api=1&query=';

const AREAS: PlanningArea[] = [
  buildPlanningArea('DOWNTOWN', DOWNTOWN_GEOMETRY),
  buildPlanningArea('ORCHARD', ORCHARD_GEOMETRY),
  buildPlanningArea('BEDOK', BEDOK_GEOMETRY),
];

function findArea(name: string): PlanningArea | undefined {
  return AREAS.find((area) => area.name === name);
}

function assignment(area: string, lat = 1.3, lng = 103.85): AreaAssignment {
  return { position: { lat, lng }, area };
}

describe('countByArea', () => {
  it('counts assignments per area', () => {
    const counts = countByArea([assignment('A'), assignment('B'), assignment('A')]);
    expect([...counts.entries()]).toEqual([
      ['A', 2],
      ['B', 1],
    ]);
  });

  it('never counts unassigned positions', () => {
    const counts = countByArea([assignment(UNASSIGNED), assignment('A'), assignment(UNASSIGNED)]);
    expect(counts.has(UNASSIGNED)).toBe(false);
    expect(counts.get('A')).toBe(1);
  });
});

describe('rankAreaCounts', () => {
  it('orders by count, then by name', () => {
    const ranked = rankAreaCounts(
      new Map([
        ['C', 3],
        ['B', 5],
        ['A', 5],
      ])
    );

    expect(ranked).toEqual([
      { area: 'A', count: 5 },
      { area: 'B', count: 5 },
      { area: 'C', count: 3 },
    ]);
  });

  it('keeps only the top k', () => {
    const ranked = rankAreaCounts(
      new Map([
        ['C', 3],
        ['B', 5],
        ['A', 5],
      ]),
      2
    );

    expect(ranked.map((r) => r.area)).toEqual(['A', 'B']);
  });

  it('does not pad when fewer areas than k have taxis', () => {
    const ranked = rankAreaCounts(
      new Map([
        ['A', 1],
        ['B', 2],
      ]),
      10
    );

    expect(ranked).toHaveLength(2);
  });

  it('drops zero counts and the unassigned bucket', () => {
    const ranked = rankAreaCounts(
      new Map([
        ['A', 0],
        [UNASSIGNED, 40],
        ['B', 2],
      ])
    );

    expect(ranked).toEqual([{ area: 'B', count: 2 }]);
  });

  it('rejects a non-positive or fractional k', () => {
    expect(() => rankAreaCounts(new Map(), 0)).toThrow(RangeError);
    expect(() => rankAreaCounts(new Map(), 1.5)).toThrow('topK must be a positive integer, got 1.5');
  });
});

describe('compareRankedAreas', () => {
  it('breaks ties by code-unit order', () => {
    const sorted = [
      { area: 'a', count: 1 },
      { area: 'Z', count: 1 },
    ].sort(compareRankedAreas);

    expect(sorted.map((r) => r.area)).toEqual(['Z', 'a']);
  });
});

describe('centroidOf', () => {
  it('returns null without points', () => {
    expect(centroidOf([])).toBeNull();
  });

  it('averages the points', () => {
    const center = centroidOf([
      { lat: 1.3, lng: 103.85 },
      { lat: 1.29, lng: 103.845 },
    ]);

    expect(center?.lat).toBeCloseTo(1.295, 9);
    expect(center?.lng).toBeCloseTo(103.8475, 9);
  });
});

describe('buildAreaCounts', () => {
  const resolver = new AreaResolver(AREAS);
  const assignments = resolver.assignAll(TAXI_COORDINATES.map(([lng, lat]) => ({ lat, lng })));

  it('builds ranked rows with taxi centroids and map links', () => {
    const rows = buildAreaCounts(rankAreaCounts(countByArea(assignments)), assignments, findArea);

    expect(rows.map(({ rank, area, count, description, mapLink }) => ({
      rank,
      area,
      count,
      description,
      mapLink,
    }))).toEqual([
      {
        rank: 1,
        area: 'BEDOK',
        count: 2,
        description: 'Bedok planning area',
        mapLink: `${MAPS}1.312500,103.942500`,
      },
      {
        rank: 2,
        area: 'DOWNTOWN',
        count: 2,
        description: 'Downtown planning area',
        mapLink: `${MAPS}1.295000,103.847500`,
      },
      {
        rank: 3,
        area: 'ORCHARD',
        count: 1,
        description: 'Orchard planning area',
        mapLink: `${MAPS}1.300000,103.830000`,
      },
    ]);
  });

  it('falls back to the boundary centroid without positions', () => {
    const [row] = buildAreaCounts([{ area: 'DOWNTOWN', count: 1 }], [], findArea);

    expect(row.mapLink).toBe(`${MAPS}1.295000,103.850000`);
  });

  it('searches by name for an unknown area', () => {
    const [row] = buildAreaCounts([{ area: 'MYSTERY', count: 1 }], [], findArea);

    expect(row).toEqual({
      rank: 1,
      area: 'MYSTERY',
      count: 1,
      description: 'MYSTERY',
      centroid: null,
      mapLink: `${MAPS}MYSTERY%2C%20Singapore`,
    });
  });
});
