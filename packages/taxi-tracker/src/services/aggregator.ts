/**
 * Aggregator
 *
 * Counts assigned taxis per planning area, ranks the areas and turns the
 * top entries into report rows with a centroid and a map link.
 *
 * Ranking order: count descending, then area name ascending (code-unit
 * order, independent of locale). UNASSIGNED is never counted.
 */

import { centroid, multiPoint } from '@turf/turf';
import {
  UNASSIGNED,
  type AreaAssignment,
  type AreaCount,
  type AreaName,
  type LatLng,
  type PlanningArea,
} from '../core/types.js';
import { buildMapLink } from './maps-link.js';

export const DEFAULT_TOP_K = 10;

export interface RankedArea {
  readonly area: AreaName;
  readonly count: number;
}

/**
 * Taxi count per area, UNASSIGNED excluded
 */
export function countByArea(assignments: readonly AreaAssignment[]): Map<AreaName, number> {
  const counts = new Map<AreaName, number>();
  for (const { area } of assignments) {
    if (area === UNASSIGNED) continue;
    counts.set(area, (counts.get(area) ?? 0) + 1);
  }
  return counts;
}

export function compareRankedAreas(a: RankedArea, b: RankedArea): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.area === b.area) {
    return 0;
  }
  return a.area < b.area ? -1 : 1;
}

/**
 * Sort areas by count and keep the first topK (no padding)
 */
export function rankAreaCounts(
  counts: ReadonlyMap<AreaName, number>,
  topK: number = DEFAULT_TOP_K
): RankedArea[] {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}`);
  }

  return [...counts.entries()]
    .filter(([area, count]) => area !== UNASSIGNED && count > 0)
    .map(([area, count]) => ({ area, count }))
    .sort(compareRankedAreas)
    .slice(0, topK);
}

/**
 * Mean position of a set of points
 */
export function centroidOf(points: readonly LatLng[]): LatLng | null {
  if (points.length === 0) {
    return null;
  }
  const [lng, lat] = centroid(multiPoint(points.map((p) => [p.lng, p.lat]))).geometry.coordinates;
  return { lat, lng };
}

function areaCentroid(area: PlanningArea): LatLng {
  const [lng, lat] = centroid(area.geometry).geometry.coordinates;
  return { lat, lng };
}

/**
 * Turn ranked areas into report rows
 *
 * The map link points at the centroid of the area's taxis. Without
 * assigned positions it falls back to the boundary's centroid, and
 * without a known boundary to a search for the area name.
 */
export function buildAreaCounts(
  ranked: readonly RankedArea[],
  assignments: readonly AreaAssignment[],
  findArea: (name: AreaName) => PlanningArea | undefined
): AreaCount[] {
  const positionsByArea = new Map<AreaName, LatLng[]>();
  for (const { area, position } of assignments) {
    const bucket = positionsByArea.get(area);
    if (bucket) {
      bucket.push(position);
    } else {
      positionsByArea.set(area, [position]);
    }
  }

  return ranked.map(({ area, count }, index): AreaCount => {
    const planningArea = findArea(area);
    const center =
      centroidOf(positionsByArea.get(area) ?? []) ??
      (planningArea ? areaCentroid(planningArea) : null);

    return {
      rank: index + 1,
      area,
      count,
      description: planningArea?.description ?? area,
      centroid: center,
      mapLink: buildMapLink(center ?? area),
    };
  });
}
