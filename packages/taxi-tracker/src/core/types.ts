/**
 * Taxi Tracker Types
 *
 * Plain data records passed between the pipeline stages:
 * fetch (TaxiPosition, PlanningArea) → resolve (AreaAssignment) →
 * aggregate (AreaCount, TaxiReport).
 *
 * All records are immutable once created.
 */

import type { Polygon, MultiPolygon, Position } from 'geojson';

/**
 * Lat/Lng Point
 */
export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

/**
 * Available taxi at fetch time. Discarded after assignment.
 */
export type TaxiPosition = LatLng;

/**
 * Bounding Box [minLng, minLat, maxLng, maxLat]
 */
export type BBox = readonly [number, number, number, number];

/**
 * Polygon ring as GeoJSON positions ([lng, lat], closed)
 */
export type PolygonRing = Position[];

/**
 * Planning-area boundary geometry
 */
export type AreaGeometry = Polygon | MultiPolygon;

/**
 * Official planning area with its boundary
 */
export interface PlanningArea {
  readonly name: string;
  readonly geometry: AreaGeometry;
  readonly description: string;
  readonly bbox: BBox;
}

/**
 * Sentinel area name for positions outside every planning area
 */
export const UNASSIGNED = 'unassigned';

export type AreaName = string;

/**
 * Result of resolving one taxi position
 */
export interface AreaAssignment {
  readonly position: TaxiPosition;
  readonly area: AreaName;
}

/**
 * One row of the ranked report
 */
export interface AreaCount {
  readonly rank: number;
  readonly area: AreaName;
  readonly count: number;
  readonly description: string;
  /** Mean taxi position; null only when neither taxis nor a boundary are known */
  readonly centroid: LatLng | null;
  readonly mapLink: string;
}

/**
 * Full output of a pipeline run
 */
export interface TaxiReport {
  readonly generatedAt: string;
  readonly totalTaxis: number;
  readonly assignedTaxis: number;
  readonly unassignedTaxis: number;
  readonly planningAreaCount: number;
  readonly areas: readonly AreaCount[];
}

/**
 * Check if point is inside bounding box
 *
 * Fast pre-filter before the ray-casting test. `margin` (degrees) widens
 * the box on every side.
 */
export function isPointInBBox(point: LatLng, bbox: BBox, margin = 0): boolean {
  const [minLng, minLat, maxLng, maxLat] = bbox;
  return (
    point.lng >= minLng - margin &&
    point.lng <= maxLng + margin &&
    point.lat >= minLat - margin &&
    point.lat <= maxLat + margin
  );
}
