/**
 * Point-in-Polygon Engine
 *
 * Ray-casting containment test for planning-area boundaries.
 *
 * Boundary policy: a point on an edge or vertex (within tolerance) is
 * inside. Callers that test several areas take the first match, so a point
 * on a shared border lands in whichever area comes first.
 */

import type { Position } from 'geojson';
import type { AreaGeometry, LatLng, PolygonRing } from '../core/types.js';

/** Degrees; roughly 0.1 mm at the equator */
export const DEFAULT_BOUNDARY_TOLERANCE = 1e-9;

export class PointInPolygonEngine {
  constructor(readonly tolerance: number = DEFAULT_BOUNDARY_TOLERANCE) {}

  /**
   * Test if point is inside polygon or on its boundary
   *
   * Algorithm: cast a horizontal ray eastward from the point and count
   * edge crossings; odd = inside. Holes (interior rings) are subtracted,
   * MultiPolygons match if any member matches.
   */
  isPointInPolygon(point: LatLng, geometry: AreaGeometry): boolean {
    if (this.isPointOnBoundary(point, geometry)) {
      return true;
    }

    if (geometry.type === 'Polygon') {
      return this.testPolygon(point, geometry.coordinates);
    }

    return geometry.coordinates.some((polygonCoords) =>
      this.testPolygon(point, polygonCoords)
    );
  }

  /**
   * Test if point lies on any ring of the geometry within tolerance
   */
  isPointOnBoundary(point: LatLng, geometry: AreaGeometry): boolean {
    const rings =
      geometry.type === 'Polygon'
        ? geometry.coordinates
        : geometry.coordinates.flat();

    return rings.some((ring) => this.isPointOnRing(point, ring));
  }

  /**
   * Validate polygon ring geometry
   *
   * @returns Validation errors (empty if valid)
   */
  validateRing(ring: PolygonRing): string[] {
    const errors: string[] = [];

    if (ring.length < 4) {
      errors.push(
        `Ring has ${ring.length} points, minimum 4 required (triangle + closure)`
      );
      if (ring.length === 0) {
        return errors;
      }
    }

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      errors.push('Ring is not closed (first point != last point)');
    }

    for (const position of ring) {
      if (!Number.isFinite(position[0]) || !Number.isFinite(position[1])) {
        errors.push(`Ring has non-numeric position [${position.join(', ')}]`);
        break;
      }
    }

    return errors;
  }

  /**
   * Validate every ring of a geometry
   */
  validateGeometry(geometry: AreaGeometry): string[] {
    const polygons =
      geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;

    if (polygons.length === 0 || polygons.some((rings) => rings.length === 0)) {
      return ['Geometry has no rings'];
    }

    return polygons.flatMap((rings) => rings.flatMap((ring) => this.validateRing(ring)));
  }

  /**
   * Inside the exterior ring and outside every hole
   */
  private testPolygon(point: LatLng, coordinates: Position[][]): boolean {
    const [exteriorRing, ...holes] = coordinates;
    if (!exteriorRing || !this.testRing(point, exteriorRing)) {
      return false;
    }

    return !holes.some((hole) => this.testRing(point, hole));
  }

  private testRing(point: LatLng, ring: PolygonRing): boolean {
    return this.countRayIntersections(point, ring) % 2 === 1;
  }

  /**
   * Count crossings of the eastward ray with the ring's edges
   *
   * GeoJSON positions are [lng, lat] (x, y). An edge counts when
   * min(y1, y2) <= py < max(y1, y2) and the crossing lies east of the
   * point; the half-open interval stops a vertex on the ray from being
   * counted twice. Horizontal edges never cross.
   */
  private countRayIntersections(point: LatLng, ring: PolygonRing): number {
    let intersections = 0;
    const px = point.lng;
    const py = point.lat;

    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      if (y1 === y2) {
        continue;
      }

      if (py < Math.min(y1, y2) || py >= Math.max(y1, y2)) {
        continue;
      }

      const t = (py - y1) / (y2 - y1);
      const xIntersection = x1 + t * (x2 - x1);

      if (xIntersection > px) {
        intersections++;
      }
    }

    return intersections;
  }

  private isPointOnRing(point: LatLng, ring: PolygonRing): boolean {
    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      if (this.pointToSegmentDistance(point.lng, point.lat, x1, y1, x2, y2) <= this.tolerance) {
        return true;
      }
    }

    return false;
  }

  /**
   * Euclidean distance (degrees) from point to segment
   */
  private pointToSegmentDistance(
    px: number,
    py: number,
    x1: number,
    y1: number,
    x2: number,
    y2: number
  ): number {
    const dx = x2 - x1;
    const dy = y2 - y1;
    const lengthSquared = dx * dx + dy * dy;

    if (lengthSquared === 0) {
      return Math.hypot(px - x1, py - y1);
    }

    // Projection parameter clamped to the segment
    const t = Math.max(0, Math.min(1, ((px - x1) * dx + (py - y1) * dy) / lengthSquared));

    return Math.hypot(px - (x1 + t * dx), py - (y1 + t * dy));
  }
}
