/**
 * Area Resolver
 *
 * Assigns taxi positions to the planning area whose boundary contains
 * them. Areas are tested in dataset order and the first match wins, so a
 * position on a border shared by two areas always resolves to the same
 * one. Positions outside every area resolve to UNASSIGNED.
 *
 * Resolution is pure: the resolver holds no per-call state, and resolving
 * the same positions twice yields identical assignments.
 */

import { LookupError } from '../core/errors.js';
import {
  UNASSIGNED,
  isPointInBBox,
  type AreaAssignment,
  type AreaName,
  type PlanningArea,
  type TaxiPosition,
} from '../core/types.js';
import { PointInPolygonEngine } from './pip-engine.js';

export class AreaResolver {
  private readonly areas: readonly PlanningArea[];

  /**
   * @throws {LookupError} If the area set is empty or any boundary is malformed
   */
  constructor(
    areas: readonly PlanningArea[],
    private readonly engine: PointInPolygonEngine = new PointInPolygonEngine()
  ) {
    if (areas.length === 0) {
      throw new LookupError('Planning-area dataset is empty');
    }

    const problems: string[] = [];
    for (const [index, area] of areas.entries()) {
      if (area.name.trim().length === 0) {
        problems.push(`Area #${index} has no name`);
        continue;
      }
      for (const error of engine.validateGeometry(area.geometry)) {
        problems.push(`${area.name}: ${error}`);
      }
    }

    if (problems.length > 0) {
      throw new LookupError(
        `Planning-area dataset is malformed (${problems.length} problem${problems.length === 1 ? '' : 's'})`,
        problems
      );
    }

    this.areas = areas;
  }

  get areaCount(): number {
    return this.areas.length;
  }

  get areaNames(): AreaName[] {
    return this.areas.map((area) => area.name);
  }

  findArea(name: AreaName): PlanningArea | undefined {
    return this.areas.find((area) => area.name === name);
  }

  /**
   * Name of the first area containing the position, or UNASSIGNED
   */
  resolve(position: TaxiPosition): AreaName {
    for (const area of this.areas) {
      // Widened so points within boundary tolerance reach the engine
      if (!isPointInBBox(position, area.bbox, this.engine.tolerance)) {
        continue;
      }
      if (this.engine.isPointInPolygon(position, area.geometry)) {
        return area.name;
      }
    }
    return UNASSIGNED;
  }

  /**
   * Resolve every position, preserving input order
   */
  assignAll(positions: readonly TaxiPosition[]): AreaAssignment[] {
    return positions.map((position) => ({
      position,
      area: this.resolve(position),
    }));
  }
}
