/**
 * Route Geometry
 * Immutable planned path: decoded points, cumulative distance along the path and
 * the maneuvers anchored to it. All progress math happens on the 1-D distance line.
 */

import { Coordinates, Maneuver } from '../types/navigation.js';
import { calculateDistance, validateCoordinates } from '../utils/distance.js';
import { RouteError } from '../utils/errors.js';

export interface RouteGeometryInit {
  points: readonly Coordinates[];
  cumulativeDistance: readonly number[];
  maneuvers: readonly Maneuver[];
  totalDistance?: number;
}

export interface NearestPoint {
  index: number;
  distanceMeters: number;
}

const TOTAL_DISTANCE_TOLERANCE = 1e-6;

export class RouteGeometry {
  readonly points: readonly Coordinates[];
  readonly cumulativeDistance: readonly number[];
  readonly maneuvers: readonly Maneuver[];
  readonly totalDistance: number;

  constructor(init: RouteGeometryInit) {
    validateGeometry(init);

    this.points = Object.freeze(init.points.map((point) => Object.freeze({ lat: point.lat, lng: point.lng })));
    this.cumulativeDistance = Object.freeze([...init.cumulativeDistance]);
    this.maneuvers = Object.freeze(init.maneuvers.map((maneuver) => Object.freeze({ ...maneuver })));
    this.totalDistance = this.cumulativeDistance.length
      ? this.cumulativeDistance[this.cumulativeDistance.length - 1]
      : 0;
  }

  /**
   * Build a geometry from decoded points, measuring each segment with haversine
   */
  static fromPoints(points: readonly Coordinates[], maneuvers: readonly Maneuver[] = []): RouteGeometry {
    const cumulativeDistance: number[] = [];
    let total = 0;
    points.forEach((point, index) => {
      if (index > 0) {
        total += calculateDistance(points[index - 1], point);
      }
      cumulativeDistance.push(total);
    });
    return new RouteGeometry({ points, cumulativeDistance, maneuvers });
  }

  get lastIndex(): number {
    return Math.max(0, this.points.length - 1);
  }

  /** Fewer than two points: nothing to guide along */
  get isDegenerate(): boolean {
    return this.points.length < 2;
  }

  get destination(): Coordinates | undefined {
    return this.points[this.points.length - 1];
  }

  pointAt(index: number): Coordinates | undefined {
    if (!this.points.length) return undefined;
    return this.points[this.clampIndex(index)];
  }

  nearestPointIndex(location: Coordinates): number {
    return this.nearestInRange(location, 0, this.lastIndex)?.index ?? 0;
  }

  /**
   * Nearest point within an inclusive index window (clamped to the route).
   * Ties resolve to the lowest index.
   */
  nearestInRange(location: Coordinates, start: number, end: number): NearestPoint | null {
    if (!this.points.length) return null;

    const from = this.clampIndex(start);
    const to = this.clampIndex(end);
    if (from > to) return null;

    let nearestIndex = from;
    let minDistance = Infinity;
    for (let i = from; i <= to; i += 1) {
      const distance = calculateDistance(location, this.points[i]);
      if (distance < minDistance) {
        minDistance = distance;
        nearestIndex = i;
      }
    }

    return { index: nearestIndex, distanceMeters: minDistance };
  }

  distanceAtIndex(index: number): number {
    if (index < 0) return 0;
    if (!Number.isFinite(index) || index >= this.cumulativeDistance.length) {
      return this.totalDistance;
    }
    return this.cumulativeDistance[Math.trunc(index)];
  }

  remainingDistance(fromIndex: number): number {
    return Math.max(0, this.totalDistance - this.distanceAtIndex(fromIndex));
  }

  nextManeuver(fromIndex: number): Maneuver | undefined {
    // maneuvers are sorted by pointIndex, so binary search for the first one past fromIndex
    let low = 0;
    let high = this.maneuvers.length;
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      if (this.maneuvers[mid].pointIndex > fromIndex) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }
    return this.maneuvers[low];
  }

  distanceToNextManeuver(fromIndex: number): number {
    const next = this.nextManeuver(fromIndex);
    if (!next) return 0;
    return Math.max(0, this.distanceAtIndex(next.pointIndex) - this.distanceAtIndex(fromIndex));
  }

  private clampIndex(index: number): number {
    if (!Number.isFinite(index)) return index > 0 ? this.lastIndex : 0;
    return Math.max(0, Math.min(this.lastIndex, Math.trunc(index)));
  }
}

function validateGeometry(init: RouteGeometryInit): void {
  const { points, cumulativeDistance, maneuvers, totalDistance } = init;

  if (points.length !== cumulativeDistance.length) {
    throw RouteError.malformed(
      `${points.length} points but ${cumulativeDistance.length} cumulative distances`
    );
  }

  points.forEach((point, index) => {
    if (!validateCoordinates(point)) {
      throw RouteError.malformed(`point ${index} is not a valid coordinate`);
    }
  });

  cumulativeDistance.forEach((distance, index) => {
    if (!Number.isFinite(distance)) {
      throw RouteError.malformed(`cumulative distance ${index} is not finite`);
    }
    if (index === 0 && distance !== 0) {
      throw RouteError.malformed(`cumulative distance must start at 0, got ${distance}`);
    }
    if (index > 0 && distance < cumulativeDistance[index - 1]) {
      throw RouteError.malformed(
        `cumulative distance decreases at index ${index} (${cumulativeDistance[index - 1]} -> ${distance})`
      );
    }
  });

  maneuvers.forEach((maneuver, index) => {
    if (!Number.isInteger(maneuver.pointIndex) || maneuver.pointIndex < 0 || maneuver.pointIndex >= points.length) {
      throw RouteError.malformed(
        `maneuver ${index} references point ${maneuver.pointIndex} outside 0..${points.length - 1}`
      );
    }
    if (index > 0 && maneuver.pointIndex <= maneuvers[index - 1].pointIndex) {
      throw RouteError.malformed(`maneuver ${index} is not after maneuver ${index - 1}`);
    }
  });

  if (totalDistance !== undefined) {
    const last = cumulativeDistance.length ? cumulativeDistance[cumulativeDistance.length - 1] : 0;
    if (!Number.isFinite(totalDistance) || Math.abs(totalDistance - last) > TOTAL_DISTANCE_TOLERANCE * Math.max(1, last)) {
      throw RouteError.malformed(`total distance ${totalDistance} does not match last cumulative distance ${last}`);
    }
  }
}
