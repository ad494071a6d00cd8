/**
 * LV03 Projected Position
 *
 * Legacy Swiss national grid. Values only exist inside the approximate
 * bounding box of Switzerland, with easting always larger than northing.
 */

import { createLogger } from '../utils/logger.js';
import type { ProjectedPosition } from '../types.js';
import {
  LV03_BOUNDS,
  LV95_EAST_OFFSET,
  LV95_NORTH_OFFSET,
  auxiliaryToDegrees,
  eastToAuxiliary,
  northToAuxiliary,
} from './constants.js';
import { Lv95 } from './lv95.js';
import { Wgs84 } from './wgs84.js';

const logger = createLogger('lv03');

export class Lv03 implements ProjectedPosition {
  readonly frame = 'LV03' as const;

  private constructor(
    readonly north: number,
    readonly east: number,
    readonly altitude: number
  ) {}

  /**
   * Create an LV03 position.
   * Returns null for points outside Switzerland or with swapped axes.
   */
  static create(north: number, east: number, altitude: number): Lv03 | null {
    if (north < LV03_BOUNDS.minNorth || east < LV03_BOUNDS.minEast) {
      logger.debug({ north, east, altitude }, 'Rejected LV03 position below minimum extent');
      return null;
    }
    if (north > LV03_BOUNDS.maxNorth || east > LV03_BOUNDS.maxEast) {
      logger.debug({ north, east, altitude }, 'Rejected LV03 position above maximum extent');
      return null;
    }
    if (north > east) {
      logger.debug({ north, east, altitude }, 'Rejected LV03 position with swapped axes');
      return null;
    }

    return new Lv03(north, east, altitude);
  }

  static fromLv95(position: Lv95): Lv03 {
    return new Lv03(
      position.north - LV95_NORTH_OFFSET,
      position.east - LV95_EAST_OFFSET,
      position.altitude
    );
  }

  /**
   * Inverse projection to WGS84. Never fails.
   */
  toWgs84(): Wgs84 {
    const y = eastToAuxiliary(this.east);
    const y2 = y * y;
    const y3 = y * y2;
    const x = northToAuxiliary(this.north);
    const x2 = x * x;
    const x3 = x * x2;

    const lambda =
      2.6779094 + 4.728982 * y + 0.791484 * y * x + 0.1306 * y * x2 - 0.0436 * y3;
    const phi =
      16.9023892 +
      3.238272 * x -
      0.270978 * y2 -
      0.002528 * x2 -
      0.0447 * y2 * x -
      0.014 * x3;
    const altitude = this.altitude + 49.55 - 12.6 * y - 22.64 * x;

    return new Wgs84(auxiliaryToDegrees(lambda), auxiliaryToDegrees(phi), altitude);
  }

  toLv95(): Lv95 {
    return Lv95.fromLv03(this);
  }

  /**
   * Squared 3D distance, treating north/east/altitude as orthonormal axes
   */
  distanceSquared(other: Lv03): number {
    const dNorth = this.north - other.north;
    const dEast = this.east - other.east;
    const dAltitude = this.altitude - other.altitude;
    return dNorth * dNorth + dEast * dEast + dAltitude * dAltitude;
  }

  equals(other: Lv03): boolean {
    return (
      this.north === other.north &&
      this.east === other.east &&
      this.altitude === other.altitude
    );
  }
}
