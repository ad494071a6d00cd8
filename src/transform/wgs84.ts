/**
 * WGS84 Geographic Position
 *
 * Forward projection to the Swiss frames using the swisstopo approximation
 * formulas (accurate to about one meter inside Switzerland).
 */

import type { GeographicPosition } from '../types.js';
import { latitudeToAuxiliary, longitudeToAuxiliary } from './constants.js';
import { Lv03 } from './lv03.js';
import type { Lv95 } from './lv95.js';

export class Wgs84 implements GeographicPosition {
  constructor(
    readonly longitude: number,
    readonly latitude: number,
    readonly altitude: number
  ) {}

  /**
   * Project to LV03.
   * Returns null when the result lies outside the LV03 bounding region.
   */
  toLv03(): Lv03 | null {
    const phi = latitudeToAuxiliary(this.latitude);
    const phi2 = phi * phi;
    const phi3 = phi * phi2;
    const lambda = longitudeToAuxiliary(this.longitude);
    const lambda2 = lambda * lambda;
    const lambda3 = lambda * lambda2;

    // LV95 easting/northing
    const e =
      2_600_072.37 +
      211_455.93 * lambda -
      10938.51 * lambda * phi -
      0.36 * lambda * phi2 -
      44.54 * lambda3;
    const n =
      1_200_147.07 +
      308_807.95 * phi +
      3745.25 * lambda2 +
      76.63 * phi2 -
      194.56 * lambda2 * phi +
      119.79 * phi3;

    const y = e - 2_000_000.0;
    const x = n - 1_000_000.0;
    const altitude = this.altitude - 49.55 + 2.73 * lambda + 6.94 * phi;

    return Lv03.create(x, y, altitude);
  }

  toLv95(): Lv95 | null {
    const lv03 = this.toLv03();
    return lv03 ? lv03.toLv95() : null;
  }

  equals(other: Wgs84): boolean {
    return (
      this.longitude === other.longitude &&
      this.latitude === other.latitude &&
      this.altitude === other.altitude
    );
  }
}
