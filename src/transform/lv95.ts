/**
 * LV95 Projected Position
 *
 * Current Swiss national grid: LV03 shifted by +1 000 000 m north and
 * +2 000 000 m east.
 */

import type { ProjectedPosition } from '../types.js';
import { LV95_EAST_OFFSET, LV95_NORTH_OFFSET } from './constants.js';
import { Lv03 } from './lv03.js';
import type { Wgs84 } from './wgs84.js';

export class Lv95 implements ProjectedPosition {
  readonly frame = 'LV95' as const;

  private constructor(
    readonly north: number,
    readonly east: number,
    readonly altitude: number
  ) {}

  /**
   * Create an LV95 position from unshifted (LV03) coordinates.
   * Validated as LV03, then shifted; returns null where LV03 would.
   */
  static create(north: number, east: number, altitude: number): Lv95 | null {
    const lv03 = Lv03.create(north, east, altitude);
    return lv03 ? Lv95.fromLv03(lv03) : null;
  }

  static fromLv03(position: Lv03): Lv95 {
    return new Lv95(
      position.north + LV95_NORTH_OFFSET,
      position.east + LV95_EAST_OFFSET,
      position.altitude
    );
  }

  toLv03(): Lv03 {
    return Lv03.fromLv95(this);
  }

  toWgs84(): Wgs84 {
    return this.toLv03().toWgs84();
  }

  equals(other: Lv95): boolean {
    return (
      this.north === other.north &&
      this.east === other.east &&
      this.altitude === other.altitude
    );
  }
}
