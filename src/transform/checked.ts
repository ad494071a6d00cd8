/**
 * Throwing counterparts of the nullable constructors
 */

import { CoordinateRangeError } from '../utils/errors.js';
import { Lv03 } from './lv03.js';
import { Lv95 } from './lv95.js';
import type { Wgs84 } from './wgs84.js';

const OUT_OF_RANGE = 'Position is outside the Swiss LV03 bounding region';

export function requireLv03(north: number, east: number, altitude: number): Lv03 {
  const position = Lv03.create(north, east, altitude);
  if (!position) {
    throw new CoordinateRangeError(OUT_OF_RANGE, { north, east, altitude });
  }
  return position;
}

export function requireLv95(north: number, east: number, altitude: number): Lv95 {
  const position = Lv95.create(north, east, altitude);
  if (!position) {
    throw new CoordinateRangeError(OUT_OF_RANGE, { north, east, altitude });
  }
  return position;
}

export function requireLv03FromWgs84(position: Wgs84): Lv03 {
  const projected = position.toLv03();
  if (!projected) {
    const { longitude, latitude, altitude } = position;
    throw new CoordinateRangeError(OUT_OF_RANGE, { longitude, latitude, altitude });
  }
  return projected;
}
