/**
 * Transform Module
 *
 * Conversions between WGS84, LV03 and LV95.
 */

export { Wgs84 } from './wgs84.js';
export { Lv03 } from './lv03.js';
export { Lv95 } from './lv95.js';

export {
  LV03_BOUNDS,
  LV95_NORTH_OFFSET,
  LV95_EAST_OFFSET,
} from './constants.js';

export { requireLv03, requireLv95, requireLv03FromWgs84 } from './checked.js';

export { projectSwissToWGS84, projectWGS84ToSwiss } from './projection.js';
