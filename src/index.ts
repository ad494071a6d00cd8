/**
 * swiss-grid
 *
 * Convert positions between WGS84 and the Swiss national grids LV03 and LV95.
 */

// Positions and conversions
export {
  Wgs84,
  Lv03,
  Lv95,
  LV03_BOUNDS,
  LV95_NORTH_OFFSET,
  LV95_EAST_OFFSET,
  requireLv03,
  requireLv95,
  requireLv03FromWgs84,
  projectSwissToWGS84,
  projectWGS84ToSwiss,
} from './transform/index.js';

// Types
export type {
  GeographicPosition,
  ProjectedPosition,
  SwissEpsg,
  PlanarCoordinates,
  GeographicCoordinates,
} from './types.js';

// Error types
export {
  SwissGridError,
  CoordinateRangeError,
  ProjectionError,
} from './utils/errors.js';

// Logger
export { createLogger, setLogLevel } from './utils/logger.js';
