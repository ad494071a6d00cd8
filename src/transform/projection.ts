/**
 * Reference Projection using proj4
 *
 * Rigorous conversion between the Swiss frames and WGS84 (Bessel ellipsoid,
 * oblique Mercator, datum shift). Only the planar axes are converted.
 */

import proj4 from 'proj4';
import { ProjectionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { GeographicCoordinates, PlanarCoordinates, SwissEpsg } from '../types.js';

const logger = createLogger('projection');

// WGS84 definition (EPSG:4326)
const WGS84 = 'EPSG:4326';

const SWISS_DEFINITIONS: Record<SwissEpsg, string> = {
  // CH1903 / LV03
  21781:
    '+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 ' +
    '+x_0=600000 +y_0=200000 +ellps=bessel ' +
    '+towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs',
  // CH1903+ / LV95
  2056:
    '+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 ' +
    '+x_0=2600000 +y_0=1200000 +ellps=bessel ' +
    '+towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs',
};

for (const [epsg, definition] of Object.entries(SWISS_DEFINITIONS)) {
  proj4.defs(`EPSG:${epsg}`, definition);
  logger.debug({ epsg, definition }, 'Registered Swiss EPSG definition');
}

function isSwissEpsg(epsg: number): epsg is SwissEpsg {
  return epsg === 21781 || epsg === 2056;
}

/**
 * Get the proj4 name for a Swiss EPSG code
 */
function getSwissProjection(epsg: number): string {
  if (!isSwissEpsg(epsg)) {
    throw new ProjectionError(
      `Unsupported EPSG code: ${epsg}. Expected 21781 (LV03) or 2056 (LV95).`,
      { epsg }
    );
  }
  return `EPSG:${epsg}`;
}

/**
 * Run one proj4 conversion. proj4 signals some failures by throwing and
 * others by returning NaN or Infinity; both become a ProjectionError.
 */
function convertPair(
  from: string,
  to: string,
  pair: [number, number],
  details: Record<string, number>
): [number, number] {
  let result: number[];
  try {
    result = proj4(from, to, pair);
  } catch (error) {
    throw new ProjectionError(`Failed to project coordinates from ${from} to ${to}`, {
      ...details,
      error,
    });
  }

  const [first, second] = result;
  if (!Number.isFinite(first) || !Number.isFinite(second)) {
    throw new ProjectionError(
      `Projection from ${from} to ${to} produced non-finite coordinates`,
      details
    );
  }
  return [first, second];
}

/**
 * Convert Swiss projected coordinates (Easting/Northing) to WGS84 (lon/lat)
 */
export function projectSwissToWGS84(
  easting: number,
  northing: number,
  epsg: number
): GeographicCoordinates {
  const [longitude, latitude] = convertPair(
    getSwissProjection(epsg),
    WGS84,
    [easting, northing],
    { easting, northing, epsg }
  );

  logger.debug({ easting, northing, epsg, longitude, latitude }, 'Projected Swiss grid to WGS84');
  return { longitude, latitude };
}

/**
 * Convert WGS84 (lon/lat) to Swiss projected coordinates (Easting/Northing)
 */
export function projectWGS84ToSwiss(
  longitude: number,
  latitude: number,
  epsg: number
): PlanarCoordinates {
  const [easting, northing] = convertPair(
    WGS84,
    getSwissProjection(epsg),
    [longitude, latitude],
    { longitude, latitude, epsg }
  );

  logger.debug({ longitude, latitude, epsg, easting, northing }, 'Projected WGS84 to Swiss grid');
  return { easting, northing };
}
