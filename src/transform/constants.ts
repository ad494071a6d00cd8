/**
 * Swiss Frame Constants and Auxiliary Units
 *
 * The approximation formulas work in auxiliary units centered on the old
 * observatory of Bern: 10 000 arc seconds on the geographic side and
 * 1 000 km on the projected side.
 */

// LV95 = LV03 + offset
export const LV95_NORTH_OFFSET = 1_000_000;
export const LV95_EAST_OFFSET = 2_000_000;

/**
 * Approximate bounding box of Switzerland in LV03 (meters)
 */
export const LV03_BOUNDS = {
  minNorth: 70_000,
  maxNorth: 300_000,
  minEast: 480_000,
  maxEast: 850_000,
} as const;

// Projection origin, in arc seconds and in LV03 meters
const ORIGIN_LATITUDE_SECONDS = 169_028.66;
const ORIGIN_LONGITUDE_SECONDS = 26_782.5;
const ORIGIN_NORTH = 200_000;
const ORIGIN_EAST = 600_000;

/**
 * Latitude in decimal degrees to auxiliary phi
 */
export function latitudeToAuxiliary(latitude: number): number {
  return (3600 * latitude - ORIGIN_LATITUDE_SECONDS) / 10_000;
}

/**
 * Longitude in decimal degrees to auxiliary lambda
 */
export function longitudeToAuxiliary(longitude: number): number {
  return (3600 * longitude - ORIGIN_LONGITUDE_SECONDS) / 10_000;
}

/**
 * LV03 northing to auxiliary x
 */
export function northToAuxiliary(north: number): number {
  return (north - ORIGIN_NORTH) / 1_000_000;
}

/**
 * LV03 easting to auxiliary y
 */
export function eastToAuxiliary(east: number): number {
  return (east - ORIGIN_EAST) / 1_000_000;
}

/**
 * The inverse formulas yield units of 10 000 arc seconds; scale to degrees
 */
export function auxiliaryToDegrees(value: number): number {
  return (value * 100) / 36;
}
