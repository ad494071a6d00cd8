/**
 * swiss-grid Type Definitions
 */

// ============================================================================
// Positions
// ============================================================================

/**
 * Geographic position on the WGS84 ellipsoid
 */
export interface GeographicPosition {
  /** Decimal degrees, positive east */
  readonly longitude: number;

  /** Decimal degrees, positive north */
  readonly latitude: number;

  /** Meters */
  readonly altitude: number;
}

/**
 * Position in one of the Swiss projected frames (LV03 or LV95)
 */
export interface ProjectedPosition {
  /** Northing in meters (X in Swiss notation) */
  readonly north: number;

  /** Easting in meters (Y in Swiss notation) */
  readonly east: number;

  /** Meters */
  readonly altitude: number;
}

// ============================================================================
// Reference projection
// ============================================================================

/** EPSG codes of the Swiss frames: 21781 is LV03, 2056 is LV95 */
export type SwissEpsg = 21781 | 2056;

export interface PlanarCoordinates {
  easting: number;
  northing: number;
}

export interface GeographicCoordinates {
  longitude: number;
  latitude: number;
}
