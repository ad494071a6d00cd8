/**
 * Custom Error Types for swiss-grid
 */

export class SwissGridError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SwissGridError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A position does not fall inside the Swiss LV03 bounding region.
 * Carries the raw inputs only; the failed bound is not reported.
 */
export class CoordinateRangeError extends SwissGridError {
  constructor(message: string, details?: unknown) {
    super(message, 'COORDINATE_RANGE', details);
    this.name = 'CoordinateRangeError';
  }
}

export class ProjectionError extends SwissGridError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROJECTION_ERROR', details);
    this.name = 'ProjectionError';
  }
}
