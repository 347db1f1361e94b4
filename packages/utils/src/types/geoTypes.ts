/**
 * Geocache Puzzle Kit - Geographic Types
 *
 * Coordinates, measurement units and geometry settings.
 */

// ============================================================================
// COORDINATES
// ============================================================================

/** A point in decimal degrees: lat in [-90, 90], lon in [-180, 180]. */
export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

export const COORDINATE_FORMATS = ['decimal', 'ddm', 'dms'] as const;
export type CoordinateFormat = typeof COORDINATE_FORMATS[number];

export const LATITUDE_LIMIT_DEG = 90;
export const LONGITUDE_LIMIT_DEG = 180;

// ============================================================================
// UNITS & MEASUREMENTS
// ============================================================================

export const DISTANCE_UNITS = ['km', 'mi', 'nm', 'm'] as const;
export type DistanceUnit = typeof DISTANCE_UNITS[number];

export const AREA_UNITS = ['km²', 'mi²', 'nm²', 'm²'] as const;
export type AreaUnit = typeof AREA_UNITS[number];

export const EARTH_RADIUS_KM = 6371.0;

/** Length of one kilometre in each unit. */
export const KM_CONVERSION_FACTORS: Readonly<Record<DistanceUnit, number>> = {
  km: 1,
  mi: 0.621371,
  nm: 0.539957,
  m: 1000
};

export const UNIT_LABELS: Readonly<Record<DistanceUnit | AreaUnit, string>> = {
  km: 'kilometers',
  mi: 'miles',
  nm: 'nautical miles',
  m: 'meters',
  'km²': 'square kilometers',
  'mi²': 'square miles',
  'nm²': 'square nautical miles',
  'm²': 'square meters'
};

export interface Measurement<U extends DistanceUnit | AreaUnit> {
  value: number;
  unit: U;
}

// ============================================================================
// GEOMETRY
// ============================================================================

export interface BoundingBox {
  min_lat: number;
  min_lon: number;
  max_lat: number;
  max_lon: number;
}

export interface GeometrySettings {
  /** Largest point set or polygon accepted. */
  max_points: number;
}

export const DEFAULT_GEOMETRY_SETTINGS: GeometrySettings = {
  max_points: Number.POSITIVE_INFINITY
};

/** Determinant magnitude below which three points count as collinear. */
export const COLLINEAR_EPSILON = 1e-10;
