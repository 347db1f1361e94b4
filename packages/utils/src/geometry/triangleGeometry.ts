/**
 * Geocache Puzzle Kit - Triangle Geometry
 *
 * Circumcenter and orthocenter use a planar approximation that treats
 * (lat, lon) as (x, y); at puzzle scale the error is well below the precision
 * of a GPS receiver. Lengths and areas are measured on the sphere.
 */

import { DegenerateGeometryError } from '../errors';
import {
  AreaUnit,
  Coordinate,
  DistanceUnit,
  Measurement,
  COLLINEAR_EPSILON
} from '../types';
import { isValidLatitude, isValidLongitude } from '../coordinates/coordinateModel';
import { calculateDistance, greatCircleDistanceKm, convertDistance } from '../coordinates/distanceCalculations';

const LINEAR_UNIT: Readonly<Record<AreaUnit, DistanceUnit>> = {
  'km²': 'km',
  'mi²': 'mi',
  'nm²': 'nm',
  'm²': 'm'
};

/** Twice the signed planar area of the triangle. */
function doubledSignedArea(a: Coordinate, b: Coordinate, c: Coordinate): number {
  return a.lat * (b.lon - c.lon) + b.lat * (c.lon - a.lon) + c.lat * (a.lon - b.lon);
}

function toCoordinate(lat: number, lon: number, what: string): Coordinate {
  if (!isValidLatitude(lat) || !isValidLongitude(lon)) {
    throw new DegenerateGeometryError(`The ${what} (${lat}, ${lon}) falls outside the valid coordinate range`);
  }
  return Object.freeze({ lat, lon });
}

/**
 * Center of the circle through three points.
 *
 * @throws DegenerateGeometryError when the points are collinear
 */
export function calculateCircumcenter(a: Coordinate, b: Coordinate, c: Coordinate): Coordinate {
  const d = 2 * doubledSignedArea(a, b, c);
  if (Math.abs(d) < COLLINEAR_EPSILON) {
    throw new DegenerateGeometryError('The three points are collinear (lie on a straight line)');
  }

  const sqA = a.lat ** 2 + a.lon ** 2;
  const sqB = b.lat ** 2 + b.lon ** 2;
  const sqC = c.lat ** 2 + c.lon ** 2;

  const lat = (sqA * (b.lon - c.lon) + sqB * (c.lon - a.lon) + sqC * (a.lon - b.lon)) / d;
  const lon = (sqA * (c.lat - b.lat) + sqB * (a.lat - c.lat) + sqC * (b.lat - a.lat)) / d;

  return toCoordinate(lat, lon, 'circumcenter');
}

/** Great-circle distance from the circumcenter to the triangle's corners. */
export function calculateCircumradius(
  a: Coordinate,
  b: Coordinate,
  c: Coordinate,
  unit: DistanceUnit = 'km'
): Measurement<DistanceUnit> {
  return calculateDistance(calculateCircumcenter(a, b, c), a, unit);
}

/** Intersection of the altitudes, from the Euler line: H = A + B + C - 2·O. */
export function calculateOrthocenter(a: Coordinate, b: Coordinate, c: Coordinate): Coordinate {
  const center = calculateCircumcenter(a, b, c);
  return toCoordinate(
    a.lat + b.lat + c.lat - 2 * center.lat,
    a.lon + b.lon + c.lon - 2 * center.lon,
    'orthocenter'
  );
}

/** Heron's formula over the three great-circle side lengths. */
export function calculateTriangleArea(
  a: Coordinate,
  b: Coordinate,
  c: Coordinate,
  unit: AreaUnit = 'km²'
): Measurement<AreaUnit> {
  const linear = LINEAR_UNIT[unit];
  const side = (p: Coordinate, q: Coordinate) => convertDistance(greatCircleDistanceKm(p, q), 'km', linear);

  const ab = side(a, b);
  const bc = side(b, c);
  const ca = side(c, a);
  const s = (ab + bc + ca) / 2;

  // Rounding can push the product of a flat triangle slightly negative.
  const product = Math.max(0, s * (s - ab) * (s - bc) * (s - ca));
  return { value: Math.sqrt(product), unit };
}
