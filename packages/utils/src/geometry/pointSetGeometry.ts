/**
 * Geocache Puzzle Kit - Point Set Geometry
 *
 * Midpoint, centroid, bounding box and point-in-polygon.
 *
 * Known limitation: centroid and bounding box work on raw lat/lon values and
 * do not unwrap longitude, so sets that straddle the antimeridian (±180°)
 * give a result on the wrong side of the globe.
 */

import { ArgumentError, DegenerateGeometryError } from '../errors';
import {
  BoundingBox,
  Coordinate,
  GeometrySettings,
  DEFAULT_GEOMETRY_SETTINGS
} from '../types';
import { normalizeLongitude, toDeg, toRad } from '../coordinates/coordinateModel';

const ON_EDGE_EPSILON = 1e-12;

function validatePointSet(points: readonly Coordinate[], settings: GeometrySettings, field: string): void {
  if (points.length === 0) {
    throw new ArgumentError(`${field} must contain at least one point`, field);
  }
  if (points.length > settings.max_points) {
    throw new ArgumentError(
      `${field} has ${points.length} points, more than the limit of ${settings.max_points}`,
      field
    );
  }
}

/** Great-circle midpoint. Unlike an arithmetic mean it is correct across the antimeridian. */
export function calculateMidpoint(a: Coordinate, b: Coordinate): Coordinate {
  const lat1 = toRad(a.lat);
  const lat2 = toRad(b.lat);
  const lon1 = toRad(a.lon);
  const dLon = toRad(b.lon - a.lon);

  const bx = Math.cos(lat2) * Math.cos(dLon);
  const by = Math.cos(lat2) * Math.sin(dLon);

  const lat = Math.atan2(Math.sin(lat1) + Math.sin(lat2), Math.sqrt((Math.cos(lat1) + bx) ** 2 + by ** 2));
  const lon = lon1 + Math.atan2(by, Math.cos(lat1) + bx);

  return Object.freeze({ lat: toDeg(lat), lon: normalizeLongitude(toDeg(lon)) });
}

/** Arithmetic mean of latitudes and longitudes. */
export function calculateCentroid(
  points: readonly Coordinate[],
  settings: GeometrySettings = DEFAULT_GEOMETRY_SETTINGS
): Coordinate {
  validatePointSet(points, settings, 'points');

  let sumLat = 0;
  let sumLon = 0;
  for (const point of points) {
    sumLat += point.lat;
    sumLon += point.lon;
  }
  return Object.freeze({ lat: sumLat / points.length, lon: sumLon / points.length });
}

export function calculateBoundingBox(
  points: readonly Coordinate[],
  settings: GeometrySettings = DEFAULT_GEOMETRY_SETTINGS
): BoundingBox {
  validatePointSet(points, settings, 'points');

  const box: BoundingBox = {
    min_lat: points[0].lat,
    min_lon: points[0].lon,
    max_lat: points[0].lat,
    max_lon: points[0].lon
  };
  for (const point of points) {
    box.min_lat = Math.min(box.min_lat, point.lat);
    box.min_lon = Math.min(box.min_lon, point.lon);
    box.max_lat = Math.max(box.max_lat, point.lat);
    box.max_lon = Math.max(box.max_lon, point.lon);
  }
  return box;
}

function isOnSegment(point: Coordinate, start: Coordinate, end: Coordinate): boolean {
  const cross =
    (end.lat - start.lat) * (point.lon - start.lon) -
    (end.lon - start.lon) * (point.lat - start.lat);
  if (Math.abs(cross) > ON_EDGE_EPSILON) return false;

  return (
    point.lat >= Math.min(start.lat, end.lat) - ON_EDGE_EPSILON &&
    point.lat <= Math.max(start.lat, end.lat) + ON_EDGE_EPSILON &&
    point.lon >= Math.min(start.lon, end.lon) - ON_EDGE_EPSILON &&
    point.lon <= Math.max(start.lon, end.lon) + ON_EDGE_EPSILON
  );
}

/**
 * Even-odd ray casting over the ordered vertex ring, in planar lat/lon.
 * A point on an edge or a vertex counts as inside.
 *
 * @throws DegenerateGeometryError for fewer than three vertices
 */
export function isPointInPolygon(
  point: Coordinate,
  polygon: readonly Coordinate[],
  settings: GeometrySettings = DEFAULT_GEOMETRY_SETTINGS
): boolean {
  validatePointSet(polygon, settings, 'polygon');
  if (polygon.length < 3) {
    throw new DegenerateGeometryError(`A polygon needs at least 3 vertices, got ${polygon.length}`);
  }

  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const vi = polygon[i];
    const vj = polygon[j];

    if (isOnSegment(point, vj, vi)) return true;

    const crosses =
      (vi.lon > point.lon) !== (vj.lon > point.lon) &&
      point.lat < ((vj.lat - vi.lat) * (point.lon - vi.lon)) / (vj.lon - vi.lon) + vi.lat;
    if (crosses) inside = !inside;
  }
  return inside;
}
