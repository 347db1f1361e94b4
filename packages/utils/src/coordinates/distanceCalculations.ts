/**
 * Geocache Puzzle Kit - Distance Calculations
 *
 * Great-circle distance, bearing and waypoint projection on a spherical earth
 * of radius 6371 km.
 */

import { ArgumentError } from '../errors';
import {
  Coordinate,
  DistanceUnit,
  Measurement,
  EARTH_RADIUS_KM,
  KM_CONVERSION_FACTORS
} from '../types';
import { normalizeLongitude, toDeg, toRad } from './coordinateModel';

function conversionFactor(unit: DistanceUnit): number {
  const factor = KM_CONVERSION_FACTORS[unit];
  if (factor === undefined) {
    throw new ArgumentError(`Unsupported distance unit: ${String(unit)}`, 'unit');
  }
  return factor;
}

// Rounding can push haversine and asin arguments just outside their domain.
const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export function convertDistance(value: number, from: DistanceUnit, to: DistanceUnit): number {
  return (value / conversionFactor(from)) * conversionFactor(to);
}

/** Haversine distance in kilometres. */
export function greatCircleDistanceKm(a: Coordinate, b: Coordinate): number {
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);

  const h = clamp(
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2,
    0,
    1
  );

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_KM * c;
}

export function calculateDistance(
  a: Coordinate,
  b: Coordinate,
  unit: DistanceUnit = 'km'
): Measurement<DistanceUnit> {
  return {
    value: greatCircleDistanceKm(a, b) * conversionFactor(unit),
    unit
  };
}

/** Initial bearing from `from` towards `to`, degrees clockwise from north in [0, 360). */
export function calculateBearing(from: Coordinate, to: Coordinate): number {
  const dLon = toRad(to.lon - from.lon);
  const y = Math.sin(dLon) * Math.cos(toRad(to.lat));
  const x = Math.cos(toRad(from.lat)) * Math.sin(toRad(to.lat)) -
            Math.sin(toRad(from.lat)) * Math.cos(toRad(to.lat)) * Math.cos(dLon);

  return (toDeg(Math.atan2(y, x)) + 360) % 360;
}

/**
 * Destination reached by travelling `distance` from `origin` along the
 * great circle leaving at `bearing` (0 = north, clockwise).
 */
export function projectWaypoint(
  origin: Coordinate,
  distance: number,
  bearing: number,
  unit: DistanceUnit = 'km'
): Coordinate {
  if (!Number.isFinite(distance) || distance < 0) {
    throw new ArgumentError(`Distance must be a non-negative number, got ${distance}`, 'distance');
  }
  if (!Number.isFinite(bearing)) {
    throw new ArgumentError(`Bearing must be a finite number, got ${bearing}`, 'bearing');
  }

  const angular = convertDistance(distance, unit, 'km') / EARTH_RADIUS_KM;
  const lat1 = toRad(origin.lat);
  const lon1 = toRad(origin.lon);
  const brng = toRad(bearing);

  const lat2 = Math.asin(clamp(
    Math.sin(lat1) * Math.cos(angular) +
    Math.cos(lat1) * Math.sin(angular) * Math.cos(brng),
    -1,
    1
  ));
  const lon2 = lon1 + Math.atan2(
    Math.sin(brng) * Math.sin(angular) * Math.cos(lat1),
    Math.cos(angular) - Math.sin(lat1) * Math.sin(lat2)
  );

  return Object.freeze({ lat: toDeg(lat2), lon: normalizeLongitude(toDeg(lon2)) });
}
