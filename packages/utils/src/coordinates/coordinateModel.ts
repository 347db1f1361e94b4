/**
 * Geocache Puzzle Kit - Coordinate Model
 *
 * Construction, range checks and angle helpers shared by the coordinate and
 * geometry libraries.
 */

import { ArgumentError } from '../errors';
import { Coordinate, LATITUDE_LIMIT_DEG, LONGITUDE_LIMIT_DEG } from '../types';

export const toRad = (deg: number) => deg * (Math.PI / 180);
export const toDeg = (rad: number) => rad * (180 / Math.PI);

/** Wrap a longitude into [-180, 180). */
export function normalizeLongitude(lon: number): number {
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

export function isValidLatitude(lat: number): boolean {
  return Number.isFinite(lat) && Math.abs(lat) <= LATITUDE_LIMIT_DEG;
}

export function isValidLongitude(lon: number): boolean {
  return Number.isFinite(lon) && Math.abs(lon) <= LONGITUDE_LIMIT_DEG;
}

export function createCoordinate(lat: number, lon: number): Coordinate {
  if (!isValidLatitude(lat)) {
    throw new ArgumentError(`Latitude must be within ±${LATITUDE_LIMIT_DEG}°, got ${lat}`, 'lat');
  }
  if (!isValidLongitude(lon)) {
    throw new ArgumentError(`Longitude must be within ±${LONGITUDE_LIMIT_DEG}°, got ${lon}`, 'lon');
  }
  return Object.freeze({ lat, lon });
}
