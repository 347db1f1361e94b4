/**
 * Geocache Puzzle Kit - Coordinate Formatter
 *
 * Rounding policy:
 * - decimal: 6 fractional digits
 * - ddm: minutes to 0.001'
 * - dms: seconds to 0.001"
 *
 * Values are rounded as a whole number of the smallest printed unit before
 * being split into degrees/minutes/seconds, so a carry never prints 60.
 * Formatting a parsed formatted value gives the same string back.
 */

import { ArgumentError } from '../errors';
import { Coordinate, CoordinateFormat } from '../types';

const THOUSANDTHS_PER_MINUTE = 1000;
const THOUSANDTHS_PER_DEGREE_DDM = 60 * THOUSANDTHS_PER_MINUTE;
const THOUSANDTHS_PER_SECOND = 1000;
const THOUSANDTHS_PER_MINUTE_DMS = 60 * THOUSANDTHS_PER_SECOND;
const THOUSANDTHS_PER_DEGREE_DMS = 60 * THOUSANDTHS_PER_MINUTE_DMS;

function hemisphere(value: number, rounded: number, positive: string, negative: string): string {
  return value < 0 && rounded > 0 ? negative : positive;
}

function formatDdmAngle(value: number, positive: string, negative: string): string {
  const total = Math.round(Math.abs(value) * THOUSANDTHS_PER_DEGREE_DDM);
  const degrees = Math.floor(total / THOUSANDTHS_PER_DEGREE_DDM);
  const minutes = (total - degrees * THOUSANDTHS_PER_DEGREE_DDM) / THOUSANDTHS_PER_MINUTE;
  return `${hemisphere(value, total, positive, negative)} ${degrees}° ${minutes.toFixed(3)}'`;
}

function formatDmsAngle(value: number, positive: string, negative: string): string {
  const total = Math.round(Math.abs(value) * THOUSANDTHS_PER_DEGREE_DMS);
  const degrees = Math.floor(total / THOUSANDTHS_PER_DEGREE_DMS);
  const remainder = total - degrees * THOUSANDTHS_PER_DEGREE_DMS;
  const minutes = Math.floor(remainder / THOUSANDTHS_PER_MINUTE_DMS);
  const seconds = (remainder - minutes * THOUSANDTHS_PER_MINUTE_DMS) / THOUSANDTHS_PER_SECOND;
  return `${hemisphere(value, total, positive, negative)} ${degrees}° ${minutes}' ${seconds.toFixed(3)}"`;
}

function formatDecimalAngle(value: number): string {
  const fixed = value.toFixed(6);
  return fixed === '-0.000000' ? '0.000000' : fixed;
}

export function formatCoordinate(coord: Coordinate, format: CoordinateFormat = 'ddm'): string {
  switch (format) {
    case 'decimal':
      return `${formatDecimalAngle(coord.lat)}, ${formatDecimalAngle(coord.lon)}`;
    case 'ddm':
      return `${formatDdmAngle(coord.lat, 'N', 'S')} ${formatDdmAngle(coord.lon, 'E', 'W')}`;
    case 'dms':
      return `${formatDmsAngle(coord.lat, 'N', 'S')} ${formatDmsAngle(coord.lon, 'E', 'W')}`;
    default:
      throw new ArgumentError(`Unsupported coordinate format: ${String(format)}`, 'format');
  }
}
