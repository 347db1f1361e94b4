/**
 * Geocache Puzzle Kit - Coordinates Module
 *
 * Parsing, formatting, distance and projection.
 */

export {
  createCoordinate,
  normalizeLongitude,
  isValidLatitude,
  isValidLongitude
} from './coordinateModel';

export { parseCoordinate, detectCoordinateFormat } from './coordinateParser';

export { formatCoordinate } from './coordinateFormatter';

export {
  calculateDistance,
  calculateBearing,
  convertDistance,
  greatCircleDistanceKm,
  projectWaypoint
} from './distanceCalculations';
