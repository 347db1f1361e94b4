/**
 * Geocache Puzzle Kit - Geometry Module
 */

export {
  calculateCircumcenter,
  calculateCircumradius,
  calculateOrthocenter,
  calculateTriangleArea
} from './triangleGeometry';

export {
  calculateMidpoint,
  calculateCentroid,
  calculateBoundingBox,
  isPointInPolygon
} from './pointSetGeometry';
