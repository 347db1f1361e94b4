/**
 * Triangle Geometry Tests
 */

import {
  calculateCircumcenter,
  calculateCircumradius,
  calculateOrthocenter,
  calculateTriangleArea,
  calculateDistance,
  DegenerateGeometryError
} from '../packages/utils/src';
import { COLLINEAR_POINTS, RIGHT_TRIANGLE, captureError } from './fixtures/coordinateFixtures';

describe('Circumcenter', () => {
  test('should find the center of a right triangle', () => {
    const [a, b, c] = RIGHT_TRIANGLE;
    expect(calculateCircumcenter(a, b, c)).toEqual({ lat: 1, lon: 1 });
  });

  test('should not depend on vertex order', () => {
    const [a, b, c] = RIGHT_TRIANGLE;
    expect(calculateCircumcenter(c, a, b)).toEqual({ lat: 1, lon: 1 });
  });

  test('should reject collinear points', () => {
    const [a, b, c] = COLLINEAR_POINTS;
    const error = captureError(() => calculateCircumcenter(a, b, c));

    expect(error).toBeInstanceOf(DegenerateGeometryError);
    expect(error).toMatchObject({ code: 'ERR_DEGENERATE_GEOMETRY' });
  });

  test('should reject a center that falls off the globe', () => {
    // Nearly flat triangle near the pole: its circumcenter lies far beyond 90°
    expect(() =>
      calculateCircumcenter({ lat: 89, lon: 0 }, { lat: 89.001, lon: 50 }, { lat: 89, lon: 100 })
    ).toThrow(DegenerateGeometryError);
  });
});

describe('Circumradius', () => {
  test('should measure the great-circle radius', () => {
    const [a, b, c] = RIGHT_TRIANGLE;
    const radius = calculateCircumradius(a, b, c);

    expect(radius.unit).toBe('km');
    expect(radius.value).toBeGreaterThan(157);
    expect(radius.value).toBeLessThan(157.5);
  });

  test('should match the distance from the center to each corner within a planar tolerance', () => {
    const [a, b, c] = RIGHT_TRIANGLE;
    const center = calculateCircumcenter(a, b, c);
    const radius = calculateCircumradius(a, b, c).value;

    for (const corner of RIGHT_TRIANGLE) {
      expect(Math.abs(calculateDistance(center, corner).value - radius)).toBeLessThan(0.1);
    }
  });
});

describe('Orthocenter', () => {
  test('should be the right-angle vertex of a right triangle', () => {
    const [a, b, c] = RIGHT_TRIANGLE;
    expect(calculateOrthocenter(a, b, c)).toEqual({ lat: 0, lon: 0 });
  });

  test('should reject collinear points', () => {
    const [a, b, c] = COLLINEAR_POINTS;
    expect(() => calculateOrthocenter(a, b, c)).toThrow(DegenerateGeometryError);
  });
});

describe('Triangle Area', () => {
  test('should approximate half the product of the legs', () => {
    const area = calculateTriangleArea({ lat: 0, lon: 0 }, { lat: 0, lon: 1 }, { lat: 1, lon: 0 });

    expect(area.unit).toBe('km²');
    expect(area.value).toBeGreaterThan(6100);
    expect(area.value).toBeLessThan(6250);
  });

  test('should scale with the square of the unit', () => {
    const a = { lat: 0, lon: 0 };
    const b = { lat: 0, lon: 1 };
    const c = { lat: 1, lon: 0 };
    const km2 = calculateTriangleArea(a, b, c).value;
    const m2 = calculateTriangleArea(a, b, c, 'm²').value;

    expect(m2 / km2).toBeCloseTo(1e6, 0);
  });

  test('should stay finite with an antipodal pair of corners', () => {
    const area = calculateTriangleArea({ lat: 2.5, lon: 0 }, { lat: -2.5, lon: 180 }, { lat: 0, lon: 90 });
    expect(Number.isFinite(area.value)).toBe(true);
  });

  test('should be zero for collinear points', () => {
    const [a, b, c] = COLLINEAR_POINTS;
    expect(calculateTriangleArea(a, b, c).value).toBeLessThan(0.01);
  });
});
