/**
 * Coordinate Parser Tests
 * Decimal, DDM and DMS notations with hemisphere letters or signs
 */

import { parseCoordinate, detectCoordinateFormat, ParseError } from '../packages/utils/src';
import {
  SEATTLE,
  SEATTLE_DDM,
  SEATTLE_DMS,
  SYDNEY,
  SYDNEY_DECIMAL,
  MALFORMED_COORDINATES,
  captureError
} from './fixtures/coordinateFixtures';

describe('Parse Coordinate', () => {
  test('should parse DDM with prefix hemispheres', () => {
    const coord = parseCoordinate(SEATTLE_DDM);
    expect(coord.lat).toBeCloseTo(SEATTLE.lat, 9);
    expect(coord.lon).toBeCloseTo(SEATTLE.lon, 9);
  });

  test('should parse DMS with seconds marks', () => {
    const coord = parseCoordinate(SEATTLE_DMS);
    expect(coord.lat).toBeCloseTo(47.60205, 9);
    expect(coord.lon).toBeCloseTo(-122.3242666667, 9);
  });

  test('should parse signed decimal degrees', () => {
    expect(parseCoordinate(SYDNEY_DECIMAL)).toEqual(SYDNEY);
  });

  test('should parse suffix hemispheres with minute marks', () => {
    const coord = parseCoordinate("47° 36.123' N, 122° 19.456' W");
    expect(coord.lat).toBeCloseTo(SEATTLE.lat, 9);
    expect(coord.lon).toBeCloseTo(SEATTLE.lon, 9);
  });

  test('should accept longitude first when hemispheres say so', () => {
    const coord = parseCoordinate('E 151° 12.558 S 33° 52.128');
    expect(coord.lat).toBeCloseTo(-33.8688, 9);
    expect(coord.lon).toBeCloseTo(151.2093, 9);
  });

  test('should accept lowercase letters and typographic marks', () => {
    const coord = parseCoordinate('n 47º 36′ 7.38″ w 122º 19′ 27.36″');
    expect(coord.lat).toBeCloseTo(SEATTLE.lat, 9);
    expect(coord.lon).toBeCloseTo(SEATTLE.lon, 9);
  });

  test('should split degree-marked values without a comma', () => {
    expect(parseCoordinate('47.5° -122.25°')).toEqual({ lat: 47.5, lon: -122.25 });
  });

  test('should accept the poles and the antimeridian', () => {
    expect(parseCoordinate('90, 180')).toEqual({ lat: 90, lon: 180 });
    expect(parseCoordinate('S 90 W 180')).toEqual({ lat: -90, lon: -180 });
  });

  test('should return a frozen value', () => {
    expect(Object.isFrozen(parseCoordinate(SYDNEY_DECIMAL))).toBe(true);
  });

  test.each(MALFORMED_COORDINATES)('should reject malformed input %p', text => {
    expect(() => parseCoordinate(text)).toThrow(ParseError);
  });

  test('should reject out-of-range values', () => {
    expect(() => parseCoordinate('95.0, -120.0')).toThrow(ParseError);
    expect(() => parseCoordinate('45.0, 180.5')).toThrow(ParseError);
  });

  test('should report the position of an unexpected character', () => {
    const error = captureError(() => parseCoordinate('47.5; 122'));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: 'ERR_PARSE', position: 5 });
  });

  test('should name ambiguous hemispheres in the message', () => {
    expect(() => parseCoordinate('N 47.5 N 122.5')).toThrow(/Ambiguous hemisphere/);
  });
});

describe('Detect Coordinate Format', () => {
  test('should detect each notation', () => {
    expect(detectCoordinateFormat(SYDNEY_DECIMAL)).toBe('decimal');
    expect(detectCoordinateFormat(SEATTLE_DDM)).toBe('ddm');
    expect(detectCoordinateFormat(SEATTLE_DMS)).toBe('dms');
  });
});
