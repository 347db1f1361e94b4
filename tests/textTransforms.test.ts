/**
 * Text Transform Tests
 * Character codes, A1Z26, reversal and number extraction
 */

import {
  asciiToText,
  textToAscii,
  formatAsciiCodes,
  letterToNumber,
  numberToLetter,
  reverseText,
  extractNumbers,
  parseIntegerList,
  ParseError
} from '../packages/utils/src';
import { captureError } from './fixtures/coordinateFixtures';

describe('Character Codes', () => {
  test('should decode a whitespace-separated list', () => {
    expect(asciiToText('72 101 108 108 111')).toBe('Hello');
  });

  test('should decode an array', () => {
    expect(asciiToText([72, 105])).toBe('Hi');
  });

  test('should decode code points beyond ASCII', () => {
    expect(asciiToText('9731 128512')).toBe('☃😀');
  });

  test('should encode text as code points', () => {
    expect(textToAscii('Hi!')).toEqual([72, 105, 33]);
    expect(textToAscii('😀')).toEqual([128512]);
    expect(formatAsciiCodes(textToAscii('Hi'))).toBe('72 105');
  });

  test('should reject non-integer tokens with their position', () => {
    const error = captureError(() => asciiToText('72 abc'));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: 'ERR_PARSE', position: 2 });
  });

  test('should reject out-of-range codes', () => {
    expect(() => asciiToText('72 1114112')).toThrow(ParseError);
    expect(() => asciiToText([-1])).toThrow(ParseError);
  });

  test('should parse signed integers', () => {
    expect(parseIntegerList(' 1  -2 +3 ')).toEqual([1, -2, 3]);
    expect(() => parseIntegerList('1 2.5')).toThrow(ParseError);
    expect(() => parseIntegerList([1, 2.5])).toThrow(ParseError);
  });
});

describe('A1Z26', () => {
  test('should number letters case-insensitively and skip others', () => {
    expect(letterToNumber('Cab')).toEqual([3, 1, 2]);
    expect(letterToNumber('a-z!')).toEqual([1, 26]);
  });

  test('should apply an offset', () => {
    expect(letterToNumber('Cab', 1)).toEqual([2, 0, 1]);
    expect(numberToLetter('9 10', 1)).toBe('HI');
  });

  test('should convert numbers to uppercase letters', () => {
    expect(numberToLetter('8 9')).toBe('HI');
    expect(numberToLetter([7, 5, 15])).toBe('GEO');
  });

  test('should skip numbers outside 1-26', () => {
    expect(numberToLetter('0 27 1')).toBe('A');
  });

  test('should round-trip letters', () => {
    expect(numberToLetter(letterToNumber('Geocache'))).toBe('GEOCACHE');
  });
});

describe('Reverse And Extract', () => {
  test('should reverse characters', () => {
    expect(reverseText('stressed')).toBe('desserts');
  });

  test('should reverse word order', () => {
    expect(reverseText('  Hello   big World ', true)).toBe('World big Hello');
  });

  test('should extract digit runs', () => {
    expect(extractNumbers('N 47 36.123, W 122')).toEqual([47, 36, 123, 122]);
    expect(extractNumbers('no digits')).toEqual([]);
  });
});
