/**
 * Morse Code Tests
 */

import { morseDecode, morseEncode, ArgumentError, DecodeError } from '../packages/utils/src';
import { captureError } from './fixtures/coordinateFixtures';

describe('Morse Decode', () => {
  test('should decode words separated by slashes', () => {
    expect(morseDecode('.... . .-.. .-.. --- / .-- --- .-. .-.. -..')).toBe('HELLO WORLD');
  });

  test('should decode digits', () => {
    expect(morseDecode('.---- ..--- ...--')).toBe('123');
  });

  test('should tolerate extra whitespace and empty words', () => {
    expect(morseDecode('  ...   //  ---  ')).toBe('S O');
  });

  test('should return an empty string for empty input', () => {
    expect(morseDecode('')).toBe('');
  });

  test('should report the first unknown token and its position', () => {
    const error = captureError(() => morseDecode('... --- / ........ ...'));

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ code: 'ERR_DECODE', token: '........', position: 3 });
  });
});

describe('Morse Encode', () => {
  test('should encode letters and words', () => {
    expect(morseEncode('SOS help')).toBe('... --- ... / .... . .-.. .--.');
  });

  test('should round-trip through decode', () => {
    expect(morseDecode(morseEncode('Cache 42'))).toBe('CACHE 42');
  });

  test('should reject characters without an encoding', () => {
    expect(() => morseEncode('a~b')).toThrow(ArgumentError);
  });
});
