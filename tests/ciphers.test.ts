/**
 * Substitution Cipher Tests
 * Caesar, Vigenère, Atbash and frequency analysis
 */

import {
  caesarDecode,
  caesarEncode,
  vigenereDecode,
  vigenereEncode,
  atbash,
  frequencyAnalysis,
  substitutionDecode,
  ArgumentError
} from '../packages/utils/src';
import { captureError } from './fixtures/coordinateFixtures';

describe('Caesar Cipher', () => {
  test('should decode ROT13 by default', () => {
    expect(caesarDecode('Uryyb, jbeyq!')).toBe('Hello, world!');
  });

  test('should decode with an explicit shift', () => {
    expect(caesarDecode('Jgnnq, yqtnf!', 2)).toBe('Hello, world!');
  });

  test('should wrap around the alphabet', () => {
    expect(caesarEncode('xyz XYZ', 3)).toBe('abc ABC');
    expect(caesarDecode('abc', 3)).toBe('xyz');
  });

  test('should leave text unchanged for shift 0', () => {
    expect(caesarDecode('Hello, world!', 0)).toBe('Hello, world!');
  });

  test('should pass non-ASCII letters through', () => {
    expect(caesarEncode('Ärger 42', 1)).toBe('Äshfs 42');
  });

  test('should invert encode for every shift', () => {
    const text = 'The cache is under the old oak, 3m north!';
    for (let shift = 0; shift < 26; shift++) {
      expect(caesarDecode(caesarEncode(text, shift), shift)).toBe(text);
    }
  });

  test('should reject out-of-range and fractional shifts', () => {
    expect(() => caesarDecode('abc', 26)).toThrow(ArgumentError);
    expect(() => caesarDecode('abc', -1)).toThrow(ArgumentError);
    expect(() => caesarEncode('abc', 1.5)).toThrow(ArgumentError);

    const error = captureError(() => caesarDecode('abc', 30));
    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toMatchObject({ code: 'ERR_ARGUMENT', field: 'shift' });
  });
});

describe('Vigenère Cipher', () => {
  test('should decode with a keyword', () => {
    expect(vigenereDecode('Rijvs, uyvjn!', 'key')).toBe('Hello, world!');
  });

  test('should encode with a keyword', () => {
    expect(vigenereEncode('Hello, world!', 'key')).toBe('Rijvs, uyvjn!');
  });

  test('should treat the key case-insensitively', () => {
    expect(vigenereDecode('Rijvs, uyvjn!', 'KEY')).toBe('Hello, world!');
  });

  test('should only advance the key on letters', () => {
    // "a b" with key "bc": a+1, b+2
    expect(vigenereEncode('a b', 'bc')).toBe('b d');
  });

  test('should reject empty or non-letter keys', () => {
    expect(() => vigenereDecode('abc', '')).toThrow(ArgumentError);
    expect(() => vigenereDecode('abc', 'k3y')).toThrow(ArgumentError);
  });
});

describe('Atbash Cipher', () => {
  test('should mirror the alphabet', () => {
    expect(atbash('Hello World')).toBe('Svool Dliow');
  });

  test('should be its own inverse', () => {
    expect(atbash(atbash('Geocaching, 2024!'))).toBe('Geocaching, 2024!');
  });
});

describe('Frequency Analysis', () => {
  test('should count letters case-insensitively, most frequent first', () => {
    const result = frequencyAnalysis('Hello');

    expect(result.map(entry => entry.letter)).toEqual(['l', 'e', 'h', 'o']);
    expect(result[0]).toEqual({ letter: 'l', count: 2, percent: 40 });
    expect(result[1]).toEqual({ letter: 'e', count: 1, percent: 20 });
  });

  test('should ignore non-letters', () => {
    expect(frequencyAnalysis('a1 b2, a!')).toEqual([
      { letter: 'a', count: 2, percent: (2 / 3) * 100 },
      { letter: 'b', count: 1, percent: (1 / 3) * 100 }
    ]);
  });

  test('should return nothing for text without letters', () => {
    expect(frequencyAnalysis('123 !?')).toEqual([]);
  });
});

describe('Substitution Decode', () => {
  test('should map letters onto English frequency order', () => {
    // z, y, x ranked 1-3 become e, t, a
    expect(substitutionDecode('zzzyyx')).toBe('eeetta');
  });

  test('should apply known mappings over the frequency guess', () => {
    expect(substitutionDecode('zzzyyx', { x: 'q' })).toBe('eeettq');
  });

  test('should preserve case and punctuation', () => {
    expect(substitutionDecode('Zzy!')).toBe('Eet!');
  });

  test('should reject mappings that are not single letters', () => {
    expect(() => substitutionDecode('abc', { '1': 'a' })).toThrow(ArgumentError);
    expect(() => substitutionDecode('abc', { a: 'bc' })).toThrow(ArgumentError);
  });
});
