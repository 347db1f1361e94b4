/**
 * Geocache Puzzle Kit - Text Transforms
 *
 * Character codes, A1Z26 letter numbering, reversal and number extraction.
 */

import { ParseError } from '../errors';

const MAX_CODE_POINT = 0x10ffff;
const LETTER_OFFSET = 64; // 'A' is 65

function isLetter(char: string): boolean {
  return /^[A-Za-z]$/.test(char);
}

/**
 * Integers from a whitespace-separated string or an array.
 *
 * @throws ParseError naming the first token that is not an integer
 */
export function parseIntegerList(input: string | readonly number[]): number[] {
  if (typeof input !== 'string') {
    input.forEach((value, index) => {
      if (!Number.isInteger(value)) {
        throw new ParseError(`Value ${value} at position ${index + 1} is not an integer`, index + 1);
      }
    });
    return [...input];
  }

  const tokens = input.split(/\s+/).filter(token => token.length > 0);
  return tokens.map((token, index) => {
    if (!/^[+-]?\d+$/.test(token)) {
      throw new ParseError(`"${token}" at position ${index + 1} is not an integer`, index + 1);
    }
    return parseInt(token, 10);
  });
}

// ============================================================================
// CHARACTER CODES
// ============================================================================

export function textToAscii(text: string): number[] {
  return Array.from(text, char => char.codePointAt(0) ?? 0);
}

export function formatAsciiCodes(codes: readonly number[]): string {
  return codes.join(' ');
}

export function asciiToText(input: string | readonly number[]): string {
  const codes = parseIntegerList(input);
  codes.forEach((code, index) => {
    if (code < 0 || code > MAX_CODE_POINT) {
      throw new ParseError(`Character code ${code} at position ${index + 1} is out of range`, index + 1);
    }
  });
  return String.fromCodePoint(...codes);
}

// ============================================================================
// A1Z26
// ============================================================================

/** A=1 … Z=26, minus `offset`. Case-insensitive; non-letters are skipped. */
export function letterToNumber(text: string, offset: number = 0): number[] {
  return Array.from(text)
    .filter(isLetter)
    .map(char => char.toUpperCase().charCodeAt(0) - LETTER_OFFSET - offset);
}

/** Uppercase letters; numbers outside 1-26 once `offset` is removed are skipped. */
export function numberToLetter(input: string | readonly number[], offset: number = 0): string {
  return parseIntegerList(input)
    .map(value => value - offset)
    .filter(value => value >= 1 && value <= 26)
    .map(value => String.fromCharCode(value + LETTER_OFFSET))
    .join('');
}

// ============================================================================
// MISC
// ============================================================================

export function reverseText(text: string, wordsOnly: boolean = false): string {
  if (wordsOnly) {
    return text.split(/\s+/).filter(word => word.length > 0).reverse().join(' ');
  }
  return Array.from(text).reverse().join('');
}

export function extractNumbers(text: string): number[] {
  return (text.match(/\d+/g) ?? []).map(digits => parseInt(digits, 10));
}
