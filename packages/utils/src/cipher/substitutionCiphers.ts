/**
 * Geocache Puzzle Kit - Substitution Ciphers
 *
 * Caesar/ROT-n, Vigenère and Atbash. Each preserves letter case and passes
 * every character outside A-Z/a-z through unchanged.
 */

import { ArgumentError } from '../errors';
import { ALPHABET_SIZE, DEFAULT_CAESAR_SHIFT } from '../types';

const UPPER_A = 65;
const LOWER_A = 97;

export function isLetter(char: string): boolean {
  return /^[A-Za-z]$/.test(char);
}

function letterBase(char: string): number {
  return char >= 'a' && char <= 'z' ? LOWER_A : UPPER_A;
}

function shiftLetter(char: string, shift: number): string {
  const base = letterBase(char);
  const index = char.charCodeAt(0) - base;
  const shifted = (((index + shift) % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
  return String.fromCharCode(base + shifted);
}

function mapLetters(text: string, transform: (char: string) => string): string {
  let result = '';
  for (const char of text) {
    result += isLetter(char) ? transform(char) : char;
  }
  return result;
}

function validateShift(shift: number): void {
  if (!Number.isInteger(shift) || shift < 0 || shift >= ALPHABET_SIZE) {
    throw new ArgumentError(`Shift must be an integer between 0 and ${ALPHABET_SIZE - 1}, got ${shift}`, 'shift');
  }
}

// ============================================================================
// CAESAR / ROT-N
// ============================================================================

export function caesarEncode(text: string, shift: number = DEFAULT_CAESAR_SHIFT): string {
  validateShift(shift);
  return mapLetters(text, char => shiftLetter(char, shift));
}

export function caesarDecode(text: string, shift: number = DEFAULT_CAESAR_SHIFT): string {
  validateShift(shift);
  return mapLetters(text, char => shiftLetter(char, -shift));
}

// ============================================================================
// VIGENÈRE
// ============================================================================

function keyShifts(key: string): number[] {
  if (!/^[A-Za-z]+$/.test(key)) {
    throw new ArgumentError('Vigenère key must be a non-empty string of letters', 'key');
  }
  return Array.from(key.toLowerCase(), char => char.charCodeAt(0) - LOWER_A);
}

// Only letters of the text advance the key position.
function applyVigenere(text: string, key: string, direction: 1 | -1): string {
  const shifts = keyShifts(key);
  let keyIndex = 0;
  return mapLetters(text, char => {
    const shift = shifts[keyIndex % shifts.length];
    keyIndex++;
    return shiftLetter(char, direction * shift);
  });
}

export function vigenereEncode(text: string, key: string): string {
  return applyVigenere(text, key, 1);
}

export function vigenereDecode(text: string, key: string): string {
  return applyVigenere(text, key, -1);
}

// ============================================================================
// ATBASH
// ============================================================================

/** Letter i becomes letter 25 - i. Applying it twice returns the input. */
export function atbash(text: string): string {
  return mapLetters(text, char => {
    const base = letterBase(char);
    return String.fromCharCode(base + (ALPHABET_SIZE - 1) - (char.charCodeAt(0) - base));
  });
}
