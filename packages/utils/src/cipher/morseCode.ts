/**
 * Geocache Puzzle Kit - Morse Code
 *
 * International Morse, bundled from data/morse.json. Letters are separated by
 * whitespace and words by "/".
 */

import morseTable from '../../data/morse.json';
import { ArgumentError, DecodeError } from '../errors';
import { MorseTable } from '../types';

export const MORSE_CODE_TABLE: MorseTable = morseTable;

const MORSE_TO_CHAR: ReadonlyMap<string, string> = new Map(
  Object.entries(MORSE_CODE_TABLE).map(([char, code]) => [code, char])
);

/**
 * Decode dot-dash text. Output is uppercase with words joined by one space;
 * empty words ("//") are skipped.
 *
 * @throws DecodeError for the first token missing from the table, with its
 *   1-based position among all tokens
 */
export function morseDecode(code: string): string {
  const words: string[] = [];
  let position = 0;

  for (const rawWord of code.split('/')) {
    const tokens = rawWord.split(/\s+/).filter(token => token.length > 0);
    if (tokens.length === 0) continue;

    let word = '';
    for (const token of tokens) {
      position++;
      const char = MORSE_TO_CHAR.get(token);
      if (char === undefined) {
        throw new DecodeError(`Unknown Morse token "${token}" at position ${position}`, token, position);
      }
      word += char;
    }
    words.push(word);
  }

  return words.join(' ');
}

export function morseEncode(text: string): string {
  return text
    .trim()
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word =>
      Array.from(word.toUpperCase(), char => {
        const code = MORSE_CODE_TABLE[char];
        if (code === undefined) {
          throw new ArgumentError(`Character "${char}" has no Morse encoding`, 'text');
        }
        return code;
      }).join(' ')
    )
    .join(' / ');
}
