/**
 * Geocache Puzzle Kit - Frequency Analysis
 *
 * Letter counts and a rank-matching guess for monoalphabetic substitution.
 * The guess is a starting point for manual solving, not a cryptanalysis tool.
 */

import { ArgumentError } from '../errors';
import { LetterFrequency, SubstitutionMapping } from '../types';
import { isLetter } from './substitutionCiphers';

/** Relative frequency (%) of letters in English text. */
const ENGLISH_LETTER_FREQUENCY: Readonly<Record<string, number>> = {
  e: 12.7, t: 9.1, a: 8.2, o: 7.5, i: 7.0, n: 6.7, s: 6.3,
  h: 6.1, r: 6.0, d: 4.3, l: 4.0, c: 2.8, u: 2.8, m: 2.4,
  w: 2.4, f: 2.2, g: 2.0, y: 2.0, p: 1.9, b: 1.5, v: 1.0,
  k: 0.8, j: 0.2, x: 0.2, q: 0.1, z: 0.1
};

const ENGLISH_BY_RANK = Object.entries(ENGLISH_LETTER_FREQUENCY)
  .sort(([a, fa], [b, fb]) => fb - fa || a.localeCompare(b))
  .map(([letter]) => letter);

/** Letter counts, most frequent first; ties in alphabetical order. */
export function frequencyAnalysis(text: string): LetterFrequency[] {
  const counts = new Map<string, number>();
  let total = 0;

  for (const char of text) {
    if (!isLetter(char)) continue;
    const letter = char.toLowerCase();
    counts.set(letter, (counts.get(letter) ?? 0) + 1);
    total++;
  }

  return Array.from(counts.entries())
    .sort(([a, ca], [b, cb]) => cb - ca || a.localeCompare(b))
    .map(([letter, count]) => ({
      letter,
      count,
      percent: (count / total) * 100
    }));
}

function validateMappings(mappings: SubstitutionMapping): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [cipher, plain] of Object.entries(mappings)) {
    if (!isLetter(cipher) || !isLetter(plain)) {
      throw new ArgumentError(`Invalid substitution mapping "${cipher}" -> "${plain}"`, 'mappings');
    }
    normalized.set(cipher.toLowerCase(), plain.toLowerCase());
  }
  return normalized;
}

/**
 * Map cipher letters onto English letters by frequency rank, then apply any
 * known cipher->plain pairs on top.
 */
export function substitutionDecode(text: string, knownMappings: SubstitutionMapping = {}): string {
  const mapping = new Map<string, string>();
  frequencyAnalysis(text).forEach((entry, rank) => {
    mapping.set(entry.letter, ENGLISH_BY_RANK[rank]);
  });
  for (const [cipher, plain] of validateMappings(knownMappings)) {
    mapping.set(cipher, plain);
  }

  let result = '';
  for (const char of text) {
    const plain = isLetter(char) ? mapping.get(char.toLowerCase()) : undefined;
    if (plain === undefined) {
      result += char;
    } else {
      result += char === char.toUpperCase() ? plain.toUpperCase() : plain;
    }
  }
  return result;
}
