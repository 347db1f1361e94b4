/**
 * Geocache Puzzle Kit - Anagram Solver
 *
 * Matches letters against a dictionary. The bundled list in data/wordlist.json
 * is embedded at build time; a caller may pass its own list instead. With no
 * words to search the result is simply empty.
 */

import { readFileSync } from 'fs';
import bundledWords from '../../data/wordlist.json';
import { ArgumentError } from '../errors';

export const BUNDLED_WORD_LIST: readonly string[] = bundledWords;

export const MAX_PERMUTATION_LETTERS = 8;

function letterSignature(text: string): string {
  return Array.from(text.toLowerCase().replace(/\s+/g, '')).sort().join('');
}

/** Dictionary words made of exactly the given letters, sorted and deduplicated. */
export function solveAnagram(letters: string, wordList: readonly string[] = BUNDLED_WORD_LIST): string[] {
  const signature = letterSignature(letters);
  if (signature.length === 0) return [];

  const matches = new Set<string>();
  for (const entry of wordList) {
    const word = entry.trim().toLowerCase();
    if (word.length === signature.length && letterSignature(word) === signature) {
      matches.add(word);
    }
  }
  return Array.from(matches).sort();
}

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES']);

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && MISSING_FILE_CODES.has(error.code);
}

/** One word per line. A file that does not exist or cannot be read yields []. */
export function loadWordList(path: string): string[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) return [];
    throw error;
  }
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/** Every distinct ordering of the letters, for when no dictionary applies. */
export function letterPermutations(letters: string): string[] {
  const pool = Array.from(letters.toLowerCase().replace(/\s+/g, '')).sort();
  if (pool.length > MAX_PERMUTATION_LETTERS) {
    throw new ArgumentError(
      `Too many letters for permutation (${pool.length} > ${MAX_PERMUTATION_LETTERS}); use a word list`,
      'letters'
    );
  }
  if (pool.length === 0) return [];

  const results: string[] = [];
  const used = new Array<boolean>(pool.length).fill(false);

  const build = (prefix: string) => {
    if (prefix.length === pool.length) {
      results.push(prefix);
      return;
    }
    for (let i = 0; i < pool.length; i++) {
      if (used[i]) continue;
      // Skip a repeated letter unless its twin is already placed.
      if (i > 0 && pool[i] === pool[i - 1] && !used[i - 1]) continue;
      used[i] = true;
      build(prefix + pool[i]);
      used[i] = false;
    }
  };
  build('');

  return results;
}
