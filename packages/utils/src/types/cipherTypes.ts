/**
 * Geocache Puzzle Kit - Cipher Types
 */

export const ALPHABET_SIZE = 26;
export const DEFAULT_CAESAR_SHIFT = 13;

/** Plain character (uppercase) to dot-dash sequence. */
export type MorseTable = Readonly<Record<string, string>>;

/** Cipher letter to plain letter, both lower case. */
export type SubstitutionMapping = Readonly<Record<string, string>>;

export interface LetterFrequency {
  letter: string;
  count: number;
  percent: number;
}
