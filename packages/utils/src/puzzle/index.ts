/**
 * Geocache Puzzle Kit - Puzzle Helpers Module
 */

export {
  parseIntegerList,
  textToAscii,
  formatAsciiCodes,
  asciiToText,
  letterToNumber,
  numberToLetter,
  reverseText,
  extractNumbers
} from './textTransforms';

export {
  BUNDLED_WORD_LIST,
  MAX_PERMUTATION_LETTERS,
  solveAnagram,
  loadWordList,
  letterPermutations
} from './anagramSolver';
