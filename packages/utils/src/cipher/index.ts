/**
 * Geocache Puzzle Kit - Cipher Module
 *
 * Classical cipher encoding/decoding and frequency tools.
 */

export {
  caesarEncode,
  caesarDecode,
  vigenereEncode,
  vigenereDecode,
  atbash
} from './substitutionCiphers';

export { MORSE_CODE_TABLE, morseDecode, morseEncode } from './morseCode';

export { frequencyAnalysis, substitutionDecode } from './frequencyAnalysis';
