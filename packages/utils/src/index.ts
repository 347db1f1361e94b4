/**
 * Geocache Puzzle Kit - utils
 *
 * Pure calculation libraries for geocaching puzzles:
 * - Classical ciphers (Caesar/ROT-n, Vigenère, Atbash, Morse, frequency tools)
 * - Coordinate parsing, formatting, distance and projection
 * - Geometry on coordinate sets (triangle centers, areas, polygons)
 * - Text and number puzzle helpers (A1Z26, character codes, anagrams)
 *
 * Nothing here logs or performs I/O except the optional word-list loader.
 */

// Types - pure type definitions and constants
export * from './types';

// Errors - thrown by every library
export * from './errors';

export * from './cipher';
export * from './coordinates';
export * from './geometry';
export * from './puzzle';
