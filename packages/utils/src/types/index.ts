/**
 * Geocache Puzzle Kit - Type Definitions
 *
 * Pure type definitions and fixed constants shared by the function libraries.
 */

export * from './geoTypes';
export * from './cipherTypes';
