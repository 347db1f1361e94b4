/**
 * Geocache Puzzle Kit - Error Taxonomy
 *
 * Every calculation throws synchronously at the point of detection and never
 * returns a partial result. Callers distinguish failures by class or by `code`.
 */

export type GeokitErrorCode =
  | 'ERR_PARSE'
  | 'ERR_DECODE'
  | 'ERR_DEGENERATE_GEOMETRY'
  | 'ERR_ARGUMENT';

export abstract class GeokitError extends Error {
  abstract readonly code: GeokitErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed coordinate, number list or other textual input. */
export class ParseError extends GeokitError {
  readonly code = 'ERR_PARSE';

  constructor(message: string, readonly position?: number) {
    super(message);
  }
}

/** A cipher token with no known decoding, e.g. an invalid Morse sequence. */
export class DecodeError extends GeokitError {
  readonly code = 'ERR_DECODE';

  constructor(message: string, readonly token: string, readonly position: number) {
    super(message);
  }
}

/** Collinear triangles, polygons with too few vertices. */
export class DegenerateGeometryError extends GeokitError {
  readonly code = 'ERR_DEGENERATE_GEOMETRY';
}

/** Out-of-range shift, empty point set, unsupported unit and the like. */
export class ArgumentError extends GeokitError {
  readonly code = 'ERR_ARGUMENT';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export function isGeokitError(error: unknown): error is GeokitError {
  return error instanceof GeokitError;
}
