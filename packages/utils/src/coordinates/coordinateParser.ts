/**
 * Geocache Puzzle Kit - Coordinate Parser
 *
 * Reads decimal, degrees-decimal-minutes (DDM) and degrees-minutes-seconds
 * (DMS) notations. The format is detected from structure, not from a fixed
 * pattern list:
 *
 *   47.602050, -122.324194
 *   N 47° 36.123 W 122° 19.456
 *   47° 36.123' N, 122° 19.456' W
 *   N 47° 36' 7.380" W 122° 19' 27.360"
 *
 * Text is split into tokens (hemisphere letters, numbers with an optional unit
 * mark, commas), the tokens are split into a latitude half and a longitude
 * half, and each half is evaluated from its 1-3 components.
 */

import { ParseError } from '../errors';
import { Coordinate, CoordinateFormat, LATITUDE_LIMIT_DEG, LONGITUDE_LIMIT_DEG } from '../types';

// ============================================================================
// TOKENIZER
// ============================================================================

type UnitMark = '°' | "'" | '"';
type Hemisphere = 'N' | 'S' | 'E' | 'W';

interface HemisphereToken {
  kind: 'hemisphere';
  letter: Hemisphere;
}

interface NumberToken {
  kind: 'number';
  magnitude: number;
  signed: boolean;
  negative: boolean;
  mark?: UnitMark;
}

interface CommaToken {
  kind: 'comma';
}

type Token = HemisphereToken | NumberToken | CommaToken;

const TOKEN_PATTERN = /([NSEW])|([+-])?(\d+(?:\.\d+)?)\s*([°'"])?|(,)/y;
const UNIT_MARKS: readonly UnitMark[] = ['°', "'", '"'];

function normalizeMarks(text: string): string {
  return text
    .toUpperCase()
    .replace(/º/g, '°')
    .replace(/′′|''|″/g, '"')
    .replace(/′/g, "'");
}

function isUnitMark(value: string): value is UnitMark {
  return value === '°' || value === "'" || value === '"';
}

function isHemisphere(value: string): value is Hemisphere {
  return value === 'N' || value === 'S' || value === 'E' || value === 'W';
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    if (/\s/.test(text[pos])) {
      pos++;
      continue;
    }

    TOKEN_PATTERN.lastIndex = pos;
    const match = TOKEN_PATTERN.exec(text);
    if (!match) {
      throw new ParseError(`Unexpected character "${text[pos]}" at position ${pos + 1}`, pos + 1);
    }

    const [, letter, sign, digits, mark, comma] = match;
    if (letter !== undefined && isHemisphere(letter)) {
      tokens.push({ kind: 'hemisphere', letter });
    } else if (digits !== undefined) {
      tokens.push({
        kind: 'number',
        magnitude: parseFloat(digits),
        signed: sign !== undefined,
        negative: sign === '-',
        mark: mark !== undefined && isUnitMark(mark) ? mark : undefined
      });
    } else if (comma !== undefined) {
      tokens.push({ kind: 'comma' });
    }
    pos = TOKEN_PATTERN.lastIndex;
  }

  if (tokens.length === 0) {
    throw new ParseError('Coordinate text is empty');
  }
  return tokens;
}

// ============================================================================
// HALVES
// ============================================================================

interface CoordinateHalves {
  lat: NumberToken[];
  lon: NumberToken[];
  /** -1 or 1 from a hemisphere letter; undefined when signs are used. */
  latSign?: number;
  lonSign?: number;
}

function numbersOnly(tokens: Token[], what: string): NumberToken[] {
  const numbers: NumberToken[] = [];
  for (const token of tokens) {
    if (token.kind !== 'number') {
      throw new ParseError(`Unexpected ${token.kind} in ${what}`);
    }
    numbers.push(token);
  }
  return numbers;
}

function splitByHemisphere(tokens: Token[]): CoordinateHalves {
  const sequence = tokens.filter(token => token.kind !== 'comma');
  const letters = sequence.filter((token): token is HemisphereToken => token.kind === 'hemisphere');

  const latLetters = letters.filter(token => token.letter === 'N' || token.letter === 'S');
  if (letters.length !== 2 || latLetters.length !== 1) {
    throw new ParseError('Ambiguous hemisphere: expected exactly one of N/S and one of E/W');
  }

  const first = sequence[0];
  const last = sequence[sequence.length - 1];
  const secondLetterIndex = sequence.indexOf(letters[1]);
  let firstPart: Token[];
  let secondPart: Token[];

  if (first.kind === 'hemisphere' && last.kind !== 'hemisphere') {
    firstPart = sequence.slice(1, secondLetterIndex);
    secondPart = sequence.slice(secondLetterIndex + 1);
  } else if (last.kind === 'hemisphere' && first.kind !== 'hemisphere') {
    const firstLetterIndex = sequence.indexOf(letters[0]);
    firstPart = sequence.slice(0, firstLetterIndex);
    secondPart = sequence.slice(firstLetterIndex + 1, sequence.length - 1);
  } else {
    throw new ParseError('Ambiguous hemisphere: letters must all precede or all follow their values');
  }

  const firstNumbers = numbersOnly(firstPart, 'coordinate value');
  const secondNumbers = numbersOnly(secondPart, 'coordinate value');
  if ([...firstNumbers, ...secondNumbers].some(token => token.signed)) {
    throw new ParseError('Ambiguous hemisphere: signed value combined with a hemisphere letter');
  }

  const signOf = (letter: Hemisphere) => (letter === 'S' || letter === 'W' ? -1 : 1);
  const latFirst = letters[0] === latLetters[0];
  const lonLetter = latFirst ? letters[1] : letters[0];

  return {
    lat: latFirst ? firstNumbers : secondNumbers,
    lon: latFirst ? secondNumbers : firstNumbers,
    latSign: signOf(latLetters[0].letter),
    lonSign: signOf(lonLetter.letter)
  };
}

function splitBySeparator(tokens: Token[]): CoordinateHalves {
  if (tokens.some(token => token.kind === 'comma')) {
    const groups: Token[][] = [[]];
    for (const token of tokens) {
      if (token.kind === 'comma') {
        groups.push([]);
      } else {
        groups[groups.length - 1].push(token);
      }
    }
    if (groups.length !== 2) {
      throw new ParseError(`Expected latitude and longitude separated by one comma, found ${groups.length} parts`);
    }
    return { lat: numbersOnly(groups[0], 'latitude'), lon: numbersOnly(groups[1], 'longitude') };
  }

  const numbers = numbersOnly(tokens, 'coordinate');
  const degreeIndexes = numbers
    .map((token, index) => (token.mark === '°' ? index : -1))
    .filter(index => index >= 0);

  if (degreeIndexes.length === 2 && degreeIndexes[0] === 0) {
    return { lat: numbers.slice(0, degreeIndexes[1]), lon: numbers.slice(degreeIndexes[1]) };
  }
  if (degreeIndexes.length === 0 && numbers.length === 2 && numbers.every(token => token.mark === undefined)) {
    return { lat: [numbers[0]], lon: [numbers[1]] };
  }
  throw new ParseError('Cannot tell where latitude ends and longitude begins');
}

// ============================================================================
// EVALUATION
// ============================================================================

function evaluateHalf(components: NumberToken[], name: string, hemisphereSign?: number): number {
  if (components.length === 0 || components.length > 3) {
    throw new ParseError(`${name} must have 1 to 3 components, found ${components.length}`);
  }

  components.forEach((token, index) => {
    if (token.mark !== undefined && token.mark !== UNIT_MARKS[index]) {
      throw new ParseError(`${name}: unit mark ${token.mark} does not match component ${index + 1}`);
    }
    if (index > 0 && token.signed) {
      throw new ParseError(`${name}: only the degrees may carry a sign`);
    }
    if (index < components.length - 1 && !Number.isInteger(token.magnitude)) {
      throw new ParseError(`${name}: component ${index + 1} must be a whole number when followed by another`);
    }
    if (index > 0 && token.magnitude >= 60) {
      throw new ParseError(`${name}: ${index === 1 ? 'minutes' : 'seconds'} must be below 60, got ${token.magnitude}`);
    }
  });

  const [degrees, minutes, seconds] = components.map(token => token.magnitude);
  const magnitude = degrees + (minutes ?? 0) / 60 + (seconds ?? 0) / 3600;
  const sign = hemisphereSign ?? (components[0].negative ? -1 : 1);
  return sign * magnitude;
}

const FORMAT_BY_COMPONENTS: Record<number, CoordinateFormat> = {
  1: 'decimal',
  2: 'ddm',
  3: 'dms'
};

interface ParsedCoordinate {
  coordinate: Coordinate;
  format: CoordinateFormat;
}

function parseDetailed(text: string): ParsedCoordinate {
  const tokens = tokenize(normalizeMarks(text));
  const halves = tokens.some(token => token.kind === 'hemisphere')
    ? splitByHemisphere(tokens)
    : splitBySeparator(tokens);

  const lat = evaluateHalf(halves.lat, 'Latitude', halves.latSign);
  const lon = evaluateHalf(halves.lon, 'Longitude', halves.lonSign);

  if (Math.abs(lat) > LATITUDE_LIMIT_DEG) {
    throw new ParseError(`Latitude ${lat} is outside ±${LATITUDE_LIMIT_DEG}°`);
  }
  if (Math.abs(lon) > LONGITUDE_LIMIT_DEG) {
    throw new ParseError(`Longitude ${lon} is outside ±${LONGITUDE_LIMIT_DEG}°`);
  }

  const components = Math.max(halves.lat.length, halves.lon.length);
  return {
    coordinate: Object.freeze({ lat, lon }),
    format: FORMAT_BY_COMPONENTS[components]
  };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse a coordinate string into decimal degrees.
 *
 * @throws ParseError on malformed text, out-of-range values or ambiguous
 *   hemisphere indicators
 */
export function parseCoordinate(text: string): Coordinate {
  return parseDetailed(text).coordinate;
}

/** The notation a coordinate string is written in. */
export function detectCoordinateFormat(text: string): CoordinateFormat {
  return parseDetailed(text).format;
}
