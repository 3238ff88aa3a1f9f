/**
 * GPS Line Parser Module
 *
 * Reads and writes the game's line-oriented marker format:
 *
 *   GPS:<name>:<x>:<y>:<z>:<colour>:<notes>:
 *
 * Blank lines and `#` comments are ignored on read.
 */

import * as fsPromises from 'fs/promises';

// ============================================================================
// TYPES
// ============================================================================

export interface GpsCoordinate {
  name: string;
  x: number;
  y: number;
  z: number;
  /** `#` followed by 8 hex digits (ARGB), kept verbatim */
  colour: string;
  /** Folder tag */
  notes: string;
  /** Zone abbreviation, null until classified or when zoning is off */
  zone: string | null;
  duplicate: boolean;
  /** Attached resource markers, only set on cluster markers after assembly */
  resources: GpsCoordinate[] | null;
}

export interface ParseError {
  /** 1-based line number */
  line: number;
  error: string;
}

export interface ParsedGpsResult {
  records: GpsCoordinate[];
  errors: ParseError[];
}

/**
 * Thrown for a line that does not have enough fields. Readers skip such lines
 * and keep the message as a diagnostic.
 */
export class MalformedLineError extends Error {
  constructor(readonly text: string) {
    super(`Bad coordinate, wrong number of tokens: ${text}`);
    this.name = 'MalformedLineError';
  }
}

const FIELD_DELIMITER = ':';
const MIN_FIELD_COUNT = 7;
const COMMENT_MARKER = '#';
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// PARSING
// ============================================================================

function parseNumericField(field: string, label: string, text: string): number {
  const trimmed = field.trim();
  const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isFinite(value)) {
    throw new Error(`Bad coordinate, ${label} is not a number ("${field}"): ${text}`);
  }
  return value;
}

/**
 * Parse one GPS line.
 *
 * Returns null for blank and comment lines. A non-numeric coordinate field is
 * fatal and throws a plain Error.
 *
 * @param zone - Zone to assign directly, for fixed reference tables
 * @throws MalformedLineError when the line has fewer than 7 fields
 */
export function parseCoordinateLine(line: string, zone: string | null = null): GpsCoordinate | null {
  const text = line.trim();
  if (text.length === 0 || text.startsWith(COMMENT_MARKER)) {
    return null;
  }

  const fields = text.split(FIELD_DELIMITER);
  if (fields.length < MIN_FIELD_COUNT) {
    throw new MalformedLineError(text);
  }

  const [, name, xField, yField, zField, colour, notes] = fields;
  const x = parseNumericField(xField, 'x', text);
  const y = parseNumericField(yField, 'y', text);
  const z = parseNumericField(zField, 'z', text);

  return {
    name,
    x,
    y,
    z,
    colour,
    notes,
    zone,
    duplicate: false,
    resources: null,
  };
}

/**
 * Parse the full text of a GPS list. Lines with the wrong field count are
 * skipped and reported in `errors`.
 */
export function parseCoordinateText(content: string): ParsedGpsResult {
  const records: GpsCoordinate[] = [];
  const errors: ParseError[] = [];
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    try {
      const record = parseCoordinateLine(lines[i]);
      if (record) {
        records.push(record);
      }
    } catch (error) {
      if (!(error instanceof MalformedLineError)) {
        throw error;
      }
      errors.push({ line: i + 1, error: error.message });
    }
  }

  return { records, errors };
}

/**
 * Read and parse a GPS list file
 */
export async function parseCoordinateFile(filePath: string): Promise<ParsedGpsResult> {
  const content = await fsPromises.readFile(filePath, 'utf-8');
  return parseCoordinateText(content);
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Convert a coordinate back into a GPS line the game can import.
 */
export function formatCoordinate(coordinate: GpsCoordinate): string {
  const { name, x, y, z, colour, notes } = coordinate;
  return `GPS:${name}:${String(x)}:${String(y)}:${String(z)}:${colour}:${notes}:`;
}
