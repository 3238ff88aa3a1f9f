/**
 * Zone Classifier
 *
 * Radius-bounded named regions used to classify markers and to group the
 * output. Zones are consulted in table order and the first match wins, so the
 * table must list every contained zone before its container.
 */

import { distance, exactDistance } from './geo-utils.js';
import { parseCoordinateLine, type GpsCoordinate } from './parser.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Zone {
  abbreviation: string;
  /** Display label used for output section headers */
  header: string;
  center: GpsCoordinate;
  /** Radius in meters, parsed from the center's name */
  radius: number;
}

export interface ZoneDefinition {
  abbreviation: string;
  header: string;
  /** GPS line whose name encodes the radius, e.g. `The Hub - (R500km)` */
  center: string;
}

const RADIUS_PATTERN = /\(R(\d+)km\)/;

/**
 * Parse the radius (in meters) out of a zone center's name.
 *
 * @throws Error when the name has no `(R<n>km)` marker
 */
export function parseZoneRadius(name: string): number {
  const match = RADIUS_PATTERN.exec(name);
  if (!match) {
    throw new Error(`Unexpected zone GPS name: ${name}`);
  }
  return parseInt(match[1], 10) * 1000;
}

/**
 * Build a zone from its configuration entry
 */
export function createZone(definition: ZoneDefinition): Zone {
  const center = parseCoordinateLine(definition.center, definition.abbreviation);
  if (!center) {
    throw new Error(`Zone ${definition.abbreviation} has no center coordinate`);
  }
  return {
    abbreviation: definition.abbreviation,
    header: definition.header,
    center,
    radius: parseZoneRadius(center.name),
  };
}

// ============================================================================
// ZONE TABLE
// ============================================================================

/**
 * Immutable, priority-ordered zone list.
 */
export class ZoneTable {
  readonly zones: readonly Zone[];

  constructor(zones: readonly Zone[]) {
    assertZoneOrder(zones);
    this.zones = [...zones];
  }

  static fromDefinitions(definitions: readonly ZoneDefinition[]): ZoneTable {
    return new ZoneTable(definitions.map(createZone));
  }

  get size(): number {
    return this.zones.length;
  }

  /** Table index of a zone, -1 when unknown */
  indexOf(abbreviation: string | null): number {
    if (abbreviation === null) return -1;
    const key = abbreviation.toUpperCase();
    return this.zones.findIndex(zone => zone.abbreviation.toUpperCase() === key);
  }

  has(abbreviation: string): boolean {
    return this.indexOf(abbreviation) >= 0;
  }

  get(abbreviation: string | null): Zone | undefined {
    const index = this.indexOf(abbreviation);
    return index >= 0 ? this.zones[index] : undefined;
  }

  /**
   * Find the first zone containing the coordinate.
   *
   * @throws Error when no zone contains it
   */
  classify(coordinate: GpsCoordinate): string {
    for (const zone of this.zones) {
      if (distance(zone.center, coordinate) < zone.radius) {
        return zone.abbreviation;
      }
    }
    throw new Error(
      `No zone found for coordinate: ${coordinate.name} (${coordinate.x}, ${coordinate.y}, ${coordinate.z})`
    );
  }

  /**
   * Classify every coordinate that has no zone yet.
   */
  classifyAll(coordinates: readonly GpsCoordinate[]): void {
    for (const coordinate of coordinates) {
      if (coordinate.zone === null) {
        coordinate.zone = this.classify(coordinate);
      }
    }
  }
}

/**
 * A zone listed earlier must never wholly contain a zone listed later, or the
 * later zone could never be matched.
 */
function assertZoneOrder(zones: readonly Zone[]): void {
  const seen = new Set<string>();
  for (const zone of zones) {
    const key = zone.abbreviation.toUpperCase();
    if (seen.has(key)) {
      throw new Error(`Duplicate zone abbreviation: ${zone.abbreviation}`);
    }
    seen.add(key);
  }

  for (let i = 0; i < zones.length; i++) {
    for (let j = i + 1; j < zones.length; j++) {
      const outer = zones[i];
      const inner = zones[j];
      if (exactDistance(outer.center, inner.center) + inner.radius <= outer.radius) {
        throw new Error(
          `Zone ${inner.abbreviation} lies inside ${outer.abbreviation} and must be listed before it`
        );
      }
    }
  }
}
