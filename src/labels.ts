/**
 * Label Normalization Module
 *
 * Resource labels look like `<zone> <ore>[ <size>], <ore>[ <size>]...`,
 * optionally ending in a `_<n>` uniqueness suffix. Normalizing validates the
 * zone and every ore code, upper-cases the codes and sorts the entries by ore
 * priority.
 */

import type { GpsCoordinate } from './parser.js';
import type { DecisionOracle } from './oracle.js';
import type { ZoneTable } from './zones.js';

// ============================================================================
// ORE VOCABULARY
// ============================================================================

export interface OreDefinition {
  code: string;
  /** Display name for the output preamble */
  name?: string;
}

/**
 * Ordered resource-type codes. Index order is priority order, highest first.
 */
export class OreVocabulary {
  readonly ores: readonly OreDefinition[];
  private readonly priorities: Map<string, number>;

  constructor(ores: readonly OreDefinition[]) {
    this.priorities = new Map();
    ores.forEach((ore, i) => {
      if (ore.code !== ore.code.toUpperCase() || !/^[A-Z]+$/.test(ore.code)) {
        throw new Error(`Ore code must be upper-case letters: ${ore.code}`);
      }
      if (this.priorities.has(ore.code)) {
        throw new Error(`Duplicate ore code: ${ore.code}`);
      }
      this.priorities.set(ore.code, i);
    });
    this.ores = [...ores];
  }

  get codes(): string[] {
    return this.ores.map(ore => ore.code);
  }

  /** Case-insensitive membership */
  has(code: string): boolean {
    return this.priorities.has(code.toUpperCase());
  }

  /** Priority index, Infinity for unknown codes */
  priority(code: string): number {
    return this.priorities.get(code.toUpperCase()) ?? Infinity;
  }
}

export interface LabelVocabulary {
  ores: OreVocabulary;
  /** Known zones, or null when zoning is off */
  zones: ZoneTable | null;
}

// ============================================================================
// NORMALIZATION
// ============================================================================

export type NormalizeResult =
  | { ok: true; label: string }
  | { ok: false; reason: string };

export interface OreEntry {
  code: string;
  size: string | null;
}

const LABEL_PATTERN = /^\s*(\S+)\s+(.+?)(_\d+)?$/;
const ORE_PATTERN = /\s*([A-Za-z]+)(\s+([^,]+)\s*,?)?/g;
const SIZE_SUFFIX_PATTERN = /\s*_\d+$/;

/**
 * Split an ore list into entries. The size phrase runs to the next comma and
 * loses any `_<n>` uniqueness suffix, since sorting may move it to the end.
 */
export function parseOreList(text: string): OreEntry[] {
  const entries: OreEntry[] = [];
  for (const match of text.matchAll(ORE_PATTERN)) {
    const size = match[3]?.trim().replace(SIZE_SUFFIX_PATTERN, '');
    entries.push({
      code: match[1].toUpperCase(),
      size: size ? size : null,
    });
  }
  return entries;
}

export function formatLabel(token: string, entries: readonly OreEntry[]): string {
  const ores = entries
    .map(entry => (entry.size === null ? entry.code : `${entry.code} ${entry.size}`))
    .join(' , ');
  return `${token} ${ores}`;
}

/**
 * Normalize one resource label.
 *
 * @param zone - Zone the resource was classified in, used when the label
 *   starts straight with an ore code
 */
export function normalizeLabel(
  label: string,
  zone: string | null,
  vocabulary: LabelVocabulary
): NormalizeResult {
  const match = LABEL_PATTERN.exec(label);
  if (!match) {
    return { ok: false, reason: `Label needs a zone and at least one ore: ${label}` };
  }

  const leading = match[1];
  let token = leading;
  let oreText = match[2];

  if (vocabulary.ores.has(leading)) {
    // Zone omitted: the first word is already an ore
    if (zone === null) {
      return { ok: false, reason: `Missing zone token: ${label}` };
    }
    token = zone;
    oreText = `${leading} ${oreText}`;
  } else if (vocabulary.zones && !vocabulary.zones.has(leading)) {
    return { ok: false, reason: `Invalid zone: ${leading.toUpperCase()}` };
  }

  const entries = parseOreList(oreText);
  if (entries.length === 0) {
    return { ok: false, reason: `No ores in label: ${label}` };
  }

  for (const entry of entries) {
    if (!vocabulary.ores.has(entry.code)) {
      return { ok: false, reason: `Invalid ore: ${entry.code}` };
    }
  }

  // Array.prototype.sort is stable, entries of the same ore keep their order
  entries.sort((a, b) => vocabulary.ores.priority(a.code) - vocabulary.ores.priority(b.code));

  return { ok: true, label: formatLabel(token, entries) };
}

/**
 * Normalize every resource name in place, asking the oracle for a new label
 * until each one normalizes.
 */
export async function normalizeResourceLabels(
  resources: readonly GpsCoordinate[],
  vocabulary: LabelVocabulary,
  oracle: DecisionOracle,
  warn: (message: string) => void = () => {}
): Promise<number> {
  let replaced = 0;

  for (const resource of resources) {
    let label = resource.name;
    let result = normalizeLabel(label, resource.zone, vocabulary);

    while (!result.ok) {
      warn(result.reason);
      warn(`Invalid name: ${label}`);
      label = await oracle.supplyReplacementLabel(label);
      result = normalizeLabel(label, resource.zone, vocabulary);
      replaced++;
    }

    resource.name = result.label;
  }

  return replaced;
}

// ============================================================================
// UNIQUENESS
// ============================================================================

/**
 * Give every repeated name a ` _<n>` suffix, counting from 2. The first
 * occurrence keeps its name.
 */
export function makeNamesUnique(coordinates: readonly GpsCoordinate[]): void {
  const counters = new Map<string, number>();

  for (const coordinate of coordinates) {
    const name = coordinate.name;
    const next = counters.get(name);
    if (next === undefined) {
      counters.set(name, 2);
    } else {
      coordinate.name = `${name} _${next}`;
      counters.set(name, next + 1);
    }
  }
}

/**
 * Priority of the leading ore in a normalized label (its second word).
 */
export function leadingOrePriority(label: string, ores: OreVocabulary): number {
  const [, ore] = label.trim().split(/\s+/);
  return ore === undefined ? Infinity : ores.priority(ore);
}
