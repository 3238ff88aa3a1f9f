/**
 * Deduplication Module
 *
 * Single-pass, human-adjudicated duplicate removal. Each unmarked marker in
 * turn anchors a group of the unmarked markers near it; the oracle picks the
 * survivor and the rest are marked duplicate.
 */

import { distance } from './geo-utils.js';
import type { GpsCoordinate } from './parser.js';
import type { DecisionOracle, DuplicateCandidate } from './oracle.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface DedupOptions {
  /** Called with each out-of-range answer before the oracle is asked again */
  onInvalidChoice?: (choice: number, group: readonly DuplicateCandidate[]) => void;
}

// ============================================================================
// DUPLICATE DETECTION
// ============================================================================

export interface DuplicateMember {
  coordinate: GpsCoordinate;
  /** Distance to the anchor (the first member), in meters */
  distance: number;
}

export interface DuplicateGroup {
  /** Anchor first, then matches in input order */
  members: DuplicateMember[];

  /** 0-based index of the member that was kept */
  keptIndex: number;
}

/**
 * Find the unmarked coordinates in the anchor's zone strictly closer than
 * `minDistance`. Returns the anchor (distance 0) followed by its matches, or
 * an empty array when there are none.
 */
export function findDuplicates(
  anchor: GpsCoordinate,
  coordinates: readonly GpsCoordinate[],
  minDistance: number
): DuplicateMember[] {
  const matches: DuplicateMember[] = [];

  for (const candidate of coordinates) {
    if (candidate === anchor || candidate.duplicate) continue;
    if (candidate.zone !== anchor.zone) continue;

    const gap = distance(anchor, candidate);
    if (gap < minDistance) {
      matches.push({ coordinate: candidate, distance: gap });
    }
  }

  if (matches.length === 0) return [];
  return [{ coordinate: anchor, distance: 0 }, ...matches];
}

/**
 * Mark every member except `keptIndex` as duplicate.
 */
export function markDuplicates(members: readonly DuplicateMember[], keptIndex: number): void {
  members.forEach((member, i) => {
    if (i !== keptIndex) {
      member.coordinate.duplicate = true;
    }
  });
}

async function chooseSurvivor(
  members: readonly DuplicateMember[],
  oracle: DecisionOracle,
  options: DedupOptions
): Promise<number> {
  const candidates: DuplicateCandidate[] = members.map(m => ({
    name: m.coordinate.name,
    distance: m.distance,
  }));

  // No give-up path: the oracle is asked until it gives a usable answer
  for (;;) {
    const choice = await oracle.chooseSurvivor(candidates);
    if (Number.isInteger(choice) && choice >= 1 && choice <= candidates.length) {
      return choice - 1;
    }
    options.onInvalidChoice?.(choice, candidates);
  }
}

// ============================================================================
// DEDUPLICATION RESULT
// ============================================================================

export interface DedupResult {
  /** Original coordinate count */
  originalCount: number;

  /** Surviving coordinate count */
  dedupedCount: number;

  /** Duplicate groups resolved, in processing order */
  groups: DuplicateGroup[];

  /** Coordinates not marked duplicate, in input order */
  survivors: GpsCoordinate[];

  /** Reduction percentage */
  reductionPercent: number;
}

/**
 * Resolve duplicates in one pass over `coordinates`, in input order.
 *
 * Coordinates already marked duplicate are never used as an anchor or pulled
 * into a later group.
 */
export async function resolveDuplicates(
  coordinates: readonly GpsCoordinate[],
  minDistance: number,
  oracle: DecisionOracle,
  options: DedupOptions = {}
): Promise<DedupResult> {
  const groups: DuplicateGroup[] = [];

  for (const coordinate of coordinates) {
    if (coordinate.duplicate) continue;

    const members = findDuplicates(coordinate, coordinates, minDistance);
    if (members.length === 0) continue;

    const keptIndex = await chooseSurvivor(members, oracle, options);
    markDuplicates(members, keptIndex);
    groups.push({ members, keptIndex });
  }

  const survivors = coordinates.filter(c => !c.duplicate);
  const originalCount = coordinates.length;
  const dedupedCount = survivors.length;
  const reductionPercent = originalCount > 0
    ? Math.round((1 - dedupedCount / originalCount) * 100)
    : 0;

  return {
    originalCount,
    dedupedCount,
    groups,
    survivors,
    reductionPercent,
  };
}
