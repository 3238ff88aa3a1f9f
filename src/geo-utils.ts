/**
 * Geometry Utility Functions
 *
 * Straight-line distance in game-world metres. Used by the zone classifier,
 * the duplicate resolver and the cluster assembler.
 */

export interface Position {
  x: number;
  y: number;
  z: number;
}

/**
 * Calculate distance between two world positions in meters, rounded to the
 * nearest whole meter.
 */
export function distance(a: Position, b: Position): number {
  return roundTo(exactDistance(a, b), 0);
}

/**
 * Unrounded Euclidean distance. Only used where a sub-meter error would
 * change the answer (zone containment checks on configuration).
 */
export function exactDistance(a: Position, b: Position): number {
  return Math.sqrt(
    (b.x - a.x) ** 2 +
    (b.y - a.y) ** 2 +
    (b.z - a.z) ** 2
  );
}

/**
 * Check if two positions are within a given radius (inclusive).
 */
export function isWithinRadius(a: Position, b: Position, radiusMeters: number): boolean {
  return distance(a, b) <= radiusMeters;
}

/**
 * Round a number to a fixed count of decimal places. Exact halves go to the
 * even neighbour.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}

/**
 * Calculate the centroid of a set of positions, each axis rounded to
 * `decimals` places.
 *
 * @throws Error when `positions` is empty
 */
export function calculateCentroid(positions: readonly Position[], decimals = 2): Position {
  if (positions.length === 0) {
    throw new Error('Cannot calculate centroid of empty array');
  }

  let sumX = 0;
  let sumY = 0;
  let sumZ = 0;

  for (const { x, y, z } of positions) {
    sumX += x;
    sumY += y;
    sumZ += z;
  }

  return {
    x: roundTo(sumX / positions.length, decimals),
    y: roundTo(sumY / positions.length, decimals),
    z: roundTo(sumZ / positions.length, decimals),
  };
}
