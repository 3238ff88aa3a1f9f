/**
 * Cluster Assembly Module
 *
 * Attaches every resource marker to its nearest cluster marker. Resources
 * with no cluster in range either get a synthesized cluster (recentred on
 * its members once assignment is done) or are reported and left out.
 */

import { randomInt } from 'crypto';
import { calculateCentroid, distance, isWithinRadius } from './geo-utils.js';
import type { GpsCoordinate } from './parser.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * `synthesize`: create a cluster for each orphaned resource.
 * `report`: warn about orphaned resources and leave them out.
 */
export type AssignmentPolicy = 'synthesize' | 'report';

export const ASSIGNMENT_POLICIES: readonly AssignmentPolicy[] = ['synthesize', 'report'];

export interface AssemblyOptions {
  /** Name prefix that marks a cluster marker */
  clusterPrefix: string;

  /** Maximum resource-to-cluster distance, in meters */
  assignRadius: number;

  policy: AssignmentPolicy;

  /** Random integer in [0, max) */
  randomInt?: (max: number) => number;

  warn?: (message: string) => void;
}

export interface AssemblyResult {
  /** All clusters, existing first, then synthesized ones in creation order */
  clusters: GpsCoordinate[];

  /** Clusters synthesized during assembly */
  created: GpsCoordinate[];

  /** Resources left out under the `report` policy */
  unassigned: GpsCoordinate[];
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function isClusterMarker(coordinate: GpsCoordinate, clusterPrefix: string): boolean {
  return coordinate.name.startsWith(clusterPrefix);
}

/**
 * Split coordinates into cluster markers and resource markers, keeping order.
 */
export function splitMarkers(
  coordinates: readonly GpsCoordinate[],
  clusterPrefix: string
): { clusters: GpsCoordinate[]; resources: GpsCoordinate[] } {
  const clusters: GpsCoordinate[] = [];
  const resources: GpsCoordinate[] = [];

  for (const coordinate of coordinates) {
    if (isClusterMarker(coordinate, clusterPrefix)) {
      clusters.push(coordinate);
    } else {
      resources.push(coordinate);
    }
  }

  return { clusters, resources };
}

/**
 * Turn a marker name into a GPS folder name
 */
export function sanitizeFolderName(name: string): string {
  return name
    .replace(/ /g, '_')
    .replace(/[(),]/g, '');
}

// ============================================================================
// ASSIGNMENT
// ============================================================================

/**
 * Find the nearest cluster in the resource's zone.
 */
export function findNearestCluster(
  resource: GpsCoordinate,
  clusters: readonly GpsCoordinate[]
): { cluster: GpsCoordinate; distance: number } | null {
  let nearest: { cluster: GpsCoordinate; distance: number } | null = null;

  for (const cluster of clusters) {
    if (cluster.zone !== resource.zone) continue;
    const gap = distance(resource, cluster);
    if (nearest === null || gap < nearest.distance) {
      nearest = { cluster, distance: gap };
    }
  }

  return nearest;
}

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Generate a cluster name: the prefix and four random capital letters.
 * Collisions with existing names are not checked.
 */
export function generateClusterName(
  clusterPrefix: string,
  random: (max: number) => number = max => randomInt(max)
): string {
  let suffix = '';
  for (let i = 0; i < 4; i++) {
    suffix += LETTERS[random(LETTERS.length)];
  }
  return `${clusterPrefix} ${suffix}`;
}

/**
 * Create a cluster marker at the resource's position, in its zone and colour.
 */
export function createClusterForResource(
  resource: GpsCoordinate,
  clusterPrefix: string,
  random?: (max: number) => number
): GpsCoordinate {
  const name = generateClusterName(clusterPrefix, random);
  return {
    name,
    x: resource.x,
    y: resource.y,
    z: resource.z,
    colour: resource.colour,
    notes: sanitizeFolderName(name),
    zone: resource.zone,
    duplicate: false,
    resources: [],
  };
}

function attach(cluster: GpsCoordinate, resource: GpsCoordinate): void {
  resource.notes = cluster.notes;
  cluster.resources ??= [];
  cluster.resources.push(resource);
}

/**
 * Assign resources to clusters. `clusters` is mutated in place: folder tags
 * are set, `resources` filled in and synthesized clusters appended.
 */
export function assembleClusters(
  clusters: GpsCoordinate[],
  resources: readonly GpsCoordinate[],
  options: AssemblyOptions
): AssemblyResult {
  const created: GpsCoordinate[] = [];
  const unassigned: GpsCoordinate[] = [];

  for (const cluster of clusters) {
    cluster.notes = sanitizeFolderName(cluster.name);
  }

  for (const resource of resources) {
    const nearest = findNearestCluster(resource, clusters);
    if (nearest && isWithinRadius(resource, nearest.cluster, options.assignRadius)) {
      attach(nearest.cluster, resource);
      continue;
    }

    if (options.policy === 'report') {
      options.warn?.(`No cluster within ${options.assignRadius}m of resource: ${resource.name}`);
      unassigned.push(resource);
      continue;
    }

    const cluster = createClusterForResource(resource, options.clusterPrefix, options.randomInt);
    clusters.push(cluster);
    created.push(cluster);
    attach(cluster, resource);
  }

  // Membership is only known once every resource is placed
  for (const cluster of created) {
    const { x, y, z } = calculateCentroid(cluster.resources ?? []);
    cluster.x = x;
    cluster.y = y;
    cluster.z = z;
  }

  return { clusters, created, unassigned };
}
