/**
 * Pipeline driver: classify, deduplicate, assemble, normalize, uniquify and
 * format a parsed GPS list. Stages run strictly in that order.
 */

import { assembleClusters, splitMarkers, type AssignmentPolicy } from './clusters.js';
import type { GameConfig } from './config.js';
import { resolveDuplicates } from './dedup.js';
import { makeNamesUnique, normalizeResourceLabels } from './labels.js';
import type { DecisionOracle, DuplicateCandidate } from './oracle.js';
import { formatOutput } from './output.js';
import type { GpsCoordinate } from './parser.js';

export interface PipelineOptions {
  /** Classify markers into zones (default true) */
  zoning?: boolean;
  policy?: AssignmentPolicy;
  /** Date printed in the output preamble */
  date?: Date;
  randomInt?: (max: number) => number;
  /** Diagnostics sink */
  warn?: (message: string) => void;
}

export interface PipelineStats {
  inputCount: number;
  clusterDuplicates: number;
  resourceDuplicates: number;
  clustersCreated: number;
  unassigned: number;
  labelsReplaced: number;
}

export interface PipelineResult {
  output: string;
  clusters: GpsCoordinate[];
  stats: PipelineStats;
}

export async function runPipeline(
  coordinates: GpsCoordinate[],
  config: GameConfig,
  oracle: DecisionOracle,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const zoning = options.zoning ?? true;
  const warn = options.warn ?? (() => {});
  const zones = zoning ? config.zones : null;

  zones?.classifyAll(coordinates);

  const split = splitMarkers(coordinates, config.clusterPrefix);

  const onInvalidChoice = (choice: number, group: readonly DuplicateCandidate[]): void => {
    warn(`Invalid response: ${choice} (choose 1-${group.length})`);
  };
  const clusterDedup = await resolveDuplicates(
    split.clusters, config.thresholds.duplicateClusterMeters, oracle, { onInvalidChoice }
  );
  const resourceDedup = await resolveDuplicates(
    split.resources, config.thresholds.duplicateResourceMeters, oracle, { onInvalidChoice }
  );

  const assembly = assembleClusters(clusterDedup.survivors, resourceDedup.survivors, {
    clusterPrefix: config.clusterPrefix,
    assignRadius: config.thresholds.clusterAssignMeters,
    policy: options.policy ?? 'synthesize',
    randomInt: options.randomInt,
    warn,
  });

  const assigned = resourceDedup.survivors.filter(r => !assembly.unassigned.includes(r));
  const labelsReplaced = await normalizeResourceLabels(
    assigned, { ores: config.ores, zones }, oracle, warn
  );
  makeNamesUnique(assigned);

  const output = formatOutput(assembly.clusters, {
    ores: config.ores,
    zones,
    date: options.date ?? new Date(),
  });

  return {
    output,
    clusters: assembly.clusters,
    stats: {
      inputCount: coordinates.length,
      clusterDuplicates: clusterDedup.originalCount - clusterDedup.dedupedCount,
      resourceDuplicates: resourceDedup.originalCount - resourceDedup.dedupedCount,
      clustersCreated: assembly.created.length,
      unassigned: assembly.unassigned.length,
      labelsReplaced,
    },
  };
}
