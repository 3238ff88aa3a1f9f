/**
 * Output Sequencer
 *
 * Orders clusters by zone (outer zones first) and resources by ore priority,
 * then writes them back out as GPS lines under zone section headers.
 */

import { formatCoordinate, type GpsCoordinate } from './parser.js';
import { leadingOrePriority, type OreVocabulary } from './labels.js';
import type { ZoneTable } from './zones.js';

export interface OutputOptions {
  ores: OreVocabulary;
  /** Zone table, or null when zoning is off (no headers, input order) */
  zones: ZoneTable | null;
  /** Date printed in the preamble */
  date: Date;
}

// ============================================================================
// ORDERING
// ============================================================================

/**
 * Sort clusters by descending zone-table index and each cluster's resources
 * by the priority of their leading ore. Both sorts are stable.
 */
export function orderClusters(
  clusters: readonly GpsCoordinate[],
  ores: OreVocabulary,
  zones: ZoneTable | null
): GpsCoordinate[] {
  const ordered = zones
    ? [...clusters].sort((a, b) => zones.indexOf(b.zone) - zones.indexOf(a.zone))
    : [...clusters];

  for (const cluster of ordered) {
    cluster.resources?.sort(
      (a, b) => leadingOrePriority(a.name, ores) - leadingOrePriority(b.name, ores)
    );
  }

  return ordered;
}

// ============================================================================
// FORMATTING
// ============================================================================

function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}.${month}.${day}`;
}

/**
 * Header comment block: date, import instructions, ore order of precedence.
 */
export function formatPreamble(ores: OreVocabulary, date: Date): string {
  const precedence = ores.ores.map(ore =>
    ore.name ? `#   ${ore.code} (${ore.name})` : `#   ${ore.code}`
  );

  return [
    `# Up-to-date as of ${formatDate(date)}`,
    '#',
    '# You can easily add GPSs to your list by making an LCD, opening the text edit',
    "# by hitting 'F', and pasting your desired GPSs into it.  Then go into your GPS",
    '# list, and turn them on.',
    '#',
    '# Order of Precedence:',
    ...precedence,
  ].join('\n');
}

/**
 * Render the full output file. Clusters without resources are left out.
 */
export function formatOutput(clusters: readonly GpsCoordinate[], options: OutputOptions): string {
  const { ores, zones, date } = options;
  const lines: string[] = [formatPreamble(ores, date), ''];
  let currentHeader: string | null = null;

  for (const cluster of orderClusters(clusters, ores, zones)) {
    if (!cluster.resources || cluster.resources.length === 0) continue;

    const header = zones?.get(cluster.zone)?.header ?? null;
    if (header !== null && header !== currentHeader) {
      lines.push('', `# ${header}:`, '');
      currentHeader = header;
    }

    lines.push(formatCoordinate(cluster));
    for (const resource of cluster.resources) {
      lines.push(formatCoordinate(resource));
    }
    lines.push('');
  }

  return `${lines.join('\n')}\n`;
}
