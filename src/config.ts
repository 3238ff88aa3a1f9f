/**
 * Game configuration: zone table, ore vocabulary, cluster prefix and
 * distance thresholds. Loaded from JSON and validated with zod.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { OreVocabulary } from './labels.js';
import { ZoneTable } from './zones.js';

const PACKAGE_NAME = 'gps-cluster-sort';

// ============================================================================
// SCHEMAS
// ============================================================================

export const ZoneDefinitionSchema = z.object({
  abbreviation: z.string().min(1),
  header: z.string().min(1),
  center: z.string().regex(/^GPS:/, 'must be a GPS line'),
});

export const OreDefinitionSchema = z.object({
  code: z.string().regex(/^[A-Z]+$/, 'must be upper-case letters'),
  name: z.string().min(1).optional(),
});

export const ThresholdsSchema = z.object({
  duplicateResourceMeters: z.number().positive(),
  duplicateClusterMeters: z.number().positive(),
  clusterAssignMeters: z.number().positive(),
});

export const GameConfigSchema = z.object({
  clusterPrefix: z.string().min(1),
  thresholds: ThresholdsSchema,
  zones: z.array(ZoneDefinitionSchema),
  ores: z.array(OreDefinitionSchema).min(1),
});

export type GameConfigFile = z.infer<typeof GameConfigSchema>;
export type Thresholds = z.infer<typeof ThresholdsSchema>;

export interface GameConfig {
  clusterPrefix: string;
  thresholds: Thresholds;
  zones: ZoneTable;
  ores: OreVocabulary;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Find the package root by walking up from this module to the package.json
 * named gps-cluster-sort. Works from both src/ and dist/src/.
 */
function findPackageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && pkg.name === PACKAGE_NAME) {
        return dir;
      }
    }
    dir = path.dirname(dir);
  }
  throw new Error(`Could not locate the ${PACKAGE_NAME} package root`);
}

export function defaultConfigPath(): string {
  return path.join(findPackageRoot(), 'config', 'default.json');
}

/**
 * Validate raw configuration data and build the zone table and vocabulary.
 *
 * @throws Error listing every schema issue, or the first table-order problem
 */
export function parseGameConfig(data: unknown, source = 'configuration'): GameConfig {
  const result = GameConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid ${source}:\n${issues}`);
  }

  const file = result.data;
  return {
    clusterPrefix: file.clusterPrefix,
    thresholds: file.thresholds,
    zones: ZoneTable.fromDefinitions(file.zones),
    ores: new OreVocabulary(file.ores),
  };
}

/**
 * Load configuration from a JSON file, by default config/default.json.
 */
export function loadGameConfig(configPath: string = defaultConfigPath()): GameConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseGameConfig(data, `config file ${configPath}`);
}
