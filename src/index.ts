/**
 * gps-cluster-sort - deduplicate, cluster and normalize game GPS marker lists
 *
 * @packageDocumentation
 */

// ============================================================================
// GEOMETRY
// ============================================================================

export {
  type Position,
  distance,
  exactDistance,
  isWithinRadius,
  roundTo,
  calculateCentroid,
} from './geo-utils.js';

// ============================================================================
// PARSER
// ============================================================================

export {
  type GpsCoordinate,
  type ParseError,
  type ParsedGpsResult,
  MalformedLineError,
  parseCoordinateLine,
  parseCoordinateText,
  parseCoordinateFile,
  formatCoordinate,
} from './parser.js';

// ============================================================================
// CONFIGURATION & ZONES
// ============================================================================

export {
  type GameConfig,
  type GameConfigFile,
  type Thresholds,
  GameConfigSchema,
  defaultConfigPath,
  parseGameConfig,
  loadGameConfig,
} from './config.js';

export {
  type Zone,
  type ZoneDefinition,
  ZoneTable,
  createZone,
  parseZoneRadius,
} from './zones.js';

// ============================================================================
// DECISION ORACLE
// ============================================================================

export {
  type DecisionOracle,
  type DuplicateCandidate,
  type OracleScript,
  type ScriptedOracle,
  type TerminalOracle,
  createScriptedOracle,
  createTerminalOracle,
  parseChoice,
} from './oracle.js';

// ============================================================================
// DEDUPLICATION
// ============================================================================

export {
  type DedupOptions,
  type DedupResult,
  type DuplicateGroup,
  type DuplicateMember,
  findDuplicates,
  markDuplicates,
  resolveDuplicates,
} from './dedup.js';

// ============================================================================
// CLUSTERS
// ============================================================================

export {
  type AssemblyOptions,
  type AssemblyResult,
  type AssignmentPolicy,
  ASSIGNMENT_POLICIES,
  assembleClusters,
  createClusterForResource,
  findNearestCluster,
  generateClusterName,
  isClusterMarker,
  sanitizeFolderName,
  splitMarkers,
} from './clusters.js';

// ============================================================================
// LABELS
// ============================================================================

export {
  type LabelVocabulary,
  type NormalizeResult,
  type OreDefinition,
  type OreEntry,
  OreVocabulary,
  formatLabel,
  leadingOrePriority,
  makeNamesUnique,
  normalizeLabel,
  normalizeResourceLabels,
  parseOreList,
} from './labels.js';

// ============================================================================
// OUTPUT & PIPELINE
// ============================================================================

export {
  type OutputOptions,
  formatOutput,
  formatPreamble,
  orderClusters,
} from './output.js';

export {
  type PipelineOptions,
  type PipelineResult,
  type PipelineStats,
  runPipeline,
} from './pipeline.js';

export { type CliIO, type ResolvedIO, UsageError, createProgram, runCli } from './cli.js';
