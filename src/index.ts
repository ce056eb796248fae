/**
 * @fileoverview debt-hotspots - technical-debt hotspots from maintainability and churn
 *
 * Combines a per-file maintainability score with the number of times each
 * file changed in git, aggregates both up the directory tree and ranks every
 * path by its hotspot index.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadHotspotConfig, runHotspotAnalysis, renderMetrics } from 'debt-hotspots';
 *
 * const config = await loadHotspotConfig('/path/to/repo', { since: '2024-01-01' });
 * const report = await runHotspotAnalysis('/path/to/repo', config);
 * process.stdout.write(renderMetrics(report.rows, 'csv'));
 * ```
 *
 * ## Precomputed inputs
 *
 * ```typescript
 * import { combineMetrics, resolveConfig } from 'debt-hotspots';
 *
 * const { rows } = combineMetrics(
 *   [{ path: 'a/x.ts', score: 50 }],
 *   [{ path: 'a/x.ts', count: 2 }],
 *   resolveConfig()
 * );
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PIPELINE
// ============================================================================

export {
  runHotspotAnalysis,
  combineMetrics,
  type HotspotReport,
  type AnalysisHooks,
} from './hotspots/analysis.js';

// ============================================================================
// AGGREGATION CORE
// ============================================================================

export {
  MetricsAggregator,
  MINIMUM_MAINTAINABILITY,
  applyChanges,
  applyMaintainability,
  clampScore,
  createMetricsMap,
  createPathMetrics,
  type AggregatorOptions,
} from './hotspots/aggregator.js';
export { expandAncestors } from './hotspots/ancestors.js';
export { createExclusionSet, isExcluded, type ExclusionSet } from './hotspots/exclusion.js';
export { computeHotspotIndex, isDeleted, toHotspotRow } from './hotspots/hotspot_index.js';
export {
  DEFAULT_SOURCE_EXTENSIONS,
  classifyPath,
  hasSourceExtension,
  toExtensionSet,
} from './hotspots/path_classifier.js';
export { selectMetrics } from './hotspots/selector.js';
export { SORT_CONVENTION, sortMetrics } from './hotspots/sorting.js';

// ============================================================================
// SOURCES
// ============================================================================

export { discoverSourceFiles, type DiscoveryOptions } from './sources/file_discovery.js';
export {
  computeMaintainability,
  createMaintainabilityOracle,
  maintainabilityIndex,
  type MaintainabilityOracle,
  type MaintainabilityResult,
} from './sources/maintainability_index.js';
export { measureFile, measureFiles, type MeasureFilesOptions } from './sources/measure_files.js';
export {
  buildGitLogArgs,
  collectFileChanges,
  countChanges,
  readChangeLog,
  type ChangeCountOptions,
  type ChangeLogOptions,
} from './sources/git_change_log.js';
export {
  loadChangesData,
  loadMaintainabilityData,
  parseChangesData,
  parseMaintainabilityData,
  toChangesRecord,
  toMaintainabilityRecord,
} from './sources/json_inputs.js';

// ============================================================================
// RENDERING
// ============================================================================

export {
  renderMetrics,
  renderCsv,
  renderJson,
  renderTable,
  parseMetricsCsv,
  type RenderOptions,
} from './render/index.js';

// ============================================================================
// CONFIGURATION & ERRORS
// ============================================================================

export {
  CONFIG_FILENAME,
  DEFAULT_HOTSPOT_CONFIG,
  loadConfigFile,
  loadHotspotConfig,
  parseOutputFormat,
  parseSince,
  parseSortField,
  resolveConfig,
  type HotspotConfig,
  type HotspotConfigOverrides,
} from './config/index.js';
export {
  ChangeLogError,
  ConfigurationError,
  HotspotError,
  InputFormatError,
  MeasurementError,
  isHotspotError,
  type ErrorJSON,
} from './core/errors.js';

export * from './types.js';
export { DEBT_HOTSPOTS_VERSION } from './version.js';
