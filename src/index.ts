/**
 * trajectory-ensemble public API.
 *
 * The CLI entry point lives in bin.ts; importing this module has no side
 * effects.
 */

// =============================================================================
// Ensemble aggregation
// =============================================================================

export {
  Ensemble,
  mergeEnsembles,
  reduceEnsembles,
  buildEnsembleReport,
  describeEnsemble,
  formatEnsembleSummary,
  ProcessorPipeline,
  createStoppingCriterion,
  parseTargetTolerance,
  EnsembleError,
  ShapeMismatchError,
  ConfigurationError,
  IncompatibleAggregationsError,
  isEnsembleError,
} from "./ensemble/index.js";
export type {
  EnsembleReport,
  ReportOptions,
  StoppingCriterion,
  StoppingDecision,
} from "./ensemble/index.js";

// =============================================================================
// State algebra
// =============================================================================

export {
  complex,
  ket,
  operator,
  projector,
  toDensity,
  trace,
  stateDimension,
} from "./quantum/index.js";

// =============================================================================
// Input and configuration
// =============================================================================

export {
  readTrajectoryFile,
  parseTrajectoryDocument,
  checkTrajectoryFile,
} from "./io/trajectory-file.js";
export type { TrajectoryFile, TrajectoryFileCheck } from "./io/trajectory-file.js";

export { runAggregation, aggregatePartition } from "./pipeline/run.js";
export type { AggregationResult, PartitionResult } from "./pipeline/run.js";

export {
  loadConfig,
  loadConfigWithOverrides,
  parseConfig,
  extractCLIOptions,
} from "./config/index.js";
export type { CLIOptions, EnsembleConfig } from "./config/index.js";

export type * from "./types/index.js";
