/**
 * Ensemble aggregation.
 */

export { Ensemble } from "./ensemble.js";
export { mergeEnsembles, reduceEnsembles } from "./merge.js";
export {
  buildEnsembleReport,
  describeEnsemble,
  formatEnsembleSummary,
} from "./summary.js";
export type {
  CollapseReport,
  EnsembleReport,
  ReportOptions,
  SerializedComplex,
  TraceReport,
} from "./summary.js";
export {
  ConfigurationError,
  EnsembleError,
  IncompatibleAggregationsError,
  ShapeMismatchError,
  isEnsembleError,
} from "./errors.js";
export type { EnsembleErrorCode } from "./errors.js";
export { ProcessorPipeline } from "./pipeline.js";
export {
  createStoppingCriterion,
  parseTargetTolerance,
  worstToleranceRatio,
} from "./stopping.js";
export type { StoppingCriterion, StoppingDecision } from "./stopping.js";
export {
  averagePhotocurrent,
  binIndex,
  histogramByChannel,
  runsPhotocurrent,
} from "./collapse.js";
export type { RunningMoments } from "./moments.js";
