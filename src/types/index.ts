/**
 * Centralized type exports.
 */

// Quantum state types
export type {
  Complex,
  KetState,
  OperState,
  QuantumState,
  StateType,
} from "./quantum.js";

// Trajectory types
export type {
  CollapseEvent,
  Seed,
  TrajectorySample,
  TrajectoryShape,
} from "./trajectory.js";

// Ensemble types
export type {
  EndCondition,
  EnsembleOptions,
  EnsembleStats,
  ReduceContext,
  StoppingPolicy,
  TolerancePair,
  ToleranceSpec,
  TrackingOptions,
  TrajectoryProcessor,
} from "./ensemble.js";
