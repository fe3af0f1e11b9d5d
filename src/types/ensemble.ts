/**
 * Ensemble type definitions.
 * Represents stopping policies, statistics and construction options.
 */

import type { TrajectorySample, TrajectoryShape } from "./trajectory.js";

/**
 * Why trajectory consumption ended (or would end).
 *
 * - `unknown`: no stopping policy was set
 * - `timeout`: a policy was set but has not been satisfied yet
 * - `ntraj_reached`: the fixed trajectory count was reached
 * - `target_tolerance_reached`: the error estimate is within tolerance
 * - `merged`: the ensemble is the result of a merge
 */
export type EndCondition =
  | "unknown"
  | "timeout"
  | "ntraj_reached"
  | "target_tolerance_reached"
  | "merged";

/**
 * Absolute and relative tolerance pair.
 */
export type TolerancePair = readonly [atol: number, rtol: number];

/**
 * Accepted target tolerance shapes:
 * - a single absolute tolerance (relative tolerance 0)
 * - one `[atol, rtol]` pair broadcast to every observable
 * - one `[atol, rtol]` pair per observable
 */
export type ToleranceSpec = number | TolerancePair | readonly TolerancePair[];

/**
 * Stopping policy selected at ensemble creation.
 */
export type StoppingPolicy =
  | { kind: "unbounded" }
  | { kind: "fixed"; ntraj: number }
  | { kind: "tolerance"; ntraj: number; targetTol: ToleranceSpec };

/**
 * Statistics exposed by an ensemble.
 */
export interface EnsembleStats {
  end_condition: EndCondition;
  num_trajectories: number;
  /** Estimated total trajectories (tolerance policy only) */
  estimated_ntraj?: number;
  /** Collapse channel count (collapse tracking only) */
  num_collapse?: number;
}

/**
 * Read-only view handed to processors while reducing a trajectory.
 */
export interface ReduceContext {
  /** Trajectory count including the one being reduced */
  numTrajectories: number;
  shape: TrajectoryShape;
}

/**
 * A reduction step run once per incoming trajectory.
 *
 * The pipeline runs every processor's `check` before any `reduce`, so a
 * failing check leaves all accumulators untouched.
 */
export interface TrajectoryProcessor<C extends ReduceContext = ReduceContext> {
  /** Name used in logs and error messages */
  readonly name: string;

  /**
   * Throw a `ShapeMismatchError` if the trajectory does not fit.
   */
  check?(trajectory: TrajectorySample, shape: TrajectoryShape): void;

  /**
   * Fold the trajectory into the processor's accumulator.
   */
  reduce(trajectory: TrajectorySample, context: C): void;
}

/**
 * Specialized trajectory tracking.
 */
export interface TrackingOptions {
  /** Collapse channel count; enables collapse tracking when set */
  numCollapse?: number;
  /** Accumulate the martingale reweighting trace */
  trace?: boolean;
}

/**
 * Options for creating an ensemble.
 */
export interface EnsembleOptions {
  /** Observable keys, in the order of each trajectory's `expect` rows */
  observables?: readonly string[];

  /**
   * Accumulate the per-time states as density matrices.
   * Defaults to `true` when there are no observables.
   */
  storeStates?: boolean;

  /** Accumulate the final state as a density matrix */
  storeFinalState?: boolean;

  /** Retain a copy of every trajectory */
  keepRunsResults?: boolean;

  /** Stopping policy (default: unbounded) */
  stopping?: StoppingPolicy;

  tracking?: TrackingOptions;

  /** Name of the solver producing the trajectories, for display */
  solver?: string;

  /**
   * Additional processors, run after the built-in ones.
   * They observe trajectories added to this instance only and are not
   * carried into merged ensembles.
   */
  processors?: readonly TrajectoryProcessor[];
}
