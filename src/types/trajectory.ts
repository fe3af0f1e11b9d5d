/**
 * Trajectory sample type definitions.
 *
 * A trajectory sample is the immutable result of one stochastic run, as
 * handed over by the solver. The ensemble consumes it and never modifies it.
 */

import type { QuantumState } from "./quantum.js";

/**
 * Opaque token identifying the random stream of a run.
 */
export type Seed = string | number;

/**
 * One discrete jump: when it happened and which collapse channel fired.
 */
export interface CollapseEvent {
  time: number;
  channel: number;
}

/**
 * Result of a single trajectory.
 */
export interface TrajectorySample {
  /** Seed used to generate the trajectory */
  seed: Seed;

  /** Shared time grid */
  times: number[];

  /**
   * One row per observable, each with one value per time. Observables are
   * real-valued (expectation values of Hermitian operators).
   */
  expect: number[][];

  /** State at each time, when recorded */
  states?: QuantumState[];

  /**
   * State at the last time, when recorded. Defaults to the last of `states`
   * in an ensemble tracking states.
   */
  final_state?: QuantumState;

  /** Jump events, for trajectories with collapse operators */
  collapse_events?: CollapseEvent[];

  /** Martingale correction factor at each time */
  reweight_trace?: number[];
}

/**
 * Shape shared by every trajectory of one ensemble.
 *
 * Established from the first trajectory and never changed afterwards.
 */
export interface TrajectoryShape {
  times: readonly number[];
  numObservables: number;
  /** Density-matrix dimension of the recorded states, if tracked */
  stateDim: number | undefined;
  /** Density-matrix dimension of the final state, if tracked */
  finalStateDim: number | undefined;
}
