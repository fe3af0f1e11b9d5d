/**
 * Accumulator state of an active ensemble.
 *
 * Created once from the shape of the first trajectory. Which fields exist is
 * decided by the ensemble's features, not by the data: a field is
 * `undefined` exactly when its concern is not tracked.
 */

import {
  cloneMoments,
  createMoments,
  mergeMoments,
  type RunningMoments,
} from "./moments.js";
import { addOperators, zeroOperator } from "../quantum/state.js";

import type {
  CollapseEvent,
  OperState,
  TrajectorySample,
  TrajectoryShape,
} from "../types/index.js";

/**
 * Concerns tracked by an ensemble, resolved from its options.
 */
export interface EnsembleFeatures {
  storeStates: boolean;
  storeFinalState: boolean;
  keepRuns: boolean;
  numCollapse: number | undefined;
  trace: boolean;
}

export interface TraceAccumulator {
  moments: RunningMoments;
  /** Per-run traces, when runs are retained */
  runs: number[][] | undefined;
}

export interface Accumulators {
  /** One entry per observable */
  expect: RunningMoments[];
  /** Density-matrix sum per time */
  states: OperState[] | undefined;
  finalState: OperState | undefined;
  runs: TrajectorySample[] | undefined;
  /** Collapse events per run */
  collapse: CollapseEvent[][] | undefined;
  trace: TraceAccumulator | undefined;
}

/**
 * Zeroed accumulators for the given shape.
 */
export function createAccumulators(
  shape: TrajectoryShape,
  features: EnsembleFeatures,
): Accumulators {
  const length = shape.times.length;
  const { stateDim, finalStateDim } = shape;

  return {
    expect: Array.from({ length: shape.numObservables }, () =>
      createMoments(length),
    ),
    states:
      features.storeStates && stateDim !== undefined
        ? shape.times.map(() => zeroOperator(stateDim))
        : undefined,
    finalState:
      features.storeFinalState && finalStateDim !== undefined
        ? zeroOperator(finalStateDim)
        : undefined,
    runs: features.keepRuns ? [] : undefined,
    collapse: features.numCollapse !== undefined ? [] : undefined,
    trace: features.trace
      ? {
          moments: createMoments(length),
          runs: features.keepRuns ? [] : undefined,
        }
      : undefined,
  };
}

/**
 * Features tracked by the merge of two ensembles: a concern survives only
 * when both sides track it.
 */
export function intersectFeatures(
  a: EnsembleFeatures,
  b: EnsembleFeatures,
): EnsembleFeatures {
  return {
    storeStates: a.storeStates && b.storeStates,
    storeFinalState: a.storeFinalState && b.storeFinalState,
    keepRuns: a.keepRuns && b.keepRuns,
    numCollapse:
      a.numCollapse !== undefined && a.numCollapse === b.numCollapse
        ? a.numCollapse
        : undefined,
    trace: a.trace && b.trace,
  };
}

function both<T>(
  a: T | undefined,
  b: T | undefined,
  combine: (x: T, y: T) => T,
): T | undefined {
  return a !== undefined && b !== undefined ? combine(a, b) : undefined;
}

function addOperatorLists(a: OperState[], b: OperState[]): OperState[] {
  return a.map((op, i) => {
    const other = b[i];
    return other ? addOperators(op, other) : op;
  });
}

/**
 * Sum of two accumulator sets built over the same shape. Inputs are not
 * modified.
 */
export function mergeAccumulators(a: Accumulators, b: Accumulators): Accumulators {
  return {
    expect: a.expect.map((moments, i) => {
      const other = b.expect[i];
      return other ? mergeMoments(moments, other) : cloneMoments(moments);
    }),
    states: both(a.states, b.states, addOperatorLists),
    finalState: both(a.finalState, b.finalState, addOperators),
    runs: both(a.runs, b.runs, (x, y) => [...x, ...y]),
    collapse: both(a.collapse, b.collapse, (x, y) => [...x, ...y]),
    trace: both(a.trace, b.trace, (x, y) => ({
      moments: mergeMoments(x.moments, y.moments),
      runs: both(x.runs, y.runs, (r, s) => [...r, ...s]),
    })),
  };
}

/**
 * Deep copy of the accumulators, keeping only the concerns in `features`.
 */
export function restrictAccumulators(
  acc: Accumulators,
  features: EnsembleFeatures,
): Accumulators {
  const copy = structuredClone(acc);
  const traceRuns = features.keepRuns ? copy.trace?.runs : undefined;
  return {
    expect: copy.expect,
    states: features.storeStates ? copy.states : undefined,
    finalState: features.storeFinalState ? copy.finalState : undefined,
    runs: features.keepRuns ? copy.runs : undefined,
    collapse: features.numCollapse !== undefined ? copy.collapse : undefined,
    trace:
      features.trace && copy.trace
        ? { moments: copy.trace.moments, runs: traceRuns }
        : undefined,
  };
}
