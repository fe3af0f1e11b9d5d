/**
 * Built-in reduction processors.
 *
 * Each factory returns a processor owning a single concern. They read and
 * write the shared accumulators handed to them in the reduce context and
 * know nothing about one another.
 */

import { ShapeMismatchError } from "./errors.js";
import { accumulateMoments } from "./moments.js";
import { addOperators, isSquare, stateDimension, toDensity } from "../quantum/state.js";

import type { Accumulators } from "./accumulators.js";
import type {
  QuantumState,
  ReduceContext,
  TrajectoryProcessor,
  TrajectorySample,
} from "../types/index.js";

/**
 * Reduce context of built-in processors.
 */
export interface AccumulatorContext extends ReduceContext {
  accumulators: Accumulators;
}

export type BuiltinProcessor = TrajectoryProcessor<AccumulatorContext>;

function describeSeed(trajectory: TrajectorySample): string {
  return `trajectory ${JSON.stringify(trajectory.seed)}`;
}

/**
 * Throw unless `state` is well formed with density dimension `dim`.
 */
export function assertStateDimension(
  state: QuantumState,
  dim: number | undefined,
  label: string,
): void {
  if (state.type === "oper" && !isSquare(state)) {
    throw new ShapeMismatchError(`${label} is not a square operator`);
  }
  const actual = stateDimension(state);
  if (actual !== dim) {
    throw new ShapeMismatchError(
      `${label} has dimension ${String(actual)}, expected ${String(dim)}`,
    );
  }
}

/**
 * Retains a structured copy of every trajectory.
 */
export function createRunsProcessor(): BuiltinProcessor {
  return {
    name: "runs",
    reduce(trajectory, { accumulators }) {
      accumulators.runs?.push(structuredClone(trajectory));
    },
  };
}

/**
 * Sums the per-time states as density matrices.
 */
export function createStatesProcessor(): BuiltinProcessor {
  return {
    name: "states",
    check(trajectory, shape) {
      const { states } = trajectory;
      if (!states) {
        throw new ShapeMismatchError(
          `${describeSeed(trajectory)} carries no states but states are tracked`,
        );
      }
      if (states.length !== shape.times.length) {
        throw new ShapeMismatchError(
          `${describeSeed(trajectory)} has ${String(states.length)} states for ${String(shape.times.length)} times`,
        );
      }
      states.forEach((state, i) => {
        assertStateDimension(
          state,
          shape.stateDim,
          `${describeSeed(trajectory)} state ${String(i)}`,
        );
      });
    },
    reduce(trajectory, { accumulators }) {
      const sums = accumulators.states;
      const states = trajectory.states;
      if (!sums || !states) {
        return;
      }
      accumulators.states = sums.map((sum, i) => {
        const state = states[i];
        return state ? addOperators(sum, toDensity(state)) : sum;
      });
    },
  };
}

/**
 * Final state of a trajectory. When states are tracked, a trajectory without
 * an explicit final state ends in its last tracked state.
 */
export function finalStateOf(
  trajectory: TrajectorySample,
  fromStates: boolean,
): QuantumState | undefined {
  if (trajectory.final_state || !fromStates) {
    return trajectory.final_state;
  }
  const { states } = trajectory;
  return states?.[states.length - 1];
}

/**
 * Sums the final state as a density matrix.
 *
 * @param fromStates - Fall back to the last tracked state
 */
export function createFinalStateProcessor(fromStates = false): BuiltinProcessor {
  return {
    name: "final_state",
    check(trajectory, shape) {
      const finalState = finalStateOf(trajectory, fromStates);
      if (!finalState) {
        throw new ShapeMismatchError(
          `${describeSeed(trajectory)} carries no final state but the final state is tracked`,
        );
      }
      assertStateDimension(
        finalState,
        shape.finalStateDim,
        `${describeSeed(trajectory)} final state`,
      );
    },
    reduce(trajectory, { accumulators }) {
      const sum = accumulators.finalState;
      const finalState = finalStateOf(trajectory, fromStates);
      if (sum && finalState) {
        accumulators.finalState = addOperators(sum, toDensity(finalState));
      }
    },
  };
}

/**
 * Accumulates first and second moments of every observable.
 */
export function createExpectProcessor(): BuiltinProcessor {
  return {
    name: "expect",
    reduce(trajectory, { accumulators }) {
      accumulators.expect.forEach((moments, k) => {
        const values = trajectory.expect[k];
        if (values) {
          accumulateMoments(moments, values);
        }
      });
    },
  };
}
