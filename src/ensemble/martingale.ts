/**
 * Martingale trace tracking for non-Markovian trajectories.
 *
 * The reweighting trace is treated like one more scalar observable: its
 * running moments give the average and standard deviation per time.
 */

import { ShapeMismatchError } from "./errors.js";
import { accumulateMoments } from "./moments.js";

import type { BuiltinProcessor } from "./processors.js";

export function createTraceProcessor(): BuiltinProcessor {
  return {
    name: "trace",
    check(trajectory, shape) {
      const trace = trajectory.reweight_trace;
      if (!trace) {
        throw new ShapeMismatchError(
          `trajectory ${JSON.stringify(trajectory.seed)} carries no reweighting trace but the trace is tracked`,
        );
      }
      if (trace.length !== shape.times.length) {
        throw new ShapeMismatchError(
          `reweighting trace has ${String(trace.length)} values for ${String(shape.times.length)} times`,
        );
      }
    },
    reduce(trajectory, { accumulators }) {
      const acc = accumulators.trace;
      const trace = trajectory.reweight_trace;
      if (!acc || !trace) {
        return;
      }
      accumulateMoments(acc.moments, trace);
      acc.runs?.push([...trace]);
    },
  };
}
