/**
 * Collapse tracking for jump trajectories.
 *
 * Keeps every run's `(time, channel)` collapse list and reconstructs the
 * measurement record (photocurrent) over the shared time grid.
 */

import { ShapeMismatchError } from "./errors.js";
import { diff, zeros } from "../utils/array.js";

import type { BuiltinProcessor } from "./processors.js";
import type { CollapseEvent } from "../types/index.js";

/**
 * Records each run's collapse events.
 *
 * @param numCollapse - Channel count, fixed by the solver
 */
export function createCollapseProcessor(numCollapse: number): BuiltinProcessor {
  return {
    name: "collapse",
    check(trajectory) {
      const events = trajectory.collapse_events;
      if (!events) {
        throw new ShapeMismatchError(
          `trajectory ${JSON.stringify(trajectory.seed)} carries no collapse events but collapses are tracked`,
        );
      }
      for (const event of events) {
        if (
          !Number.isInteger(event.channel) ||
          event.channel < 0 ||
          event.channel >= numCollapse
        ) {
          throw new ShapeMismatchError(
            `collapse channel ${String(event.channel)} out of range [0, ${String(numCollapse)})`,
          );
        }
      }
    },
    reduce(trajectory, { accumulators }) {
      accumulators.collapse?.push(
        (trajectory.collapse_events ?? []).map((e) => ({ ...e })),
      );
    },
  };
}

/**
 * Times of every collapse, per run.
 */
export function collapseTimes(records: readonly CollapseEvent[][]): number[][] {
  return records.map((events) => events.map((e) => e.time));
}

/**
 * Channel of every collapse, per run.
 */
export function collapseChannels(
  records: readonly CollapseEvent[][],
): number[][] {
  return records.map((events) => events.map((e) => e.channel));
}

/**
 * Index of the bin `[edges[i], edges[i+1])` holding `value`; the last bin
 * also includes its right edge. Returns -1 outside the grid.
 */
export function binIndex(edges: readonly number[], value: number): number {
  const last = edges.length - 1;
  const first = edges[0];
  const end = edges[last];
  if (last < 1 || first === undefined || end === undefined) {
    return -1;
  }
  if (value < first || value > end) {
    return -1;
  }
  if (value === end) {
    return last - 1;
  }
  let lo = 0;
  let hi = last;
  // invariant: edges[lo] <= value < edges[hi]
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if ((edges[mid] ?? Infinity) <= value) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Per-channel event counts over the bins defined by `edges`.
 */
export function histogramByChannel(
  events: Iterable<CollapseEvent>,
  edges: readonly number[],
  numCollapse: number,
): number[][] {
  const bins = Math.max(edges.length - 1, 0);
  const counts = Array.from({ length: numCollapse }, () => zeros(bins));
  for (const event of events) {
    const bin = binIndex(edges, event.time);
    const row = counts[event.channel];
    if (bin >= 0 && row) {
      row[bin] = (row[bin] ?? 0) + 1;
    }
  }
  return counts;
}

/**
 * Ensemble-averaged measurement record: per channel, the event rate in each
 * time bin divided by the number of trajectories.
 */
export function averagePhotocurrent(
  records: readonly CollapseEvent[][],
  times: readonly number[],
  numCollapse: number,
  numTrajectories: number,
): number[][] {
  const widths = diff(times);
  return histogramByChannel(records.flat(), times, numCollapse).map((row) =>
    row.map((count, i) => count / (widths[i] ?? NaN) / numTrajectories),
  );
}

/**
 * Measurement record of each run: per channel, the event rate in each time
 * bin.
 */
export function runsPhotocurrent(
  records: readonly CollapseEvent[][],
  times: readonly number[],
  numCollapse: number,
): number[][][] {
  const widths = diff(times);
  return records.map((events) =>
    histogramByChannel(events, times, numCollapse).map((row) =>
      row.map((count, i) => count / (widths[i] ?? NaN)),
    ),
  );
}
