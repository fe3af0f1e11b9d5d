/**
 * Running first and second moments of a time series.
 *
 * Shared by observable statistics and the martingale trace: each keeps the
 * elementwise sum and sum of squares, from which mean and standard
 * deviation are projected on demand.
 */

import { addArrays, zeros } from "../utils/array.js";

/**
 * Elementwise running sums over trajectories.
 */
export interface RunningMoments {
  sum: number[];
  sumSq: number[];
}

/**
 * Create empty moments for a series of `length` points.
 */
export function createMoments(length: number): RunningMoments {
  return { sum: zeros(length), sumSq: zeros(length) };
}

/**
 * Add one series in place.
 */
export function accumulateMoments(
  moments: RunningMoments,
  values: readonly number[],
): void {
  values.forEach((value, i) => {
    moments.sum[i] = (moments.sum[i] ?? 0) + value;
    moments.sumSq[i] = (moments.sumSq[i] ?? 0) + value * value;
  });
}

/**
 * Combined moments of two disjoint sets of series.
 */
export function mergeMoments(
  a: RunningMoments,
  b: RunningMoments,
): RunningMoments {
  return {
    sum: addArrays(a.sum, b.sum),
    sumSq: addArrays(a.sumSq, b.sumSq),
  };
}

export function cloneMoments(moments: RunningMoments): RunningMoments {
  return { sum: [...moments.sum], sumSq: [...moments.sumSq] };
}

/**
 * Elementwise mean over `n` series.
 */
export function meanOf(moments: RunningMoments, n: number): number[] {
  return moments.sum.map((s) => s / n);
}

/**
 * Plug-in variance `sumSq/n - mean^2`, which may come out slightly negative
 * when the true variance is zero.
 */
export function rawVarianceOf(moments: RunningMoments, n: number): number[] {
  return moments.sum.map((s, i) => {
    const mean = s / n;
    return (moments.sumSq[i] ?? 0) / n - Math.abs(mean) ** 2;
  });
}

/**
 * Population variance, clamped to be non-negative by taking the absolute
 * value of the plug-in estimate.
 */
export function varianceOf(moments: RunningMoments, n: number): number[] {
  return rawVarianceOf(moments, n).map((v) => Math.abs(v));
}

/**
 * Population standard deviation.
 */
export function stdOf(moments: RunningMoments, n: number): number[] {
  return varianceOf(moments, n).map((v) => Math.sqrt(v));
}
