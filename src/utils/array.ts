/**
 * Array utility functions for elementwise numeric operations.
 */

/**
 * Creates an array of `length` zeros.
 */
export function zeros(length: number): number[] {
  return new Array<number>(length).fill(0);
}

/**
 * Elementwise sum of two equal-length arrays.
 *
 * @example
 * ```ts
 * addArrays([1, 2], [10, 20]); // [11, 22]
 * ```
 */
export function addArrays(
  a: readonly number[],
  b: readonly number[],
): number[] {
  return a.map((value, i) => value + (b[i] ?? 0));
}

/**
 * Adjacent differences: `[x1 - x0, x2 - x1, ...]`.
 *
 * @example
 * ```ts
 * diff([0, 1, 3]); // [1, 2]
 * diff([5]); // []
 * ```
 */
export function diff(values: readonly number[]): number[] {
  return values.slice(1).map((value, i) => value - (values[i] ?? 0));
}

/**
 * Exact elementwise equality of two numeric arrays.
 */
export function arraysEqual(
  a: readonly number[],
  b: readonly number[],
): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
