/**
 * Merging partial ensembles.
 *
 * Workers each aggregate a disjoint share of the trajectories; the partial
 * ensembles are then combined pairwise.
 */

import { ConfigurationError } from "./errors.js";

import type { Ensemble } from "./ensemble.js";

/**
 * Merge two ensembles. Equivalent to `a.merge(b)`.
 *
 * @throws IncompatibleAggregationsError when the ensembles cannot be combined
 */
export function mergeEnsembles(a: Ensemble, b: Ensemble): Ensemble {
  return a.merge(b);
}

/**
 * Merge any number of ensembles as a balanced pairwise tree.
 *
 * Seeds keep the order of the input list. A single ensemble is returned
 * as is.
 *
 * @param ensembles - Ensembles to combine, in order
 * @throws ConfigurationError for an empty list
 *
 * @example
 * ```typescript
 * const combined = reduceEnsembles(workers.map((w) => w.ensemble));
 * ```
 */
export function reduceEnsembles(ensembles: readonly Ensemble[]): Ensemble {
  const [first, ...rest] = ensembles;
  if (!first) {
    throw new ConfigurationError("Cannot reduce an empty list of ensembles");
  }
  if (rest.length === 0) {
    return first;
  }

  let level: Ensemble[] = [...ensembles];
  while (level.length > 1) {
    const next: Ensemble[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left && right) {
        next.push(left.merge(right));
      } else if (left) {
        next.push(left);
      }
    }
    level = next;
  }
  return level[0] ?? first;
}
