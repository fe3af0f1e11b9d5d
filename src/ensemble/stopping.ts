/**
 * Stopping criteria for trajectory consumption.
 *
 * After every trajectory the ensemble asks its criterion how many more
 * trajectories are needed. The answer is advisory: the driver producing
 * trajectories decides whether to stop.
 *
 * Three policies:
 * - "unbounded": never finishes on its own (remaining is always Infinity)
 * - "fixed": finishes after exactly `ntraj` trajectories
 * - "tolerance": estimates the total needed for the error on every
 *   observable to fall within `atol + rtol * |mean|`, capped at `ntraj`
 */

import { ConfigurationError } from "./errors.js";
import { meanOf, rawVarianceOf, type RunningMoments } from "./moments.js";

import type {
  EndCondition,
  StoppingPolicy,
  TolerancePair,
} from "../types/index.js";

/**
 * Outcome of one evaluation.
 */
export interface StoppingDecision {
  /** Trajectories still needed; Infinity when unknown */
  remaining: number;
  /** Set when the policy is satisfied by this evaluation */
  endCondition?: EndCondition;
  /** Current estimate of the total (tolerance policy only) */
  estimatedNtraj?: number;
}

export interface StoppingCriterion {
  readonly policy: StoppingPolicy;
  /** End condition reported before the policy is satisfied */
  readonly initialEndCondition: EndCondition;
  /** Estimated total before any evaluation (tolerance policy only) */
  readonly initialEstimate: number | undefined;
  evaluate(
    numTrajectories: number,
    expect: readonly RunningMoments[],
  ): StoppingDecision;
}

function isFiniteNonNegative(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isTolerancePair(value: unknown): value is TolerancePair {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((v) => typeof v === "number")
  );
}

function assertPair(pair: TolerancePair): TolerancePair {
  const [atol, rtol] = pair;
  if (!isFiniteNonNegative(atol) || !isFiniteNonNegative(rtol)) {
    throw new ConfigurationError(
      `Tolerances must be finite and non-negative, got [${String(atol)}, ${String(rtol)}]`,
    );
  }
  return [atol, rtol];
}

/**
 * Resolve a target tolerance into one `[atol, rtol]` pair per observable.
 *
 * @param spec - A number, an `[atol, rtol]` pair, or one pair per observable
 * @param numObservables - Number of observables in the ensemble
 * @throws ConfigurationError for zero observables or any other shape
 *
 * @example
 * ```ts
 * parseTargetTolerance(0.1, 2); // [[0.1, 0], [0.1, 0]]
 * parseTargetTolerance([0.1, 0.01], 2); // [[0.1, 0.01], [0.1, 0.01]]
 * ```
 */
export function parseTargetTolerance(
  spec: unknown,
  numObservables: number,
): TolerancePair[] {
  if (numObservables === 0) {
    throw new ConfigurationError(
      "Cannot target a tolerance without observables",
    );
  }

  if (typeof spec === "number") {
    const pair = assertPair([spec, 0]);
    return Array.from({ length: numObservables }, () => pair);
  }

  if (isTolerancePair(spec)) {
    const pair = assertPair(spec);
    return Array.from({ length: numObservables }, () => pair);
  }

  if (
    Array.isArray(spec) &&
    spec.length === numObservables &&
    spec.every(isTolerancePair)
  ) {
    return spec.map(assertPair);
  }

  throw new ConfigurationError(
    "target tolerance must be a number, a pair of (atol, rtol) or a list of (atol, rtol) for each observable",
  );
}

function assertNtraj(ntraj: number): void {
  if (!Number.isInteger(ntraj) || ntraj <= 0) {
    throw new ConfigurationError(
      `ntraj must be a positive integer, got ${String(ntraj)}`,
    );
  }
}

/**
 * Largest `var / target^2` over every observable and time.
 *
 * A zero target counts as satisfied where the variance is zero and as
 * unreachable otherwise.
 */
export function worstToleranceRatio(
  numTrajectories: number,
  expect: readonly RunningMoments[],
  tolerances: readonly TolerancePair[],
): number {
  let worst = 0;
  expect.forEach((moments, k) => {
    const [atol, rtol] = tolerances[k] ?? [0, 0];
    const means = meanOf(moments, numTrajectories);
    const variances = rawVarianceOf(moments, numTrajectories);
    means.forEach((mean, t) => {
      const variance = variances[t] ?? 0;
      const target = atol + rtol * Math.abs(mean);
      const ratio =
        target === 0 ? (variance <= 0 ? 0 : Infinity) : variance / target ** 2;
      worst = Math.max(worst, ratio);
    });
  });
  return worst;
}

/**
 * Build the criterion for a policy.
 *
 * @param policy - Stopping policy
 * @param numObservables - Number of observables in the ensemble
 * @throws ConfigurationError on invalid parameters
 */
export function createStoppingCriterion(
  policy: StoppingPolicy,
  numObservables: number,
): StoppingCriterion {
  switch (policy.kind) {
    case "unbounded":
      return {
        policy,
        initialEndCondition: "unknown",
        initialEstimate: undefined,
        evaluate: () => ({ remaining: Infinity }),
      };

    case "fixed": {
      const { ntraj } = policy;
      assertNtraj(ntraj);
      return {
        policy,
        initialEndCondition: "timeout",
        initialEstimate: undefined,
        evaluate(numTrajectories) {
          const remaining = ntraj - numTrajectories;
          return remaining === 0
            ? { remaining, endCondition: "ntraj_reached" }
            : { remaining };
        },
      };
    }

    case "tolerance": {
      const { ntraj } = policy;
      assertNtraj(ntraj);
      const tolerances = parseTargetTolerance(policy.targetTol, numObservables);
      return {
        policy,
        initialEndCondition: "timeout",
        initialEstimate: ntraj,
        evaluate(numTrajectories, expect) {
          if (numTrajectories <= 1) {
            return { remaining: Infinity, estimatedNtraj: ntraj };
          }
          const worst = worstToleranceRatio(numTrajectories, expect, tolerances);
          const estimatedNtraj = Math.min(Math.ceil(worst + 1), ntraj);
          const remaining = estimatedNtraj - numTrajectories;
          return remaining <= 0
            ? {
                remaining,
                estimatedNtraj,
                endCondition: "target_tolerance_reached",
              }
            : { remaining, estimatedNtraj };
        },
      };
    }
  }
}
