import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../../../src/ensemble/errors.js";
import {
  accumulateMoments,
  createMoments,
  type RunningMoments,
} from "../../../src/ensemble/moments.js";
import {
  createStoppingCriterion,
  parseTargetTolerance,
  worstToleranceRatio,
} from "../../../src/ensemble/stopping.js";

/** Moments of one observable from its per-trajectory values at one time. */
function singlePoint(values: number[]): RunningMoments {
  const moments = createMoments(1);
  for (const value of values) {
    accumulateMoments(moments, [value]);
  }
  return moments;
}

describe("parseTargetTolerance", () => {
  it("broadcasts a number as an absolute tolerance", () => {
    expect(parseTargetTolerance(0.1, 2)).toEqual([
      [0.1, 0],
      [0.1, 0],
    ]);
  });

  it("broadcasts a single pair", () => {
    expect(parseTargetTolerance([0.1, 0.01], 2)).toEqual([
      [0.1, 0.01],
      [0.1, 0.01],
    ]);
  });

  it("accepts one pair per observable", () => {
    expect(
      parseTargetTolerance(
        [
          [0.1, 0],
          [0.2, 0.5],
        ],
        2,
      ),
    ).toEqual([
      [0.1, 0],
      [0.2, 0.5],
    ]);
  });

  it("rejects a list of the wrong length", () => {
    expect(() =>
      parseTargetTolerance(
        [
          [0.1, 0],
          [0.2, 0],
          [0.3, 0],
        ],
        2,
      ),
    ).toThrow(ConfigurationError);
  });

  it("rejects other shapes", () => {
    expect(() => parseTargetTolerance([0.1], 1)).toThrow(
      "target tolerance must be a number, a pair of (atol, rtol) or a list of (atol, rtol) for each observable",
    );
    expect(() => parseTargetTolerance("0.1", 1)).toThrow(ConfigurationError);
  });

  it("rejects negative tolerances", () => {
    expect(() => parseTargetTolerance(-0.1, 1)).toThrow(
      "Tolerances must be finite and non-negative, got [-0.1, 0]",
    );
  });

  it("requires at least one observable", () => {
    expect(() => parseTargetTolerance(0.1, 0)).toThrow(
      "Cannot target a tolerance without observables",
    );
  });
});

describe("worstToleranceRatio", () => {
  it("uses atol + rtol * |mean| as the target", () => {
    // mean 2, variance 2/3, target 0 + 0.5 * 2 = 1
    const ratio = worstToleranceRatio(3, [singlePoint([1, 3, 2])], [[0, 0.5]]);

    expect(ratio).toBeCloseTo(2 / 3, 12);
  });

  it("counts a zero target as met only where the variance is zero", () => {
    expect(worstToleranceRatio(3, [singlePoint([2, 2, 2])], [[0, 0]])).toBe(0);
    expect(worstToleranceRatio(3, [singlePoint([1, 3, 2])], [[0, 0]])).toBe(
      Infinity,
    );
  });

  it("takes the maximum over observables", () => {
    const ratio = worstToleranceRatio(
      3,
      [singlePoint([2, 2, 2]), singlePoint([1, 3, 2])],
      [
        [0.1, 0],
        [1, 0],
      ],
    );

    expect(ratio).toBeCloseTo(2 / 3, 12);
  });
});

describe("createStoppingCriterion", () => {
  describe("unbounded", () => {
    it("never finishes", () => {
      const criterion = createStoppingCriterion({ kind: "unbounded" }, 1);

      expect(criterion.initialEndCondition).toBe("unknown");
      expect(criterion.evaluate(1000, [])).toEqual({ remaining: Infinity });
    });
  });

  describe("fixed", () => {
    const criterion = createStoppingCriterion({ kind: "fixed", ntraj: 3 }, 1);

    it("starts as timeout", () => {
      expect(criterion.initialEndCondition).toBe("timeout");
      expect(criterion.initialEstimate).toBeUndefined();
    });

    it("counts down to zero", () => {
      expect(criterion.evaluate(1, [])).toEqual({ remaining: 2 });
      expect(criterion.evaluate(3, [])).toEqual({
        remaining: 0,
        endCondition: "ntraj_reached",
      });
    });

    it("goes negative past the target without a new end condition", () => {
      expect(criterion.evaluate(4, [])).toEqual({ remaining: -1 });
    });

    it.each([0, -1, 2.5])("rejects ntraj %s", (ntraj) => {
      expect(() => createStoppingCriterion({ kind: "fixed", ntraj }, 1)).toThrow(
        `ntraj must be a positive integer, got ${String(ntraj)}`,
      );
    });
  });

  describe("tolerance", () => {
    const policy = { kind: "tolerance", ntraj: 1000, targetTol: 0.1 } as const;

    it("starts with ntraj as the estimate", () => {
      const criterion = createStoppingCriterion(policy, 1);

      expect(criterion.initialEndCondition).toBe("timeout");
      expect(criterion.initialEstimate).toBe(1000);
    });

    it("cannot estimate from a single trajectory", () => {
      const criterion = createStoppingCriterion(policy, 1);

      expect(criterion.evaluate(1, [singlePoint([5])])).toEqual({
        remaining: Infinity,
        estimatedNtraj: 1000,
      });
    });

    it("estimates ceil(var / target^2 + 1) trajectories", () => {
      // variance 2/3 over target 0.1^2 gives 66.7, so 68 in total
      const criterion = createStoppingCriterion(policy, 1);

      expect(criterion.evaluate(3, [singlePoint([1, 3, 2])])).toEqual({
        remaining: 65,
        estimatedNtraj: 68,
      });
    });

    it("reports the target reached once the estimate is met", () => {
      const criterion = createStoppingCriterion(policy, 1);

      expect(criterion.evaluate(3, [singlePoint([2, 2, 2])])).toEqual({
        remaining: -2,
        estimatedNtraj: 1,
        endCondition: "target_tolerance_reached",
      });
    });

    it("caps the estimate at ntraj", () => {
      const criterion = createStoppingCriterion(
        { kind: "tolerance", ntraj: 10, targetTol: 0 },
        1,
      );

      expect(criterion.evaluate(3, [singlePoint([1, 3, 2])])).toEqual({
        remaining: 7,
        estimatedNtraj: 10,
      });
    });

    it("rejects a tolerance without observables", () => {
      expect(() => createStoppingCriterion(policy, 0)).toThrow(
        ConfigurationError,
      );
    });
  });
});
