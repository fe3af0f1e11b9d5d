import { describe, expect, it, vi } from "vitest";

import { Ensemble } from "../../../src/ensemble/ensemble.js";
import {
  ConfigurationError,
  IncompatibleAggregationsError,
} from "../../../src/ensemble/errors.js";
import {
  mergeEnsembles,
  reduceEnsembles,
} from "../../../src/ensemble/merge.js";
import { ket, operator } from "../../../src/quantum/index.js";

import type {
  EnsembleOptions,
  TrajectorySample,
} from "../../../src/types/index.js";

vi.mock("../../../src/utils/logging.js", () => ({
  logger: {
    debug: vi.fn(),
  },
}));

function createTrajectory(
  seed: number,
  values: number[],
  overrides: Partial<TrajectorySample> = {},
): TrajectorySample {
  return { seed, times: [0, 1], expect: [values], ...overrides };
}

function partition(
  rows: [number, number[]][],
  options: EnsembleOptions = {},
): Ensemble {
  const ensemble = Ensemble.create({ observables: ["x"], ...options });
  for (const [seed, values] of rows) {
    ensemble.add(createTrajectory(seed, values));
  }
  return ensemble;
}

describe("Ensemble.merge", () => {
  it("matches a single ensemble over the union", () => {
    const a = partition([
      [1, [1, 2]],
      [2, [3, 2]],
    ]);
    const b = partition([[3, [2, 2]]]);

    const merged = a.merge(b);

    expect(merged.numTrajectories).toBe(3);
    expect(merged.seeds).toEqual([1, 2, 3]);
    expect(merged.times).toEqual([0, 1]);
    expect(merged.averageExpect).toEqual([[2, 2]]);
    expect(merged.stdExpect[0]?.[0]).toBeCloseTo(0.8165, 4);
    expect(merged.stats).toEqual({
      end_condition: "merged",
      num_trajectories: 3,
    });
  });

  it("leaves both inputs untouched", () => {
    const a = partition([[1, [1, 2]]]);
    const b = partition([[2, [3, 2]]]);

    const merged = a.merge(b);
    merged.add(createTrajectory(3, [5, 5]));

    expect(a.seeds).toEqual([1]);
    expect(a.averageExpect).toEqual([[1, 2]]);
    expect(b.seeds).toEqual([2]);
    expect(b.averageExpect).toEqual([[3, 2]]);
  });

  it("has no stopping policy of its own", () => {
    const a = partition([[1, [1, 2]]], { stopping: { kind: "fixed", ntraj: 2 } });
    const b = partition([[2, [3, 2]]], { stopping: { kind: "fixed", ntraj: 2 } });

    const merged = a.merge(b);

    expect(merged.add(createTrajectory(3, [2, 2]))).toBe(Infinity);
    expect(merged.endCondition).toBe("merged");
  });

  it("treats an uninitialized ensemble as the identity", () => {
    const a = partition([
      [1, [1, 2]],
      [2, [3, 2]],
    ]);
    const empty = Ensemble.create({ observables: ["x"] });

    for (const merged of [empty.merge(a), a.merge(empty)]) {
      expect(merged.numTrajectories).toBe(2);
      expect(merged.seeds).toEqual([1, 2]);
      expect(merged.averageExpect).toEqual([[2, 2]]);
    }
  });

  it("stays uninitialized when both sides are empty", () => {
    const merged = Ensemble.create({ observables: ["x"] }).merge(
      Ensemble.create({ observables: ["x"] }),
    );

    expect(merged.numTrajectories).toBe(0);
    expect(merged.times).toEqual([]);
    expect(merged.endCondition).toBe("merged");
  });

  it("concatenates runs only when both sides keep them", () => {
    const rows: [number, number[]][] = [[1, [1, 2]]];
    const keeping = partition(rows, { keepRunsResults: true });
    const other = partition([[2, [3, 2]]], { keepRunsResults: true });
    const plain = partition([[3, [2, 2]]]);

    expect(keeping.merge(other).runsExpect).toEqual([
      [
        [1, 2],
        [3, 2],
      ],
    ]);
    expect(keeping.merge(plain).runsExpect).toBeUndefined();
    expect(keeping.merge(plain).trajectories).toEqual([]);
  });

  it("keeps state sums only when both sides track them", () => {
    const withStates = partition([], { storeStates: true });
    withStates.add(
      createTrajectory(1, [1, 2], {
        states: [ket([1, 0]), ket([0, 1])],
        final_state: ket([0, 1]),
      }),
    );
    const withStates2 = partition([], { storeStates: true });
    withStates2.add(
      createTrajectory(2, [3, 2], {
        states: [ket([0, 1]), ket([0, 1])],
        final_state: ket([0, 1]),
      }),
    );
    const plain = partition([[3, [2, 2]]]);

    expect(withStates.merge(withStates2).averageStates).toEqual([
      operator([[0.5, 0], [0, 0.5]]),
      operator([[0, 0], [0, 1]]),
    ]);
    expect(withStates.merge(plain).averageStates).toBeUndefined();
    expect(withStates.merge(plain).averageFinalState).toBeUndefined();
  });

  it("concatenates collapse records", () => {
    const options: EnsembleOptions = { tracking: { numCollapse: 1 } };
    const a = partition([], options);
    a.add(createTrajectory(1, [1, 2], { collapse_events: [{ time: 0.5, channel: 0 }] }));
    const b = partition([], options);
    b.add(createTrajectory(2, [3, 2], { collapse_events: [] }));

    expect(a.merge(b).colTimes).toEqual([[0.5], []]);
  });

  describe("incompatible ensembles", () => {
    it("rejects different observables", () => {
      const a = partition([[1, [1, 2]]]);
      const b = Ensemble.create({ observables: ["y"] });

      expect(() => a.merge(b)).toThrow(IncompatibleAggregationsError);
      expect(() => a.merge(b)).toThrow(
        "Shared observables are required to merge ensembles",
      );
    });

    it("rejects different times", () => {
      const a = partition([[1, [1, 2]]]);
      const b = Ensemble.create({ observables: ["x"] });
      b.add(createTrajectory(2, [1, 2], { times: [0, 2] }));

      expect(() => a.merge(b)).toThrow(
        "Shared times are required to merge ensembles",
      );
    });

    it("rejects different collapse channel counts", () => {
      const a = Ensemble.create({ observables: ["x"], tracking: { numCollapse: 1 } });
      const b = Ensemble.create({ observables: ["x"], tracking: { numCollapse: 2 } });

      expect(() => a.merge(b)).toThrow(
        "Shared collapse channels are required to merge ensembles",
      );
    });

    it("rejects mixed trace tracking", () => {
      const a = Ensemble.create({ observables: ["x"], tracking: { trace: true } });
      const b = Ensemble.create({ observables: ["x"] });

      expect(() => a.merge(b)).toThrow(
        "Both or neither ensemble must track the reweighting trace",
      );
    });

    it("rejects different state dimensions", () => {
      const a = Ensemble.create({ storeStates: true });
      a.add({ seed: 1, times: [0], expect: [], states: [ket([1, 0])], final_state: ket([1, 0]) });
      const b = Ensemble.create({ storeStates: true });
      b.add({
        seed: 2,
        times: [0],
        expect: [],
        states: [ket([1, 0, 0])],
        final_state: ket([1, 0, 0]),
      });

      expect(() => a.merge(b)).toThrow(
        "Shared state dimensions are required to merge ensembles",
      );
    });
  });
});

describe("mergeEnsembles", () => {
  it("is equivalent to a.merge(b)", () => {
    const a = partition([[1, [1, 2]]]);
    const b = partition([[2, [3, 2]]]);

    expect(mergeEnsembles(a, b).averageExpect).toEqual(a.merge(b).averageExpect);
  });
});

describe("reduceEnsembles", () => {
  it("merges a list pairwise, keeping seed order", () => {
    const parts = [1, 2, 3, 4, 5].map((seed) => partition([[seed, [seed, 0]]]));

    const merged = reduceEnsembles(parts);

    expect(merged.seeds).toEqual([1, 2, 3, 4, 5]);
    expect(merged.averageExpect).toEqual([[3, 0]]);
    expect(merged.endCondition).toBe("merged");
  });

  it("returns a single ensemble as is", () => {
    const only = partition([[1, [1, 2]]]);

    expect(reduceEnsembles([only])).toBe(only);
  });

  it("accepts empty workers in the list", () => {
    const merged = reduceEnsembles([
      Ensemble.create({ observables: ["x"] }),
      partition([[1, [1, 2]]]),
      Ensemble.create({ observables: ["x"] }),
    ]);

    expect(merged.seeds).toEqual([1]);
    expect(merged.averageExpect).toEqual([[1, 2]]);
  });

  it("rejects an empty list", () => {
    expect(() => reduceEnsembles([])).toThrow(ConfigurationError);
    expect(() => reduceEnsembles([])).toThrow(
      "Cannot reduce an empty list of ensembles",
    );
  });
});

describe("merging partitions", () => {
  const rows: [number, number[]][] = [
    [1, [1, 4]],
    [2, [2, 0]],
    [3, [5, 3]],
    [4, [3, 3]],
    [5, [0, 7]],
    [6, [4, 1]],
  ];

  function pick(indices: number[]): [number, number[]][] {
    return indices.flatMap((i) => {
      const row = rows[i];
      return row ? [row] : [];
    });
  }

  const whole = partition(rows);

  it.each([
    { name: "halves", split: [[0, 1, 2], [3, 4, 5]] },
    { name: "one and five", split: [[0], [1, 2, 3, 4, 5]] },
    { name: "three pairs", split: [[0, 5], [1, 4], [2, 3]] },
    { name: "interleaved", split: [[0, 2, 4], [1, 3, 5]] },
    { name: "singletons", split: [[0], [1], [2], [3], [4], [5]] },
  ])("matches the whole set when split as $name", ({ split }) => {
    const merged = reduceEnsembles(split.map((indices) => partition(pick(indices))));

    expect(merged.numTrajectories).toBe(6);
    expect(merged.averageExpect).toEqual(whole.averageExpect);
    expect(merged.stdExpect).toEqual(whole.stdExpect);
    expect([...merged.seeds].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("gives the same statistics in either order", () => {
    const a = partition(pick([0, 1, 2]));
    const b = partition(pick([3, 4, 5]));

    const ab = a.merge(b);
    const ba = b.merge(a);

    expect(ba.averageExpect).toEqual(ab.averageExpect);
    expect(ba.stdExpect).toEqual(ab.stdExpect);
    expect(ab.seeds).toEqual([1, 2, 3, 4, 5, 6]);
    expect(ba.seeds).toEqual([4, 5, 6, 1, 2, 3]);
  });

  it("does not depend on how merges are grouped", () => {
    const a = partition(pick([0, 1]));
    const b = partition(pick([2, 3]));
    const c = partition(pick([4, 5]));

    const left = a.merge(b).merge(c);
    const right = a.merge(b.merge(c));

    expect(right.averageExpect).toEqual(left.averageExpect);
    expect(right.stdExpect).toEqual(left.stdExpect);
    expect(right.seeds).toEqual(left.seeds);
    expect(left.averageExpect).toEqual(whole.averageExpect);
  });

  describe("state sums", () => {
    const kets = [ket([1, 0]), ket([0, 1]), ket([1, 0]), ket([1, 0])];

    function statePartition(indices: number[]): Ensemble {
      const ensemble = Ensemble.create({ storeStates: true });
      for (const i of indices) {
        const state = kets[i];
        if (state) {
          ensemble.add({ seed: i, times: [0], expect: [], states: [state] });
        }
      }
      return ensemble;
    }

    const wholeStates = statePartition([0, 1, 2, 3]);

    it.each([
      { name: "halves", split: [[0, 1], [2, 3]] },
      { name: "one and three", split: [[0], [1, 2, 3]] },
      { name: "reversed", split: [[2, 3], [0, 1]] },
      { name: "singletons", split: [[3], [2], [1], [0]] },
    ])("match the whole set when split as $name", ({ split }) => {
      const merged = reduceEnsembles(split.map(statePartition));

      expect(wholeStates.averageStates).toEqual([
        operator([[0.75, 0], [0, 0.25]]),
      ]);
      expect(merged.averageStates).toEqual(wholeStates.averageStates);
      expect(merged.averageFinalState).toEqual(wholeStates.averageFinalState);
    });
  });
});
