import { describe, expect, it } from "vitest";

import {
  addOperators,
  complex,
  divideOperator,
  isSquare,
  ket,
  operator,
  projector,
  stateDimension,
  sumOperators,
  toDensity,
  trace,
  zeroOperator,
} from "../../../src/quantum/index.js";

describe("ket and operator", () => {
  it("promotes real entries to complex", () => {
    expect(ket([1, complex(0, 2)])).toEqual({
      type: "ket",
      amplitudes: [
        { re: 1, im: 0 },
        { re: 0, im: 2 },
      ],
    });
    expect(operator([[1]])).toEqual({
      type: "oper",
      matrix: [[{ re: 1, im: 0 }]],
    });
  });

  it("reports the Hilbert space dimension", () => {
    expect(stateDimension(ket([1, 0, 0]))).toBe(3);
    expect(stateDimension(zeroOperator(2))).toBe(2);
  });

  it("detects non-square operators", () => {
    expect(isSquare(operator([[1, 0], [0, 1]]))).toBe(true);
    expect(isSquare(operator([[1, 0], [0]]))).toBe(false);
  });
});

describe("projector", () => {
  it("builds |psi><psi| with the conjugate on the right", () => {
    const rho = projector(ket([1, complex(0, 1)]));

    expect(rho.matrix).toEqual([
      [
        { re: 1, im: 0 },
        { re: 0, im: -1 },
      ],
      [
        { re: 0, im: 1 },
        { re: 1, im: 0 },
      ],
    ]);
  });
});

describe("toDensity", () => {
  it("turns kets into projectors", () => {
    expect(toDensity(ket([0, 1]))).toEqual(operator([[0, 0], [0, 1]]));
  });

  it("returns operators unchanged", () => {
    const rho = operator([[0.5, 0], [0, 0.5]]);
    expect(toDensity(rho)).toBe(rho);
  });
});

describe("operator arithmetic", () => {
  it("adds, sums and divides elementwise", () => {
    const a = operator([[1, 0], [0, 0]]);
    const b = operator([[0, 0], [0, 1]]);

    expect(addOperators(a, b)).toEqual(operator([[1, 0], [0, 1]]));
    expect(divideOperator(sumOperators([a, b, a]), 2)).toEqual(
      operator([[1, 0], [0, 0.5]]),
    );
  });

  it("refuses to sum an empty list", () => {
    expect(() => sumOperators([])).toThrow("Cannot sum an empty list of operators");
  });

  it("computes the trace", () => {
    expect(trace(operator([[0.25, 3], [3, 0.75]]))).toEqual({ re: 1, im: 0 });
  });
});
