/**
 * State algebra for ensemble accumulation.
 *
 * Averaging pure state vectors is not physically meaningful, so every state
 * entering an accumulator goes through {@link toDensity} first. The
 * accumulators then only need operator addition and scalar division.
 */

import { add, conj, complex, mul, scale, ZERO } from "./complex.js";

import type {
  Complex,
  KetState,
  OperState,
  QuantumState,
} from "../types/index.js";

/**
 * Build a ket from real numbers or complex amplitudes.
 */
export function ket(amplitudes: readonly (number | Complex)[]): KetState {
  return {
    type: "ket",
    amplitudes: amplitudes.map((a) =>
      typeof a === "number" ? complex(a) : { ...a },
    ),
  };
}

/**
 * Build an operator from a row-major matrix of real or complex entries.
 */
export function operator(rows: readonly (readonly (number | Complex)[])[]): OperState {
  return {
    type: "oper",
    matrix: rows.map((row) =>
      row.map((a) => (typeof a === "number" ? complex(a) : { ...a })),
    ),
  };
}

/**
 * Dimension of the Hilbert space the state lives in.
 */
export function stateDimension(state: QuantumState): number {
  return state.type === "ket" ? state.amplitudes.length : state.matrix.length;
}

/**
 * Whether an operator state is square (every row as long as the matrix).
 */
export function isSquare(state: OperState): boolean {
  const n = state.matrix.length;
  return state.matrix.every((row) => row.length === n);
}

/**
 * Projector `|psi><psi|` of a ket.
 */
export function projector(state: KetState): OperState {
  const psi = state.amplitudes;
  return {
    type: "oper",
    matrix: psi.map((a) => psi.map((b) => mul(a, conj(b)))),
  };
}

/**
 * Density-matrix-equivalent form of a state.
 *
 * Kets become their projector; operators are returned unchanged.
 */
export function toDensity(state: QuantumState): OperState {
  return state.type === "ket" ? projector(state) : state;
}

/**
 * Zero operator of dimension `dim`.
 */
export function zeroOperator(dim: number): OperState {
  return {
    type: "oper",
    matrix: Array.from({ length: dim }, () =>
      Array.from({ length: dim }, () => ({ ...ZERO })),
    ),
  };
}

/**
 * Elementwise operator sum. Both operands must have the same dimension.
 */
export function addOperators(a: OperState, b: OperState): OperState {
  return {
    type: "oper",
    matrix: a.matrix.map((row, i) =>
      row.map((value, j) => add(value, b.matrix[i]?.[j] ?? ZERO)),
    ),
  };
}

/**
 * Multiply every entry by a real factor.
 */
export function scaleOperator(a: OperState, factor: number): OperState {
  return {
    type: "oper",
    matrix: a.matrix.map((row) => row.map((value) => scale(value, factor))),
  };
}

/**
 * Divide every entry by a real divisor.
 */
export function divideOperator(a: OperState, divisor: number): OperState {
  return scaleOperator(a, 1 / divisor);
}

/**
 * Sum of a non-empty list of operators of equal dimension.
 */
export function sumOperators(operators: readonly OperState[]): OperState {
  const [first, ...rest] = operators;
  if (!first) {
    throw new Error("Cannot sum an empty list of operators");
  }
  return rest.reduce(addOperators, first);
}

/**
 * Trace of an operator.
 */
export function trace(a: OperState): Complex {
  return a.matrix.reduce<Complex>(
    (acc, row, i) => add(acc, row[i] ?? ZERO),
    { ...ZERO },
  );
}
