/**
 * Quantum state algebra re-exports.
 */

export {
  add,
  complex,
  conj,
  mul,
  scale,
  ZERO,
} from "./complex.js";

export {
  addOperators,
  divideOperator,
  isSquare,
  ket,
  operator,
  projector,
  scaleOperator,
  stateDimension,
  sumOperators,
  toDensity,
  trace,
  zeroOperator,
} from "./state.js";
