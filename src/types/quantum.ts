/**
 * Quantum state type definitions.
 *
 * States are the opaque snapshots carried by trajectories. The ensemble only
 * needs them to form a vector space (addition and scalar division) once they
 * are converted to their density-matrix form.
 */

/**
 * Complex scalar.
 */
export interface Complex {
  re: number;
  im: number;
}

/**
 * Pure state vector.
 */
export interface KetState {
  type: "ket";
  amplitudes: Complex[];
}

/**
 * Operator state (density matrix or any square operator), row-major.
 */
export interface OperState {
  type: "oper";
  matrix: Complex[][];
}

/**
 * Any state a trajectory may carry.
 */
export type QuantumState = KetState | OperState;

/**
 * State representation kind.
 */
export type StateType = QuantumState["type"];
