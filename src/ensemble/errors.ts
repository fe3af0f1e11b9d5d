/**
 * Error classes for ensemble aggregation.
 *
 * All of them signal usage errors. None is retried or absorbed inside the
 * aggregation core.
 */

export type EnsembleErrorCode = "shape_mismatch" | "configuration" | "incompatible";

/**
 * Base class for ensemble errors.
 */
export class EnsembleError extends Error {
  readonly code: EnsembleErrorCode;

  constructor(message: string, code: EnsembleErrorCode) {
    super(message);
    this.name = "EnsembleError";
    this.code = code;
  }
}

/**
 * A trajectory does not match the shape established by the first one.
 * The rejected trajectory leaves the ensemble unchanged.
 */
export class ShapeMismatchError extends EnsembleError {
  constructor(message: string) {
    super(message, "shape_mismatch");
    this.name = "ShapeMismatchError";
  }
}

/**
 * Invalid options at ensemble creation.
 */
export class ConfigurationError extends EnsembleError {
  constructor(message: string) {
    super(message, "configuration");
    this.name = "ConfigurationError";
  }
}

/**
 * Two ensembles cannot be merged. Neither input is modified.
 */
export class IncompatibleAggregationsError extends EnsembleError {
  constructor(message: string) {
    super(message, "incompatible");
    this.name = "IncompatibleAggregationsError";
  }
}

/**
 * Type guard for ensemble errors.
 */
export function isEnsembleError(err: unknown): err is EnsembleError {
  return err instanceof EnsembleError;
}
