/**
 * Configuration schemas.
 *
 * A config file is YAML with snake_case keys. Every section is optional and
 * falls back to the defaults below.
 */

import { z } from "zod";

/**
 * Report output format.
 */
export const OutputFormatSchema = z.enum(["json", "yaml", "cli"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const ToleranceValueSchema = z.number().finite().nonnegative();

/**
 * `[atol, rtol]` pair.
 */
export const TolerancePairSchema = z.tuple([
  ToleranceValueSchema,
  ToleranceValueSchema,
]);

/**
 * A single absolute tolerance, one pair for every observable, or one pair
 * per observable.
 */
export const ToleranceSpecSchema = z.union([
  ToleranceValueSchema,
  TolerancePairSchema,
  z.array(TolerancePairSchema).min(1),
]);

/**
 * Stopping policy. Without `ntraj` the ensemble never stops on its own;
 * with `ntraj` alone it stops after that many trajectories; with
 * `target_tol` it stops once the error estimate is within tolerance,
 * capped at `ntraj`.
 */
export const StoppingConfigSchema = z
  .object({
    ntraj: z.number().int().positive().optional(),
    target_tol: ToleranceSpecSchema.optional(),
  })
  .refine((value) => value.target_tol === undefined || value.ntraj !== undefined, {
    message: "target_tol requires ntraj",
    path: ["target_tol"],
  });

export const TrackingConfigSchema = z.object({
  /** Collapse channel count; overrides the trajectory file's own value */
  num_collapse: z.number().int().nonnegative().optional(),
  trace: z.boolean().default(false),
});

export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.default("cli"),
  /** Write the report to results/<run-id>/ensemble.json */
  save: z.boolean().default(false),
  /** Average the steady state over this many final times (0: all) */
  steady_state_window: z.number().int().nonnegative().optional(),
  /** Include per-run expectation values when runs are kept */
  include_runs: z.boolean().default(false),
});

/**
 * Complete configuration.
 */
export const EnsembleConfigSchema = z.object({
  /** Observable keys; overrides the keys declared in trajectory files */
  observables: z.array(z.string().min(1)).optional(),
  store_states: z.boolean().optional(),
  store_final_state: z.boolean().default(false),
  keep_runs: z.boolean().default(false),
  solver: z.string().optional(),
  stopping: StoppingConfigSchema.default({}),
  tracking: TrackingConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  verbose: z.boolean().default(false),
});

export type StoppingConfig = z.infer<typeof StoppingConfigSchema>;
export type TrackingConfig = z.infer<typeof TrackingConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type EnsembleConfig = z.infer<typeof EnsembleConfigSchema>;
