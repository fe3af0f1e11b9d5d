/**
 * CLI options schema for Zod validation.
 *
 * Commander hands over loosely typed options; this schema checks and
 * normalizes them before they are merged into the configuration.
 */

import { z } from "zod";

import { OutputFormatSchema } from "./schema.js";

/**
 * Schema for CLI options validation.
 */
export const CLIOptionsSchema = z.object({
  ntraj: z.number().int().positive().optional(),
  // "atol" or "atol,rtol"
  targetTol: z
    .string()
    .optional()
    .transform((val) =>
      val?.trim()
        ? val
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean)
            .map(Number)
        : undefined,
    )
    .pipe(z.array(z.number().finite().nonnegative()).min(1).max(2).optional()),
  storeStates: z.boolean().optional(),
  storeFinalState: z.boolean().optional(),
  keepRuns: z.boolean().optional(),
  steadyState: z.number().int().nonnegative().optional(),
  output: OutputFormatSchema.optional(),
  save: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

/**
 * Type derived from the CLI options schema.
 */
export type CLIOptions = z.infer<typeof CLIOptionsSchema>;

/**
 * Extracts and validates CLI options from Commander.js output.
 *
 * @param options - Raw options from Commander.js
 * @returns Validated CLI options (all fields optional)
 * @throws Error if validation fails with a descriptive message
 */
export function extractCLIOptions(
  options: Record<string, unknown>,
): CLIOptions {
  const result = CLIOptionsSchema.safeParse(options);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid CLI options: ${issues}`);
  }

  return result.data;
}
