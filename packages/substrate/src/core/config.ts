/**
 * Substrate Configuration
 *
 * Tunables shared by the sampling algorithms, validated once and then
 * carried on the generation context.
 */

import { Result, SubstrateError } from "@evoforge/contracts";
import { z } from "zod";

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/**
 * Caller-facing configuration.
 * Optional fields have defaults applied during validation.
 */
export interface SubstrateConfig {
  /** Candidate placements tried around an active Poisson point */
  readonly poissonAttempts?: number;
  /** Floor on the distance divided out by `SNPoint.subtractNormalised` */
  readonly minSubtractDistance?: number;
  /** Emit debug logging from the sampling algorithms */
  readonly trace?: boolean;
}

/**
 * Validated configuration (all optionals resolved)
 */
export interface ValidatedSubstrateConfig {
  readonly poissonAttempts: number;
  readonly minSubtractDistance: number;
  readonly trace: boolean;
}

export const DEFAULT_SUBSTRATE_CONFIG: ValidatedSubstrateConfig = {
  poissonAttempts: 30,
  minSubtractDistance: 0.1,
  trace: false,
};

// =============================================================================
// VALIDATION
// =============================================================================

export const SubstrateConfigSchema = z.object({
  poissonAttempts: z
    .number()
    .int({ error: "poissonAttempts must be an integer" })
    .min(1, { error: "poissonAttempts must be at least 1" })
    .max(1000, { error: "poissonAttempts must not exceed 1000" })
    .default(DEFAULT_SUBSTRATE_CONFIG.poissonAttempts),
  minSubtractDistance: z
    .number()
    .gt(0, { error: "minSubtractDistance must be positive" })
    .max(2, { error: "minSubtractDistance must not exceed the unit-square diagonal span" })
    .default(DEFAULT_SUBSTRATE_CONFIG.minSubtractDistance),
  trace: z.boolean().default(DEFAULT_SUBSTRATE_CONFIG.trace),
});

/**
 * Validate and fill defaults for substrate configuration.
 */
export function validateSubstrateConfig(
  config: SubstrateConfig = {},
): Result<ValidatedSubstrateConfig, SubstrateError> {
  const parsed = SubstrateConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return Result.err(
      SubstrateError.configInvalid(
        issues.map((issue) => issue.message).join("; "),
        { issues },
      ),
    );
  }
  return Result.ok(parsed.data);
}
