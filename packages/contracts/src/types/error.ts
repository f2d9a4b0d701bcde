/**
 * Error codes for substrate operations.
 * Using discriminated union for type-safe error handling.
 */
export type SubstrateErrorCode =
  | "INVARIANT_VIOLATION"
  | "CONFIG_INVALID"
  | "DECODE_FAILED";

type ErrorDetails = Record<string, unknown>;

/**
 * Recoverable error surfaced to callers through `Result`.
 *
 * @example
 * ```typescript
 * const error = SubstrateError.decodeFailed(
 *   "Point component out of range",
 *   { input: "(1.5, 0)" },
 * );
 * ```
 */
export class SubstrateError extends Error {
  override readonly name: string = "SubstrateError";

  constructor(
    public readonly code: SubstrateErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static configInvalid(message: string, details?: ErrorDetails): SubstrateError {
    return new SubstrateError("CONFIG_INVALID", message, details);
  }

  static decodeFailed(message: string, details?: ErrorDetails): SubstrateError {
    return new SubstrateError("DECODE_FAILED", message, details);
  }

  static isSubstrateError(error: unknown): error is SubstrateError {
    return error instanceof SubstrateError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: SubstrateErrorCode;
    message: string;
    details?: ErrorDetails;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Thrown when a trusted constructor receives a value outside its invariant.
 * This is a caller bug, never a recoverable condition.
 */
export class InvariantViolationError extends SubstrateError {
  override readonly name: string = "InvariantViolationError";

  constructor(message: string, details?: ErrorDetails) {
    super("INVARIANT_VIOLATION", message, details);
  }
}

/**
 * Assert a condition, throwing `InvariantViolationError` when it fails.
 */
export function invariant(
  condition: boolean,
  message: string,
  details?: ErrorDetails,
): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, details);
  }
}
