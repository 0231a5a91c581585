/**
 * Error codes for scheduler contract violations.
 * Using discriminated union for type-safe error handling.
 */
export type SchedulerErrorCode =
  | "CONFIG_INVALID"
  | "ENTITY_ALREADY_SCHEDULED"
  | "INVALID_TICK"
  | "INVALID_DELAY"
  | "REENTRANT_STEP"
  | "INVALID_COLOR";

/**
 * Unified error type for misuse of the update queue and its value types.
 *
 * These are assertion failures: they point at a caller bug, never at bad
 * luck at run time.
 *
 * @example
 * ```typescript
 * const error = new SchedulerError(
 *   "INVALID_DELAY",
 *   "Update returned a negative delay",
 *   { tick: 12, delay: -1 }
 * );
 * ```
 */
export class SchedulerError extends Error {
  readonly name = "SchedulerError";

  constructor(
    public readonly code: SchedulerErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchedulerError);
    }
  }

  static create(
    code: SchedulerErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): SchedulerError {
    return new SchedulerError(code, message, details);
  }

  static configInvalid(message: string, details?: Record<string, unknown>): SchedulerError {
    return new SchedulerError("CONFIG_INVALID", message, details);
  }

  static alreadyScheduled(details?: Record<string, unknown>): SchedulerError {
    return new SchedulerError(
      "ENTITY_ALREADY_SCHEDULED",
      "Entity is already scheduled in this queue",
      details,
    );
  }

  static invalidTick(tick: number): SchedulerError {
    return new SchedulerError(
      "INVALID_TICK",
      `Tick must be a non-negative safe integer, got ${tick}`,
      { tick },
    );
  }

  static invalidDelay(now: number, delay: number): SchedulerError {
    return new SchedulerError(
      "INVALID_DELAY",
      `Update at tick ${now} returned an invalid delay ${delay}`,
      { tick: now, delay },
    );
  }

  /**
   * Check if an unknown error is a SchedulerError.
   */
  static isSchedulerError(error: unknown): error is SchedulerError {
    return error instanceof SchedulerError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: SchedulerErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
