import { SchedulerConfigSchema, type SchedulerConfig } from "../schemas/scheduler";
import { SchedulerError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Apply defaults and validate queue options, typed or not.
 *
 * Fails with `CONFIG_INVALID`, carrying the zod issues as details.
 */
export function buildSchedulerConfig(
  input: unknown = {},
): Result<SchedulerConfig, SchedulerError> {
  const parsed = SchedulerConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      SchedulerError.configInvalid("Invalid scheduler configuration", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      }),
    );
  }
  return Ok(parsed.data);
}
