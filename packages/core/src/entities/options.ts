import {
  DelaySchema,
  RepeatCountSchema,
  SchedulerError,
  type Delay,
} from "@tickwork/contracts";

/**
 * @throws {SchedulerError} `INVALID_DELAY` unless `interval` is a non-negative safe integer
 */
export function checkInterval(interval: Delay): Delay {
  const parsed = DelaySchema.safeParse(interval);
  if (!parsed.success) {
    throw SchedulerError.create(
      "INVALID_DELAY",
      `Interval must be a non-negative safe integer, got ${interval}`,
      { interval },
    );
  }
  return parsed.data;
}

/**
 * @throws {SchedulerError} `CONFIG_INVALID` unless `times` is a non-negative safe integer
 */
export function checkRepeatCount(times: number): number {
  const parsed = RepeatCountSchema.safeParse(times);
  if (!parsed.success) {
    throw SchedulerError.configInvalid(
      `Repeat count must be a non-negative safe integer, got ${times}`,
      { times },
    );
  }
  return parsed.data;
}
