import { z } from "zod";
import type { Logger } from "../types/logger";

export const TickSchema = z
  .number()
  .int({ error: "Tick must be an integer" })
  .min(0, { error: "Tick must be non-negative" })
  .max(Number.MAX_SAFE_INTEGER, { error: "Tick must be a safe integer" });

export const DelaySchema = z
  .number()
  .int({ error: "Delay must be an integer" })
  .min(0, { error: "Delay must be non-negative" })
  .max(Number.MAX_SAFE_INTEGER, { error: "Delay must be a safe integer" });

export const RepeatCountSchema = z
  .number()
  .int({ error: "Repeat count must be an integer" })
  .min(0, { error: "Repeat count must be non-negative" })
  .max(Number.MAX_SAFE_INTEGER, { error: "Repeat count must be a safe integer" });

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    ["debug", "info", "warn", "error"].every(
      (level) => typeof Reflect.get(value, level) === "function",
    ),
  { error: "Logger must provide debug, info, warn and error functions" },
);

export const SchedulerConfigSchema = z.object({
  // Check caller contracts: duplicate pushes, tick and delay ranges, re-entrant steps.
  assertions: z.boolean().default(true),
  // Log every processed step and discarded entry at debug level.
  debug: z.boolean().default(false),
  logger: LoggerSchema.optional(),
});

export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;
export type SchedulerConfig = z.output<typeof SchedulerConfigSchema>;
