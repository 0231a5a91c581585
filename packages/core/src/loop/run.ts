import { SchedulerError, type Tick } from "@tickwork/contracts";
import { EffectBuffer, type Effect } from "../update/effect";
import type { UpdateQueue } from "../update/update-queue";

export interface RunOptions<E> {
  /** Called for every effect, in append order, after the step that produced it. */
  onEffect?: (effect: E, tick: Tick) => void;
  /** Stop before processing anything scheduled after this tick. */
  untilTick?: Tick;
  /** Stop after this many processed entities: a non-negative integer or Infinity (the default). */
  maxSteps?: number;
}

export interface RunSummary {
  steps: number;
  lastTick: Tick | undefined;
  /** True when the queue ran out of active entities. */
  exhausted: boolean;
}

/**
 * Step `queue` until it runs dry or a limit is reached, draining effects
 * between steps.
 *
 * @throws {SchedulerError} `CONFIG_INVALID` for a negative, fractional or NaN `maxSteps`
 */
export function runUntilIdle<E = Effect>(
  queue: UpdateQueue<E>,
  options: RunOptions<E> = {},
): RunSummary {
  const { onEffect, untilTick, maxSteps = Number.POSITIVE_INFINITY } = options;
  if (!(maxSteps === Number.POSITIVE_INFINITY || (Number.isInteger(maxSteps) && maxSteps >= 0))) {
    throw SchedulerError.configInvalid(
      `maxSteps must be a non-negative integer or Infinity, got ${maxSteps}`,
      { maxSteps },
    );
  }
  const effects = new EffectBuffer<E>();
  let steps = 0;
  let lastTick: Tick | undefined;

  while (steps < maxSteps) {
    const next = queue.nextActiveTick();
    if (next !== undefined && untilTick !== undefined && next > untilTick) {
      return { steps, lastTick, exhausted: false };
    }

    const tick = queue.step(effects);
    if (tick === undefined) {
      return { steps, lastTick, exhausted: true };
    }

    steps += 1;
    lastTick = tick;
    if (onEffect) {
      effects.drainInto((effect) => onEffect(effect, tick));
    } else {
      effects.drain();
    }
  }

  return { steps, lastTick, exhausted: false };
}
