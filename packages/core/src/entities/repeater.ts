import type { Delay } from "@tickwork/contracts";
import type { Effect, EffectSink } from "../update/effect";
import { BaseUpdatable } from "../update/updatable";
import { checkInterval, checkRepeatCount } from "./options";

export type RepeaterAction<E> = (effects: EffectSink<E>, run: number) => void;

/**
 * Runs `action` every `interval` ticks, `times` times in total, then leaves
 * the queue. `run` counts from 1. With `times` 0 the first turn only leaves.
 */
export class Repeater<E = Effect> extends BaseUpdatable<E> {
  private runs = 0;
  private readonly interval: Delay;
  private readonly times: number;

  /**
   * @throws {SchedulerError} `INVALID_DELAY` for a bad `interval`, `CONFIG_INVALID` for a bad `times`
   */
  constructor(
    interval: Delay,
    times: number,
    private readonly action: RepeaterAction<E>,
  ) {
    super();
    this.interval = checkInterval(interval);
    this.times = checkRepeatCount(times);
  }

  get completedRuns(): number {
    return this.runs;
  }

  update(effects: EffectSink<E>): Delay | undefined {
    if (this.runs >= this.times) return undefined;

    this.runs += 1;
    this.action(effects, this.runs);
    return this.runs < this.times ? this.interval : undefined;
  }
}
