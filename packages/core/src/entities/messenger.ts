import type { Delay, Message } from "@tickwork/contracts";
import { cloneMessage } from "../msg/message";
import { logEffect, type Effect, type EffectSink } from "../update/effect";
import { BaseUpdatable } from "../update/updatable";
import { checkInterval, checkRepeatCount } from "./options";

export interface MessengerOptions {
  /** Number of emissions before leaving the queue. Defaults to 1; 0 emits nothing. */
  times?: number;
  /** Ticks between emissions. Defaults to 1. */
  interval?: Delay;
}

/**
 * Emits a copy of the same log message on each of its turns, so consumers
 * may change what they drain.
 */
export class Messenger extends BaseUpdatable<Effect> {
  private remaining: number;
  private readonly interval: Delay;

  /**
   * @throws {SchedulerError} `CONFIG_INVALID` for a bad `times`, `INVALID_DELAY` for a bad `interval`
   */
  constructor(
    readonly message: Message,
    options: MessengerOptions = {},
  ) {
    super();
    this.remaining = checkRepeatCount(options.times ?? 1);
    this.interval = checkInterval(options.interval ?? 1);
  }

  /** Emissions still to come. */
  get pending(): number {
    return this.remaining;
  }

  update(effects: EffectSink<Effect>): Delay | undefined {
    if (this.remaining === 0) return undefined;

    effects.push(logEffect(cloneMessage(this.message)));
    this.remaining -= 1;
    return this.remaining > 0 ? this.interval : undefined;
  }
}
