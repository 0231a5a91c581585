import type { Delay } from "@tickwork/contracts";
import type { Effect, EffectSink } from "./effect";

/**
 * Anything the update queue can schedule.
 *
 * `update` is only ever called by `UpdateQueue.step`, right after
 * `isActive()` returned true for that turn. Calling it from anywhere else
 * skips that check.
 */
export interface Updatable<E = Effect> {
  /**
   * Do one unit of work, appending any outside-visible outcomes to
   * `effects`. Return the number of ticks until the next update, or
   * `undefined` to leave the queue for good.
   */
  update(effects: EffectSink<E>): Delay | undefined;

  /** Checked by the queue before every prospective update. */
  isActive(): boolean;

  /**
   * Mark the entity permanently inactive. A pending entry is not removed;
   * the queue discards it when its turn comes up.
   */
  deactivate(): void;
}

/** Keeps the active flag so concrete entities only implement `update`. */
export abstract class BaseUpdatable<E = Effect> implements Updatable<E> {
  private active = true;

  abstract update(effects: EffectSink<E>): Delay | undefined;

  isActive(): boolean {
    return this.active;
  }

  deactivate(): void {
    this.active = false;
  }
}
