import {
  buildSchedulerConfig,
  SchedulerError,
  type Delay,
  type Logger,
  type SchedulerConfig,
  type SchedulerConfigInput,
  type Tick,
} from "@tickwork/contracts";
import { MinHeap } from "../data-structures/min-heap";
import { createConsoleLogger } from "../logging/logger";
import type { Effect, EffectSink } from "./effect";
import type { Updatable } from "./updatable";

interface QueueEntry<E> {
  tick: Tick;
  // Insertion order; breaks ties between equal ticks (FIFO).
  seq: number;
  entity: Updatable<E>;
}

function compareEntries<E>(a: QueueEntry<E>, b: QueueEntry<E>): number {
  return a.tick - b.tick || a.seq - b.seq;
}

function isValidTick(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Orders every scheduled entity by the tick of its next update and runs
 * them one at a time.
 *
 * Entities sharing a tick run in the order they were pushed (or
 * rescheduled). There is no remove operation: call `deactivate()` on the
 * entity and the queue drops its entry when that entry reaches the front.
 *
 * @example
 * ```typescript
 * const queue = new UpdateQueue();
 * const effects = new EffectBuffer();
 *
 * queue.push(0, player);
 * queue.push(5, goblin);
 *
 * while (queue.step(effects) !== undefined) {
 *   effects.drainInto(render);
 * }
 * ```
 */
export class UpdateQueue<E = Effect> {
  private readonly heap = new MinHeap<QueueEntry<E>>(compareEntries);
  private readonly scheduled = new Set<Updatable<E>>();
  private readonly config: SchedulerConfig;
  private readonly logger: Logger;
  private nextSeq = 0;
  private lastTick: Tick | undefined;
  private stepping = false;

  /**
   * @throws {SchedulerError} `CONFIG_INVALID` if the options do not validate
   */
  constructor(options: SchedulerConfigInput = {}) {
    this.config = buildSchedulerConfig(options).getOrThrow();
    this.logger = this.config.logger ?? createConsoleLogger("UpdateQueue");
  }

  /** Physical entry count, including inactive entries not yet discarded. */
  get size(): number {
    return this.heap.size;
  }

  get isEmpty(): boolean {
    return this.heap.isEmpty;
  }

  /** Tick returned by the most recent step that processed an entity. */
  get now(): Tick | undefined {
    return this.lastTick;
  }

  /**
   * Schedule `entity` for its first update at `tick`.
   *
   * The entity must not already be in this queue. While it is, nothing else
   * should mutate it behind the queue's back.
   *
   * @throws {SchedulerError} `ENTITY_ALREADY_SCHEDULED` or `INVALID_TICK` (assertions only)
   */
  push(tick: Tick, entity: Updatable<E>): void {
    if (this.config.assertions) {
      if (!isValidTick(tick)) throw SchedulerError.invalidTick(tick);
      if (this.scheduled.has(entity)) {
        throw SchedulerError.alreadyScheduled({ tick });
      }
    }
    this.insert(tick, entity);
  }

  /**
   * Process the next active entity.
   *
   * Pops entries in tick order, discarding inactive ones, until an active
   * entity turns up; updates it with `effects` and reschedules it if it
   * asked for another turn.
   *
   * @returns the tick the entity was processed at, or `undefined` once no
   * active entity is left
   * @throws {SchedulerError} `REENTRANT_STEP` or `INVALID_DELAY` (assertions only)
   */
  step(effects: EffectSink<E>): Tick | undefined {
    if (this.stepping && this.config.assertions) {
      throw SchedulerError.create(
        "REENTRANT_STEP",
        "step() called from inside an update",
      );
    }

    this.discardInactive();
    const entry = this.heap.pop();
    if (entry === undefined) return undefined;

    const { tick: now, entity } = entry;
    this.lastTick = now;
    this.stepping = true;
    let next: Tick | undefined;

    try {
      const delay = entity.update(effects);
      if (delay !== undefined) {
        next = this.nextTick(now, delay);
        this.insert(next, entity);
      }
    } finally {
      this.stepping = false;
      if (next === undefined) this.scheduled.delete(entity);
    }

    if (this.config.debug) {
      this.logger.debug(
        next === undefined
          ? `Tick ${now}: updated, left the queue`
          : `Tick ${now}: updated, next update at ${next}`,
      );
    }
    return now;
  }

  /** Tick of the front entry, which may belong to an inactive entity. */
  peekTick(): Tick | undefined {
    return this.heap.peek()?.tick;
  }

  /**
   * Tick the next `step` would process at. Inactive entries at the front
   * are discarded on the way, exactly as `step` would.
   */
  nextActiveTick(): Tick | undefined {
    this.discardInactive();
    return this.heap.peek()?.tick;
  }

  /** Whether the entity currently holds an entry, active or not. */
  isScheduled(entity: Updatable<E>): boolean {
    return this.scheduled.has(entity);
  }

  /** Ticks of all entries in the order they would be popped. */
  pendingTicks(): Tick[] {
    return this.heap.toSortedArray().map((entry) => entry.tick);
  }

  /** Drop every entry without updating anything. */
  clear(): void {
    this.heap.clear();
    this.scheduled.clear();
  }

  toString(): string {
    return `UpdateQueue(size=${this.size}, next=${this.peekTick() ?? "none"})`;
  }

  private discardInactive(): void {
    let front = this.heap.peek();
    while (front !== undefined && !front.entity.isActive()) {
      this.heap.pop();
      this.scheduled.delete(front.entity);
      if (this.config.debug) {
        this.logger.debug(`Discarded inactive entry at tick ${front.tick}`);
      }
      front = this.heap.peek();
    }
  }

  private insert(tick: Tick, entity: Updatable<E>): void {
    this.heap.push({ tick, seq: this.nextSeq++, entity });
    this.scheduled.add(entity);
  }

  private nextTick(now: Tick, delay: Delay): Tick {
    const next = now + delay;
    if (this.config.assertions && !(isValidTick(delay) && isValidTick(next))) {
      throw SchedulerError.invalidDelay(now, delay);
    }
    return next;
  }
}
