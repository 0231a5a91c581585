import type { Message } from "@tickwork/contracts";

/** A message an update wants shown or logged. */
export interface LogEffect {
  readonly kind: "log";
  readonly message: Message;
}

/**
 * Outcome of an update that matters outside the queue. Hosts that need more
 * variants widen the union and parameterize the queue with it:
 *
 * @example
 * ```typescript
 * type GameEffect = Effect | { kind: "damage"; target: number; amount: number };
 * const queue = new UpdateQueue<GameEffect>();
 * ```
 */
export type Effect = LogEffect;

export function logEffect(message: Message): LogEffect {
  return { kind: "log", message };
}

export function isLogEffect(effect: { readonly kind: string }): effect is LogEffect {
  return effect.kind === "log";
}

/** Append-only output handed to every update. A plain array satisfies it. */
export interface EffectSink<E> {
  push(effect: E): unknown;
}

/**
 * Ordered effect buffer owned by the driving loop. Updates append, the loop
 * drains between steps.
 */
export class EffectBuffer<E = Effect> implements EffectSink<E> {
  private effects: E[] = [];

  push(effect: E): void {
    this.effects.push(effect);
  }

  get size(): number {
    return this.effects.length;
  }

  /** Read-only view, valid until the next drain. */
  values(): readonly E[] {
    return this.effects;
  }

  /** Take every effect in append order and empty the buffer. */
  drain(): E[] {
    const out = this.effects;
    this.effects = [];
    return out;
  }

  drainInto(fn: (effect: E) => void): void {
    for (const effect of this.drain()) fn(effect);
  }
}
