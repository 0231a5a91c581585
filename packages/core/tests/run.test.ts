import { describe, expect, it } from "vitest";
import {
  Messenger,
  Repeater,
  UpdateQueue,
  formatMessage,
  normalMessage,
  plainText,
  runUntilIdle,
} from "@tickwork/core";

function say(text: string, times = 1, interval = 1): Messenger {
  return new Messenger(normalMessage([plainText(text)]), { times, interval });
}

describe("runUntilIdle", () => {
  it("runs to exhaustion and reports effects with their ticks", () => {
    const queue = new UpdateQueue();
    queue.push(0, say("a", 2, 5));
    queue.push(1, say("b"));

    const seen: string[] = [];
    const summary = runUntilIdle(queue, {
      onEffect: (effect, tick) => seen.push(`${tick}:${formatMessage(effect.message)}`),
    });

    expect(seen).toEqual(["0:a ", "1:b ", "5:a "]);
    expect(summary).toEqual({ steps: 3, lastTick: 5, exhausted: true });
  });

  it("stops before the horizon without processing later entries", () => {
    const queue = new UpdateQueue();
    const late = say("late");
    queue.push(2, say("early"));
    queue.push(10, late);

    const summary = runUntilIdle(queue, { untilTick: 9 });
    expect(summary).toEqual({ steps: 1, lastTick: 2, exhausted: false });
    expect(late.pending).toBe(1);
    expect(queue.peekTick()).toBe(10);
  });

  it("processes entries scheduled exactly at the horizon", () => {
    const queue = new UpdateQueue();
    queue.push(9, say("edge"));
    expect(runUntilIdle(queue, { untilTick: 9 }).steps).toBe(1);
  });

  it("looks past inactive entries when checking the horizon", () => {
    const queue = new UpdateQueue();
    const cancelled = say("cancelled");
    const late = say("late");
    queue.push(1, cancelled);
    queue.push(20, late);
    cancelled.deactivate();

    const summary = runUntilIdle(queue, { untilTick: 5 });
    expect(summary).toEqual({ steps: 0, lastTick: undefined, exhausted: false });
    expect(late.pending).toBe(1);
    expect(queue.size).toBe(1);
  });

  it("honors maxSteps", () => {
    const queue = new UpdateQueue();
    const forever = new Repeater(1, 1000, () => {});
    queue.push(0, forever);

    const summary = runUntilIdle(queue, { maxSteps: 4 });
    expect(summary).toEqual({ steps: 4, lastTick: 3, exhausted: false });
    expect(forever.completedRuns).toBe(4);
  });

  it("runs nothing with maxSteps 0", () => {
    const queue = new UpdateQueue();
    queue.push(0, say("held"));
    expect(runUntilIdle(queue, { maxSteps: 0 })).toEqual({
      steps: 0,
      lastTick: undefined,
      exhausted: false,
    });
    expect(queue.size).toBe(1);
  });

  it.each([-1, 2.5, Number.NaN])("rejects maxSteps %s", (maxSteps) => {
    const queue = new UpdateQueue();
    queue.push(0, say("held"));
    expect(() => runUntilIdle(queue, { maxSteps })).toThrow(
      `maxSteps must be a non-negative integer or Infinity, got ${maxSteps}`,
    );
    expect(queue.size).toBe(1);
  });

  it("reports an empty queue as exhausted", () => {
    expect(runUntilIdle(new UpdateQueue())).toEqual({
      steps: 0,
      lastTick: undefined,
      exhausted: true,
    });
  });
});
