import { describe, expect, it } from "vitest";
import {
  EffectBuffer,
  isLogEffect,
  logEffect,
  normalMessage,
  plainText,
  type Effect,
} from "@tickwork/core";

const hello = normalMessage([plainText("hello")]);
const bye = normalMessage([plainText("bye")]);

describe("EffectBuffer", () => {
  it("drains in append order and empties", () => {
    const buffer = new EffectBuffer();
    buffer.push(logEffect(hello));
    buffer.push(logEffect(bye));

    expect(buffer.size).toBe(2);
    expect(buffer.drain()).toEqual([
      { kind: "log", message: hello },
      { kind: "log", message: bye },
    ]);
    expect(buffer.size).toBe(0);
    expect(buffer.drain()).toEqual([]);
  });

  it("exposes a read-only view until the next drain", () => {
    const buffer = new EffectBuffer();
    buffer.push(logEffect(hello));
    const view = buffer.values();

    expect(view).toHaveLength(1);
    buffer.drain();
    expect(buffer.values()).toHaveLength(0);
  });

  it("hands each effect to a callback", () => {
    const buffer = new EffectBuffer();
    buffer.push(logEffect(hello));
    buffer.push(logEffect(bye));

    const seen: Effect[] = [];
    buffer.drainInto((effect) => seen.push(effect));
    expect(seen.map((effect) => effect.message)).toEqual([hello, bye]);
    expect(buffer.size).toBe(0);
  });
});

describe("log effects", () => {
  it("wraps a message", () => {
    expect(logEffect(hello)).toEqual({ kind: "log", message: hello });
  });

  it("tells log effects apart from host variants", () => {
    expect(isLogEffect(logEffect(hello))).toBe(true);
    expect(isLogEffect({ kind: "damage" })).toBe(false);
  });
});
