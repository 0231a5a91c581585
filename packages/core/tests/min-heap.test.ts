import { describe, expect, it } from "vitest";
import { MinHeap } from "@tickwork/core";

describe("MinHeap", () => {
  it("pops values in ascending order", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 9, 3, 7, 2, 8]) heap.push(n);

    const out: number[] = [];
    let n = heap.pop();
    while (n !== undefined) {
      out.push(n);
      n = heap.pop();
    }
    expect(out).toEqual([1, 2, 3, 5, 7, 8, 9]);
    expect(heap.isEmpty).toBe(true);
  });

  it("peeks without removing", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    heap.push(4);
    heap.push(2);
    expect(heap.peek()).toBe(2);
    expect(heap.size).toBe(2);
  });

  it("returns undefined when empty", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();
  });

  it("keeps working across interleaved pushes and pops", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    heap.push(10);
    heap.push(4);
    expect(heap.pop()).toBe(4);
    heap.push(1);
    heap.push(12);
    expect(heap.pop()).toBe(1);
    expect(heap.pop()).toBe(10);
    expect(heap.pop()).toBe(12);
  });

  it("snapshots a sorted copy and clears", () => {
    const heap = new MinHeap<{ key: number }>((a, b) => a.key - b.key);
    for (const key of [3, 1, 2]) heap.push({ key });

    expect(heap.toSortedArray().map((item) => item.key)).toEqual([1, 2, 3]);
    expect(heap.size).toBe(3);

    heap.clear();
    expect(heap.size).toBe(0);
  });

  it("orders a larger set with duplicates after every pop", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    const values = [9, 4, 4, 12, 0, 7, 4, 15, 3, 3, 11, 1, 8, 0, 6];
    for (const n of values) heap.push(n);

    const out: number[] = [];
    let n = heap.pop();
    while (n !== undefined) {
      out.push(n);
      n = heap.pop();
    }
    expect(out).toEqual([0, 0, 1, 3, 3, 4, 4, 4, 6, 7, 8, 9, 11, 12, 15]);
  });
});
