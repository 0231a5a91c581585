/**
 * Binary min-heap over a caller-defined ordering.
 *
 * O(log n) push/pop. Elements the comparator reports as equal come out in
 * no particular order; callers that need stability put a sequence number
 * in the key.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(value: T): void {
    this.items.push(value);
    this.siftUp(this.items.length - 1, value);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.items.length > 0) {
      this.siftDown(0, last);
    }
    return top;
  }

  clear(): void {
    this.items.length = 0;
  }

  /** Snapshot of every element in ascending order. The heap is untouched. */
  toSortedArray(): T[] {
    return [...this.items].sort(this.compare);
  }

  private siftUp(start: number, value: T): void {
    let index = start;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = this.items[parent];
      if (parentValue === undefined || this.compare(parentValue, value) <= 0) break;

      this.items[index] = parentValue;
      index = parent;
    }

    this.items[index] = value;
  }

  private siftDown(start: number, value: T): void {
    const count = this.items.length;
    let index = start;

    while (true) {
      const left = index * 2 + 1;
      if (left >= count) break;

      const leftValue = this.items[left];
      if (leftValue === undefined) break;

      let child = left;
      let childValue = leftValue;
      const rightValue = this.items[left + 1];
      if (rightValue !== undefined && this.compare(rightValue, childValue) < 0) {
        child = left + 1;
        childValue = rightValue;
      }
      if (this.compare(value, childValue) <= 0) break;

      this.items[index] = childValue;
      index = child;
    }

    this.items[index] = value;
  }
}
