// Indexed binary min-heap: id -> slot map gives O(log n) remove/rekey by id
// on top of the usual O(log n) insert/pop and O(1) peek.

import { InvariantViolationError } from "./errors";

export type LessFn<T> = (a: T, b: T) => boolean;

export class MinIndex<K, T> {
  private heap: T[] = [];
  private slots = new Map<K, number>();

  constructor(
    private readonly keyOf: (item: T) => K,
    private readonly less: LessFn<T>
  ) {}

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  has(key: K): boolean {
    return this.slots.has(key);
  }

  get(key: K): T | undefined {
    const slot = this.slots.get(key);
    return slot == null ? undefined : this.heap[slot];
  }

  insert(item: T): void {
    const key = this.keyOf(item);
    if (this.slots.has(key)) {
      throw new InvariantViolationError("duplicate_key", `key ${String(key)} already indexed`);
    }
    this.heap.push(item);
    this.slots.set(key, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  peekMin(): T | undefined {
    return this.heap[0];
  }

  popMin(): T {
    if (this.heap.length === 0) {
      throw new InvariantViolationError("empty_queue", "popMin on empty index");
    }
    return this.removeAt(0);
  }

  remove(key: K): T | undefined {
    const slot = this.slots.get(key);
    if (slot == null) return undefined;
    return this.removeAt(slot);
  }

  // Call after the ordering fields of an indexed item changed.
  update(key: K): void {
    const slot = this.slots.get(key);
    if (slot == null) return;
    this.siftUp(slot);
    this.siftDown(slot);
  }

  // Ordered copy; O(n log n), diagnostics only.
  toSortedArray(): T[] {
    return [...this.heap].sort((a, b) => (this.less(a, b) ? -1 : this.less(b, a) ? 1 : 0));
  }

  private removeAt(slot: number): T {
    const item = this.heap[slot];
    const last = this.heap.pop();
    this.slots.delete(this.keyOf(item));
    if (last !== undefined && slot < this.heap.length) {
      this.heap[slot] = last;
      this.slots.set(this.keyOf(last), slot);
      this.siftUp(slot);
      this.siftDown(slot);
    }
    return item;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.slots.set(this.keyOf(b), i);
    this.slots.set(this.keyOf(a), j);
  }

  private siftUp(idx: number): void {
    while (idx > 0) {
      const parent = (idx - 1) >> 1;
      if (!this.less(this.heap[idx], this.heap[parent])) break;
      this.swap(idx, parent);
      idx = parent;
    }
  }

  private siftDown(idx: number): void {
    const n = this.heap.length;
    for (;;) {
      const left = 2 * idx + 1;
      const right = left + 1;
      let smallest = idx;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === idx) return;
      this.swap(idx, smallest);
      idx = smallest;
    }
  }
}
