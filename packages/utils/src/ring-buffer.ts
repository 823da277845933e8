/**
 * Fixed-capacity FIFO buffer. Pushing into a full buffer overwrites the oldest
 * entry; push is O(1).
 */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append a value. Returns the evicted value when the buffer was full.
   */
  push(value: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = value;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Newest entry, if any.
   */
  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  /**
   * Copy of the contents, oldest first.
   */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const v = this.slots[(this.head + i) % this.capacity];
      if (v !== undefined) out.push(v);
    }
    return out;
  }

  /**
   * Up to `n` newest entries, oldest first.
   */
  latest(n: number): T[] {
    const take = Math.max(0, Math.min(n, this.count));
    const out: T[] = [];
    for (let i = this.count - take; i < this.count; i++) {
      const v = this.slots[(this.head + i) % this.capacity];
      if (v !== undefined) out.push(v);
    }
    return out;
  }
}
