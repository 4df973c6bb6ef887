/**
 * Fixed-capacity ring buffer. Pushing into a full window evicts the oldest entry.
 */
export class OutcomeWindow<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`window capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.length;
  }

  /** Returns the evicted entry, if any. */
  push(value: T): T | undefined {
    if (this.length < this.capacity) {
      this.slots[(this.start + this.length) % this.capacity] = value;
      this.length += 1;
      return undefined;
    }
    const evicted = this.slots[this.start];
    this.slots[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /** Oldest first. */
  toArray(): T[] {
    const values: T[] = [];
    for (let i = 0; i < this.length; i += 1) {
      const value = this.slots[(this.start + i) % this.capacity];
      if (value !== undefined) values.push(value);
    }
    return values;
  }
}
