/**
 * @fileoverview Per-key serialization
 *
 * Work for the same key runs one task at a time, in submission order; different keys never
 * wait on each other. Each task is chained onto the previous task's settlement, so a failed
 * task does not stall the queue.
 *
 * @packageDocumentation
 */

export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** Resolves once everything queued so far (for every key) has settled. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.tails.values()));
  }
}
