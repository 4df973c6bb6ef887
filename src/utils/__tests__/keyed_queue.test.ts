import { describe, expect, it } from 'vitest';
import { KeyedSerialQueue } from '../keyed_queue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedSerialQueue', () => {
  it('runs tasks for the same key in submission order without overlap', async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run('alpha', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = queue.run('alpha', () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const blocked = queue.run('alpha', () => gate.promise.then(() => 'alpha'));

    await expect(queue.run('beta', () => 'beta')).resolves.toBe('beta');

    gate.resolve();
    await expect(blocked).resolves.toBe('alpha');
  });

  it('keeps the chain alive after a failing task', async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.run('alpha', () => {
      throw new Error('boom');
    });
    const next = queue.run('alpha', () => 'recovered');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  it('forgets keys once their work settles', async () => {
    const queue = new KeyedSerialQueue();
    await queue.run('alpha', () => undefined);
    await queue.drain();
    await Promise.resolve();

    expect(queue.activeKeys).toBe(0);
  });
});
