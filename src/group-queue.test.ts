import { describe, expect, it } from 'vitest';
import { KeyedQueue } from './group-queue.js';

function deferred() {
  let resolve!: () => void;
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

describe('KeyedQueue', () => {
  it('runs jobs for the same key one at a time, in order', async () => {
    const q = new KeyedQueue();
    const order: string[] = [];
    const gate = deferred();

    const a = q.run('k', async () => {
      order.push('a:start');
      await gate.promise;
      order.push('a:end');
    });
    const b = q.run('k', async () => {
      order.push('b:start');
    });

    await Promise.resolve();
    expect(order).toEqual(['a:start']);

    gate.resolve();
    await Promise.all([a, b]);
    expect(order).toEqual(['a:start', 'a:end', 'b:start']);
  });

  it('runs jobs for different keys concurrently', async () => {
    const q = new KeyedQueue();
    const gate = deferred();
    const started: string[] = [];

    const a = q.run('a', async () => {
      started.push('a');
      await gate.promise;
    });
    const b = q.run('b', async () => {
      started.push('b');
    });

    await b;
    expect(started).toEqual(['a', 'b']);
    gate.resolve();
    await a;
  });

  it('keeps going after a failed job', async () => {
    const q = new KeyedQueue();
    const failed = q.run('k', async () => {
      throw new Error('boom');
    });
    const after = q.run('k', async () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(after).resolves.toBe(42);
  });

  it('forgets keys once their work drains', async () => {
    const q = new KeyedQueue();
    await q.run('k', async () => 1);
    await new Promise((r) => setTimeout(r, 0));
    expect(q.size()).toBe(0);
  });
});
