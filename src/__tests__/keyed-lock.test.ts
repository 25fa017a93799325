import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../core/KeyedLock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs work for one key one at a time, in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('k', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('k', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different keys wait on each other', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    let otherRan = false;

    const blocked = lock.run('a', () => gate.promise);
    await lock.run('b', async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    gate.resolve();
    await blocked;
  });

  it('passes rejections to the caller and keeps the chain going', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('k', async () => {
      throw new Error('boom');
    });
    const next = lock.run('k', async () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('forgets keys once their work is done', async () => {
    const lock = new KeyedLock();
    await lock.run('k', async () => undefined);
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(lock.size).toBe(0);
  });
});
