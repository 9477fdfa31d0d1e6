import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../locks/keyed-mutex';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs same-key work one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run('branch:1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = mutex.run('branch:1', async () => {
      order.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(mutex.isLocked('branch:1')).toBe(true);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
    expect(mutex.isLocked('branch:1')).toBe(false);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const slow = mutex.run('branch:1', async () => {
      await gate.promise;
      return 'slow';
    });
    await expect(mutex.run('branch:2', async () => 'fast')).resolves.toBe('fast');
    gate.resolve();
    await expect(slow).resolves.toBe('slow');
  });

  it('keeps the queue moving after a failure', async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('k', async () => 'ok');
    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
