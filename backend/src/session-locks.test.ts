import { describe, expect, it } from 'vitest';
import { SessionLocks } from './session-locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SessionLocks', () => {
  it('runs turns for one session in arrival order', async () => {
    const locks = new SessionLocks();
    const gate = deferred();
    const order: string[] = [];

    const first = locks.run('s1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = locks.run('s1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('lets different sessions run side by side', async () => {
    const locks = new SessionLocks();
    const gate = deferred();
    const order: string[] = [];

    const blocked = locks.run('s1', async () => {
      await gate.promise;
      order.push('s1');
    });
    await locks.run('s2', async () => {
      order.push('s2');
    });

    expect(order).toEqual(['s2']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['s2', 's1']);
  });

  it('keeps going after a failed turn', async () => {
    const locks = new SessionLocks();
    const failed = locks.run('s1', async () => {
      throw new Error('boom');
    });
    const next = locks.run('s1', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    await expect(locks.run('s1', async () => 'again')).resolves.toBe('again');
  });
});
