import { describe, it, expect } from 'vitest';
import { KeyedLock } from '@/lib/keyedLock';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('KeyedLock', () => {
  it('runs work for the same key in call order', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run('worker-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('worker-1', async () => {
      events.push('second');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.run('worker-1', async () => {
      await gate.promise;
      events.push('worker-1');
    });
    await lock.run('worker-2', async () => {
      events.push('worker-2');
    });

    expect(events).toEqual(['worker-2']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['worker-2', 'worker-1']);
  });

  it('releases the key after a failure', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('worker-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('worker-1', async () => 'ok')).resolves.toBe('ok');
    expect(lock.isLocked('worker-1')).toBe(false);
  });

  it('reports a key as locked while work is pending', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const pending = lock.run('worker-1', () => gate.promise);

    expect(lock.isLocked('worker-1')).toBe(true);
    gate.resolve();
    await pending;
    expect(lock.isLocked('worker-1')).toBe(false);
  });
});
