import { describe, it, expect } from 'vitest';
import { withKeyedLock, isKeyLocked, getKeyedLockStats } from '../locks/keyed-lock';

function deferred() {
  let resolve!: () => void;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('withKeyedLock', () => {
  it('runs work under the same key one at a time, in arrival order', async () => {
    const order: string[] = [];
    const gate = deferred();

    const first = withKeyedLock('ticket:1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = withKeyedLock('ticket:1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    expect(getKeyedLockStats()).toEqual({ keys: 1, waiting: 1 });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(isKeyLocked('ticket:1')).toBe(false);
  });

  it('does not make different keys wait on each other', async () => {
    const gate = deferred();
    const order: string[] = [];

    const slow = withKeyedLock('ticket:a', async () => {
      await gate.promise;
      order.push('a');
    });
    await withKeyedLock('ticket:b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await slow;
    expect(order).toEqual(['b', 'a']);
  });

  it('releases the key when the work throws', async () => {
    await expect(
      withKeyedLock('ticket:x', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(isKeyLocked('ticket:x')).toBe(false);
    await expect(withKeyedLock('ticket:x', async () => 'ok')).resolves.toBe('ok');
  });
});
