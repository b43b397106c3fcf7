// ── Keyed mutual exclusion ──────────────────────────────────────────
// One FIFO queue per key. Work under the same key runs strictly one at a
// time in arrival order; work under different keys never waits on each
// other. Keys with nobody holding or waiting are dropped from the map.

interface KeyState {
  held: boolean;
  waiters: Array<() => void>;
}

const keys = new Map<string, KeyState>();

function acquire(key: string): Promise<void> {
  const state = keys.get(key);
  if (!state) {
    keys.set(key, { held: true, waiters: [] });
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    state.waiters.push(resolve);
  });
}

function release(key: string): void {
  const state = keys.get(key);
  if (!state) return;
  const next = state.waiters.shift();
  if (next) {
    // Ownership passes straight to the next waiter; `held` stays true.
    next();
  } else {
    keys.delete(key);
  }
}

/**
 * Execute `fn` while holding the in-process lock for `lockKey`.
 * The lock is released in a `finally` block whether `fn` resolves or throws.
 */
export async function withKeyedLock<T>(lockKey: string, fn: () => Promise<T>): Promise<T> {
  await acquire(lockKey);
  try {
    return await fn();
  } finally {
    release(lockKey);
  }
}

export function isKeyLocked(lockKey: string): boolean {
  return keys.get(lockKey)?.held ?? false;
}

export function getKeyedLockStats(): { keys: number; waiting: number } {
  let waiting = 0;
  for (const state of keys.values()) waiting += state.waiters.length;
  return { keys: keys.size, waiting };
}
