/**
 * Serializes async sections per key. Unrelated keys never wait on each other;
 * the map only holds keys with a section running or queued.
 */
export function createKeyedLock() {
  const tails = new Map<string, Promise<void>>();

  async function run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    tails.set(key, tail);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (tails.get(key) === tail) tails.delete(key);
    }
  }

  return {
    run,
    isLocked: (key: string) => tails.has(key),
    size: () => tails.size
  };
}

export type KeyedLock = ReturnType<typeof createKeyedLock>;
