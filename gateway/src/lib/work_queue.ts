/**
 * Unbounded multi-consumer channel. `next()` resolves with the oldest item, or
 * with null once the queue is closed and empty.
 */
export type WorkQueue<T> = {
  push(item: T): void;
  next(): Promise<T | null>;
  close(): void;
  readonly closed: boolean;
  readonly length: number;
};

export function createWorkQueue<T>(): WorkQueue<T> {
  const items: T[] = [];
  const waiters: Array<(item: T | null) => void> = [];
  let closed = false;

  return {
    push(item) {
      if (closed) throw new Error("work_queue_closed");
      const waiter = waiters.shift();
      if (waiter) waiter(item);
      else items.push(item);
    },
    next() {
      if (items.length) return Promise.resolve(items.shift() ?? null);
      if (closed) return Promise.resolve(null);
      return new Promise<T | null>((resolve) => waiters.push(resolve));
    },
    close() {
      closed = true;
      while (waiters.length) {
        const waiter = waiters.shift();
        if (waiter) waiter(null);
      }
    },
    get closed() {
      return closed;
    },
    get length() {
      return items.length;
    }
  };
}
