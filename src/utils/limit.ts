export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

// In-flight cap with a FIFO wait queue
export function createLimiter(max: number): Limiter {
  const cap = Math.max(1, Math.floor(max));
  let inFlight = 0;
  const queue: Array<() => void> = [];
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    // a released slot passes straight to the next waiter
    if (inFlight >= cap) await new Promise<void>(res => queue.push(res));
    else inFlight++;
    try { return await fn(); } finally { const next = queue.shift(); if (next) next(); else inFlight--; }
  };
}

/** Maps with at most `max` calls pending; output keeps input order. */
export function mapLimit<T, R>(items: readonly T[], max: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const limit = createLimiter(max);
  return Promise.all(items.map((item, i) => limit(() => fn(item, i))));
}
