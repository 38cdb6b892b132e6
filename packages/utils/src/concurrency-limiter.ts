/**
 * Concurrency limiter
 *
 * Caps how many async calls run at once. Calls beyond the limit wait in FIFO
 * order and start as soon as a running call settles (resolved or rejected).
 */

export interface ConcurrencyLimiter {
  <T>(fn: () => Promise<T>): Promise<T>;
  readonly activeCount: () => number;
  readonly pendingCount: () => number;
}

export function createConcurrencyLimiter(maxConcurrent: number): ConcurrencyLimiter {
  const limit = Math.max(1, Math.floor(maxConcurrent));
  const queue: Array<() => void> = [];
  let active = 0;

  const next = (): void => {
    active--;
    const start = queue.shift();
    if (start) start();
  };

  const run = <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = (): void => {
        active++;
        // a synchronous throw inside fn still releases the slot
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(next);
      };

      if (active < limit) {
        start();
      } else {
        queue.push(start);
      }
    });

  return Object.assign(run, {
    activeCount: () => active,
    pendingCount: () => queue.length,
  });
}
