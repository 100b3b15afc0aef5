/**
 * Concurrency Limiting
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Run at most `concurrency` tasks at once; the rest wait in FIFO order.
 * A non-finite or non-positive limit means no limit.
 */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    return (task) => task();
  }

  const max = Math.floor(concurrency);
  const waiting: Array<() => void> = [];
  let active = 0;

  const release = () => {
    active--;
    const next = waiting.shift();
    if (next) {
      active++;
      next();
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active < max) {
      active++;
    } else {
      await new Promise<void>((resolve) => waiting.push(resolve));
    }

    try {
      return await task();
    } finally {
      release();
    }
  };
}
