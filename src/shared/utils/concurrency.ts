/**
 * Concurrency helpers
 */

/**
 * Create a limiter that runs at most `limit` tasks at once.
 * Waiting tasks start in submission order.
 */
export function createConcurrencyLimiter(limit: number) {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
    } else {
      active -= 1;
    }
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= limit) {
      await new Promise<void>(resolve => queue.push(resolve));
    } else {
      active += 1;
    }

    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Map over items with bounded concurrency. Results keep input order
 * regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const runLimited = createConcurrencyLimiter(limit);
  return Promise.all(items.map((item, index) => runLimited(() => fn(item, index))));
}
