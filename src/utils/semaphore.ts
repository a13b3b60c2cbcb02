/**
 * Concurrency gate for long-running child processes.
 */

export type Semaphore = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Runs at most `max` tasks at once; the rest wait in FIFO order.
 */
export function createSemaphore(max: number): Semaphore {
  const limit = Math.max(1, Math.floor(max));
  let active = 0;
  const waiters: Array<() => void> = [];

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= limit) {
      // The releasing task hands its slot over; `active` stays as is.
      await new Promise<void>((resolve) => waiters.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      const next = waiters.shift();
      if (next) {
        next();
      } else {
        active -= 1;
      }
    }
  };
}
