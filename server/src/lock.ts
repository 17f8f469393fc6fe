import { DeadlockError } from "./errors";

export type Lock = {
  run: <T>(critical: () => T | Promise<T>) => Promise<T>;
};

/**
 * Promise-chained mutex. Waiting longer than `timeout` for the lock rejects
 * with a {@link DeadlockError}; the waiter never runs.
 */
export const createLock = (name: string, timeout: number) => {
  let tail: Promise<void> = Promise.resolve();

  const run = async <T>(critical: () => T | Promise<T>) => {
    const previous = tail;
    let release = () => {};
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    tail = previous.then(() => released);

    let timer: NodeJS.Timeout | undefined;
    const acquired = await Promise.race([
      previous.then(() => true),
      new Promise<false>(resolve => {
        timer = setTimeout(() => resolve(false), timeout);
      }),
    ]);
    clearTimeout(timer);

    if (!acquired) {
      release();
      throw new DeadlockError(`Lock ${name} not acquired within ${timeout}ms`);
    }

    try {
      return await critical();
    } finally {
      release();
    }
  };

  return { run } satisfies Lock;
};
