import { DeadlockError } from "./errors";

export const delay = (ms: number) =>
  new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Like {@link delay}, but resolves early once `signal` aborts. Never rejects.
 */
export const sleep = (ms: number, signal: AbortSignal) =>
  new Promise<void>(resolve => {
    if (signal.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export class TimeoutError extends Error {
  override name = "TimeoutError";
}

export const withTimeout = async <T>(
  promise: Promise<T>,
  ms: number,
  message = `Timed out after ${ms}ms`,
) => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(message)), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
};

/** Rethrows outside any promise chain so the process goes down. */
export const fatal = (error: unknown) => {
  console.error("Fatal", { error });
  process.nextTick(() => {
    throw error;
  });
};

export type Ticker = {
  done: Promise<void>;
};

/**
 * Runs `step` every `period` ms until `signal` aborts. A step that throws is
 * logged and the loop carries on, except for {@link DeadlockError}.
 */
export const createTicker = (
  name: string,
  step: () => Promise<void> | void,
  period: number,
  signal: AbortSignal,
) => {
  const run = async () => {
    while (!signal.aborted) {
      try {
        await step();
      } catch (error) {
        if (error instanceof DeadlockError) {
          fatal(error);
          return;
        }
        console.error("Task failed", { name, error });
      }
      await sleep(period, signal);
    }
  };

  return {
    done: run(),
  } satisfies Ticker;
};

export type Random = () => number;

/** mulberry32 */
export const createRandom = (seed: number): Random => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const uniform = (random: Random, min: number, max: number) =>
  min + (max - min) * random();

export const randomInt = (random: Random, min: number, max: number) =>
  Math.floor(uniform(random, min, max + 1));

export const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max);

export const wrapDegrees = (value: number) => ((value % 360) + 360) % 360;
