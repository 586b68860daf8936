/// <reference path="./awaiting.d.ts" />
import { delay } from "awaiting";

export { delay };

export type UntilOptions = {
  // first wait between checks, in ms
  start?: number;
  // wait never grows beyond this
  max?: number;
  decay?: number;
  // give up after this many ms (0 = never)
  timeout?: number;
  // told about each error thrown by f
  log?: (...args: unknown[]) => void;
};

/*
Call f until it returns true, waiting between calls with exponential
backoff.  Errors thrown by f count as false.  Throws once timeout elapses.
*/
export async function until(
  f: () => Promise<boolean> | boolean,
  { start = 500, max = 15_000, decay = 1.3, timeout = 0, log }: UntilOptions = {},
): Promise<void> {
  const end = timeout > 0 ? Date.now() + timeout : Infinity;
  let wait = start;
  for (;;) {
    try {
      if (await f()) return;
    } catch (err) {
      log?.("until: attempt failed", err);
    }
    const remaining = end - Date.now();
    if (remaining <= 0) {
      throw new Error(`timeout after ${timeout}ms`);
    }
    await delay(Math.min(wait, remaining));
    wait = Math.min(max, wait * decay);
  }
}

const MAX_RETRY_DELAY = 30_000;

export type RetryOptions = {
  attempts?: number;
  // wait before the second attempt; doubles after each failure, up to 30s
  delay?: number;
  onError?: (err: unknown, attempt: number) => void;
  // false stops at this error without using the remaining attempts
  shouldRetry?: (err: unknown) => boolean;
};

// Run f up to `attempts` times; rethrows the last error.
export async function retry<T>(
  f: (attempt: number) => Promise<T>,
  { attempts = 3, delay: wait = 1000, onError, shouldRetry }: RetryOptions = {},
): Promise<T> {
  const total = Math.max(1, Math.floor(attempts));
  let lastError: unknown;
  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      return await f(attempt);
    } catch (err) {
      lastError = err;
      onError?.(err, attempt);
      if (shouldRetry && !shouldRetry(err)) break;
      if (attempt < total && wait > 0) {
        await delay(wait);
        wait = Math.min(MAX_RETRY_DELAY, wait * 2);
      }
    }
  }
  throw lastError;
}
