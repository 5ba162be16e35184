// runtime/src/retry.ts
// Bounded retries with capped exponential backoff. Used around store opens,
// where a second process may briefly hold the database file.

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** base · 2^(attempt-1), capped, then scaled by a jitter factor in [0.8, 1.2). */
export function backoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(baseDelay * 2 ** (attempt - 1), maxDelay);
  return capped * (0.8 + 0.4 * random());
}

export type RetryOptions = {
  retries?: number;       // total attempts, first one included (default 3)
  baseDelayMs?: number;   // default 200
  maxDelayMs?: number;    // default 3000
  retryIf?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

/** Calls fn until it resolves; the final failure is rethrown as is. */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { baseDelayMs = 200, maxDelayMs = 3000, retryIf, onRetry } = opts;
  const attempts = Math.max(1, opts.retries ?? 3);

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (err) {
      const exhausted = attempt >= attempts;
      if (exhausted || (retryIf !== undefined && !retryIf(err))) throw err;
      const wait = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(err, attempt, wait);
      await sleep(wait);
    }
  }
}
