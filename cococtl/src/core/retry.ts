import type { RetryPolicy } from "../types/config.js";

/** One attempt, no backoff. */
export const NO_RETRY: RetryPolicy = { attempts: 1, backoff_ms: 0 };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Run `fn` up to `policy.attempts` times while `isRetryable` accepts the error.
 * The last error is rethrown unchanged; an aborted `signal` ends retrying.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (e: unknown) => boolean,
  wait: Sleep = sleep,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= policy.attempts || !isRetryable(e) || signal?.aborted) throw e;
      await wait(policy.backoff_ms * attempt, signal);
    }
  }
}
