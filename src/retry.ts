import { isTransient } from './errors.js';
import { sleep } from './utils.js';

export type RetryPolicy = {
  maxAttempts: number;
  backoff: (attempt: number) => number; // delay in ms after failed attempt N (1-based)
  isRetryable: (err: unknown) => boolean;
};

export type RetryHooks = {
  signal?: AbortSignal; // once aborted, no further attempt starts
  onAttempt?: (attempt: number) => void;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export function exponentialBackoff(baseMs: number, maxMs = 30000): (attempt: number) => number {
  return (attempt) => Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
}

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? 3,
    backoff: overrides.backoff ?? exponentialBackoff(1000),
    isRetryable: overrides.isRetryable ?? isTransient
  };
}

/**
 * Runs `op` until it resolves, a non-retryable error is thrown,
 * `maxAttempts` attempts have been made, or `hooks.signal` aborts.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  for (let attempt = 1; ; attempt++) {
    hooks.onAttempt?.(attempt);
    try {
      return await op(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !policy.isRetryable(err) || hooks.signal?.aborted) throw err;
      const delayMs = Math.max(0, policy.backoff(attempt));
      hooks.onRetry?.(err, attempt, delayMs);
      if (delayMs) await sleep(delayMs);
      if (hooks.signal?.aborted) throw err;
    }
  }
}
