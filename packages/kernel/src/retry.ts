import { isRetryableError } from "agentry-shared";
import { sleep } from "./timeout";

/**
 * Exponential backoff policy: attempt `n` (1-based) waits
 * `min(maxDelayMs, baseDelayMs * factor^(n-1))` before attempt `n + 1`.
 */
export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  factor: 2,
  maxDelayMs: 4000,
};

export interface RetryOptions {
  policy?: Partial<RetryPolicy>;
  /** Default: isRetryableError */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Awaited before the backoff wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
  /** Aborts the wait between attempts */
  signal?: AbortSignal;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.factor, attempt - 1));
}

function retryAfterOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "retryAfterMs" in error) {
    const value = error.retryAfterMs;
    return typeof value === "number" ? value : 0;
  }
  return 0;
}

/**
 * Call `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempts are used up. The last error is rethrown.
 *
 * @example
 * ```typescript
 * const tools = await retry(() => provider.listTools(), {
 *   policy: { maxAttempts: 5 },
 *   onRetry: (err, attempt) => log.warn({ err, attempt }, 'listTools failed'),
 * });
 * ```
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delayMs = Math.min(
        policy.maxDelayMs,
        Math.max(backoffDelay(policy, attempt), retryAfterOf(error)),
      );
      await options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
