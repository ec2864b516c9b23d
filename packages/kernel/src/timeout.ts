import { AbortError } from "agentry-shared";

export interface TimeoutOptions {
  /** No timer when undefined */
  timeoutMs?: number;
  /** Parent signal; its abort rejects the call at once */
  signal?: AbortSignal;
  /** Error to reject with when the timer fires (default: AbortError.timeout) */
  onTimeout?: (timeoutMs: number) => Error;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when the parent
 * signal aborts. The returned promise settles on the first of the three, even
 * if `fn` ignores its signal.
 *
 * @example
 * ```typescript
 * const completion = await withTimeout(
 *   (signal) => model.complete(messages, { ...options, signal }),
 *   { timeoutMs: 60_000, onTimeout: (ms) => TransientModelError.timeout(ms) },
 * );
 * ```
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {},
): Promise<T> {
  const parent = options.signal;
  if (parent?.aborted) {
    return Promise.reject(AbortError.fromSignal(parent));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const onParentAbort = (): void => {
      if (!parent) return;
      const error = AbortError.fromSignal(parent);
      controller.abort(error);
      settle(() => reject(error));
    };

    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };

    const settle = (action: () => void): void => {
      if (settled) return;
      settled = true;
      cleanup();
      action();
    };

    parent?.addEventListener("abort", onParentAbort, { once: true });

    const { timeoutMs } = options;
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        const error = options.onTimeout?.(timeoutMs) ?? AbortError.timeout(timeoutMs);
        controller.abort(error);
        settle(() => reject(error));
      }, timeoutMs);
    }

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}

/**
 * Resolve after `ms`, or reject with an AbortError when the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(AbortError.fromSignal(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(AbortError.fromSignal(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
