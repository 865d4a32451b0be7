import { isRetryableError, toError } from "../errors.js";

export type RetryPolicy = {
  readonly maxAttempts: number;
  /**
   * Return `null` to stop retrying and surface the original error.
   * `attempt` is 1-based and indicates the attempt that just failed.
   */
  readonly getDelayMs: (attempt: number, error: unknown) => number | null;
};

export type ExponentialBackoffOptions = {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly isRetryable?: (error: unknown) => boolean;
};

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 4_000;
export const DEFAULT_MAX_DELAY_MS = 60_000;

export function createExponentialBackoffPolicy(options: ExponentialBackoffOptions = {}): RetryPolicy {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
  const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
  const isRetryable = options.isRetryable ?? isRetryableError;
  return {
    maxAttempts,
    getDelayMs: (attempt, error) => {
      if (!isRetryable(error)) {
        return null;
      }
      return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
    },
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type RetryResult<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: Error; readonly attempts: number };

export type RetryRunOptions = {
  /** Aborting cancels any pending backoff wait; the abort reason becomes the result error. */
  readonly signal?: AbortSignal;
  readonly onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export async function runWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryRunOptions = {},
): Promise<RetryResult<T>> {
  const wait = options.wait ?? sleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (error: unknown) {
      const err = toError(error);
      if (attempt >= policy.maxAttempts || options.signal?.aborted) {
        return { ok: false, error: err, attempts: attempt };
      }
      const delay = policy.getDelayMs(attempt, error);
      if (delay === null) {
        return { ok: false, error: err, attempts: attempt };
      }
      const delayMs = Number.isFinite(delay) ? Math.max(0, delay) : 0;
      options.onRetry?.({ attempt, delayMs, error: err });
      if (delayMs > 0) {
        try {
          await wait(delayMs, options.signal);
        } catch (abortError: unknown) {
          return { ok: false, error: toError(abortError), attempts: attempt };
        }
      }
    }
  }
}
