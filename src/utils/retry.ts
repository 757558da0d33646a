import { getConfig } from "../config.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to rethrow immediately instead of retrying. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Aborting stops further attempts and interrupts the backoff wait. */
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const settings = getConfig().retry;
  const maxAttempts = Math.max(1, opts?.maxAttempts ?? settings.maxAttempts);
  const baseDelayMs = opts?.baseDelayMs ?? settings.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? settings.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts?.signal?.aborted) break;
      if (opts?.shouldRetry && !opts.shouldRetry(err, attempt)) break;
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      opts?.onRetry?.(err, attempt, delay);
      await sleep(delay, opts?.signal);
    }
  }
  throw lastError;
}
