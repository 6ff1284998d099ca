import { errorMessage } from "./errors.js";

export type RetryOptions = {
  /** Total attempts, including the first. */
  attempts: number;
  backoffMs: number;
  isRetryable: (e: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
};

export type RetryOutcome<T> = { value: T; attempts: number };

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

/** Error thrown when every attempt failed; `last` is the final error. */
export class RetriesExhaustedError extends Error {
  constructor(
    readonly last: unknown,
    readonly attempts: number,
  ) {
    super(`Gave up after ${attempts} attempts: ${errorMessage(last)}`, { cause: last });
    this.name = "RetriesExhaustedError";
  }
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown (rethrown as is),
 * or `attempts` retryable failures happened (RetriesExhaustedError).
 * Backoff is exponential (base × 2^n) with 10% jitter.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<RetryOutcome<T>> {
  const attempts = Math.max(1, opts.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (e) {
      if (opts.signal?.aborted || !opts.isRetryable(e)) throw e;
      if (attempt >= attempts) throw new RetriesExhaustedError(e, attempt);

      const base = opts.backoffMs * Math.pow(2, attempt - 1);
      const delay = base + Math.random() * base * 0.1;
      opts.onRetry?.(attempt, e, delay);
      await sleep(delay, opts.signal);
    }
  }
}
