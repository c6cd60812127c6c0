export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  // Called after a failed attempt that will be retried
  onRetry?: (error: unknown, attempt: number) => void;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Run `task` up to `attempts` times with a fixed delay between attempts.
 * Never throws: the last error is returned once the budget is spent.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;

      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt === attempts) {
        return { ok: false, error, attempts: attempt };
      }

      options.onRetry?.(error, attempt);
      await wait(options.delayMs);
    }
  }

  return { ok: false, error: lastError, attempts };
}
