export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type RetryOptions = {
  attempts: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
};

/**
 * Runs `fn` up to `attempts` times, waiting base, 2×base, 4×base… between
 * tries. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  const base = opts.baseDelayMs ?? 1000;
  const wait = opts.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === attempts || (opts.shouldRetry && !opts.shouldRetry(err))) break;
      const delayMs = base * 2 ** (attempt - 1);
      opts.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
  throw lastError;
}
