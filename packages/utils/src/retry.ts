/**
 * Retry Logic
 *
 * Bounded retry loop driven by the result of each attempt.
 */

export interface RetryOptions<T> {
  maxAttempts: number;
  retryIf: (result: T, attempt: number) => boolean | Promise<boolean>;
  onRetry?: (result: T, attempt: number) => void;
}

/**
 * Run a function until its result no longer asks for another attempt
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
  }

  let attempt = 1;
  for (;;) {
    const result = await fn(attempt);

    // Last attempt, hand back whatever we got
    if (attempt >= options.maxAttempts) {
      return result;
    }

    if (!(await options.retryIf(result, attempt))) {
      return result;
    }

    options.onRetry?.(result, attempt);
    attempt++;
  }
}
