export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to give up immediately on an error that will not go away. */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each wait, with the attempt that just failed. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export async function retryWithExponentialBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 4, baseDelayMs = 2000, maxDelayMs = 16000, shouldRetry = () => true, onRetry } = options;

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || !shouldRetry(lastError)) {
        break;
      }

      // 2^(attempt-1) * baseDelayMs, capped at maxDelayMs
      const delay = Math.min(Math.pow(2, attempt - 1) * baseDelayMs, maxDelayMs);
      onRetry?.(lastError, attempt, delay);

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError || new Error('Retry failed with unknown error');
}
