export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  factor?: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

// Runs fn up to `attempts` times. Errors rejected by shouldRetry, and the
// error from the final attempt, are rethrown unchanged.
export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const { attempts, baseDelayMs, factor = 2, shouldRetry, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) throw error;
      const delayMs = baseDelayMs * factor ** (attempt - 1);
      onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) await sleep(delayMs);
    }
  }
};
