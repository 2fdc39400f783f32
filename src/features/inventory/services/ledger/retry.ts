import { isRetriableDatabaseError } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = { maxAttempts: 3, baseDelayMs: 100 };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a write unit of work, retrying only on transient lock contention.
 * Domain errors (insufficient stock, supplier conflict...) are rethrown at once.
 */
export async function withWriteRetry<T>(
  exec: () => T,
  options: RetryOptions = DEFAULT_RETRY,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let attempt = 0;
  let lastError: unknown = null;
  while (attempt < options.maxAttempts) {
    try {
      return exec();
    } catch (error) {
      lastError = error;
      if (!isRetriableDatabaseError(error)) {
        throw error;
      }
      attempt++;
      if (attempt >= options.maxAttempts) break;
      // exponential backoff: 100, 200, 400ms ...
      const delay = options.baseDelayMs * Math.pow(2, attempt - 1);
      // eslint-disable-next-line no-console
      console.warn(`[withWriteRetry] Retriable error (attempt ${attempt}/${options.maxAttempts}):`, error);
      await wait(delay);
    }
  }
  throw lastError ?? new Error('Write failed after retries');
}
