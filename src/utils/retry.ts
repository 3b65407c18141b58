/**
 * Bounded retry with exponential backoff
 */

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Errors it rejects are rethrown without a retry */
  isRetryable: (error: Error) => boolean;
  /** Replace the computed delay for a given error (e.g. a server-suggested wait) */
  delayForError?: (error: Error, attempt: number, defaultDelayMs: number) => number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Exponential delay for a zero-based attempt, capped at maxDelayMs
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier = 2
): number {
  return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
}

/**
 * Execute a function with exponential backoff retry logic.
 * Non-retryable errors and the error of the last attempt are rethrown as-is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    isRetryable,
    delayForError,
    onRetry,
    sleep: sleepFn = sleep,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || !isRetryable(lastError)) {
        throw lastError;
      }

      let delay = backoffDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);
      if (delayForError) {
        delay = delayForError(lastError, attempt, delay);
      }

      onRetry?.(attempt + 1, lastError, delay);

      await sleepFn(delay);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError ?? new Error('Unknown error during retry');
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reject when the promise has not settled within `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
