/**
 * Exponential backoff helpers shared by the connector, push channel and history writer
 */

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface RetryOptions extends BackoffPolicy {
  /** Total attempts including the first; Infinity retries until success */
  maxAttempts: number;
  /** Return false to rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting stops further attempts and rethrows the last error */
  signal?: AbortSignal;
}

/**
 * Delay before the given retry (1-based)
 *
 * @example
 * computeBackoff(1, { initialDelayMs: 1000, maxDelayMs: 60000, multiplier: 2 }); // 1000
 * computeBackoff(4, { initialDelayMs: 1000, maxDelayMs: 60000, multiplier: 2 }); // 8000
 */
export function computeBackoff(attempt: number, policy: BackoffPolicy): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation, retrying failures with exponential backoff
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const exhausted = attempt >= options.maxAttempts;
      const retryable = options.shouldRetry?.(error, attempt) ?? true;
      if (exhausted || !retryable || options.signal?.aborted) {
        throw error;
      }

      const delayMs = computeBackoff(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
      if (options.signal?.aborted) throw error;
    }
  }
}
