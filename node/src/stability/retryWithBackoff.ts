// Retry with exponential backoff and jitter, bounded by the caller's budget.
import { isRetryable, throwIfCancelled, TurnCancelledError, type FailureStage } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Defaults to the error's own `retryable` flag. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  stage?: FailureStage;
}

/**
 * Runs `fn` up to `maxRetries + 1` times. `attempt` starts at 1. Cancellation is
 * never retried and interrupts the backoff sleep.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 100,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    shouldRetry = isRetryable,
    onRetry,
    signal,
    stage = 'request',
  } = options;

  for (let attempt = 1; ; attempt++) {
    throwIfCancelled(signal, stage);
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      if (attempt > maxRetries || !shouldRetry(error, attempt)) throw error;

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt - 1);
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      onRetry?.(error, attempt, delay);
      await sleep(delay, signal, stage);
    }
  }
}

function sleep(ms: number, signal: AbortSignal | undefined, stage: FailureStage): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TurnCancelledError(stage));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
