import { ApiError, AuthenticationError, IoError, NetworkError, ValidationError } from '../utils/errors';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep';

export interface RetryConfig {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
});

export interface RetryOptions {
  sleep?: SleepFn;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);

function shouldAbort(error: unknown): boolean {
  if (error instanceof AuthenticationError || error instanceof ValidationError) {
    return true;
  }
  return error instanceof ApiError && NON_RETRYABLE_STATUSES.has(error.status);
}

/**
 * Runs `operation` until it succeeds, at most `maxRetries + 1` times.
 * `operation` is called afresh for every attempt.
 */
export async function retryWithBackoff<T>(config: RetryConfig, operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const wait = options.sleep ?? defaultSleep;
  const multiplier = Math.max(1, config.backoffMultiplier);
  let delay = config.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (shouldAbort(error) || attempt >= config.maxRetries) {
        throw error;
      }

      options.onRetry?.(error, attempt + 1, delay);
      await wait(delay);
      delay = Math.min(delay * multiplier, config.maxDelayMs);
    }
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof NetworkError || error instanceof IoError) {
    return true;
  }
  if (error instanceof ApiError) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}
