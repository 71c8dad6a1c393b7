import { HttpStatusError, TapError } from '../errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 5) */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 20000) */
  maxDelayMs: number;
  /** Maximum random jitter to add in milliseconds (default: 300) */
  jitterMs: number;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  isRetryable?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  baseDelayMs: 1000,
  maxDelayMs: 20000,
  jitterMs: 300,
};

/**
 * Thrown by withRetry when every attempt failed with a retryable error.
 * Carries the attempt count so callers can report it.
 */
export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Determines if an error is retryable.
 *
 * Retryable errors:
 * - HTTP 429 (rate limit) and 5xx server errors
 * - Network errors (ECONNRESET, ETIMEDOUT, ENOTFOUND, etc.)
 * - Timeout errors
 *
 * Non-retryable errors:
 * - Any other typed tap error (bad request, malformed payload, ...)
 * - Bad input (4xx except 429)
 * - Authentication errors
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  if (error instanceof TapError) {
    return false;
  }

  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  // Network errors - always retryable
  const networkErrors = [
    'econnreset',
    'econnrefused',
    'etimedout',
    'enotfound',
    'enetunreach',
    'ehostunreach',
    'epipe',
    'socket hang up',
    'network error',
    'fetch failed',
    'terminated',
    'other side closed',
    'request aborted',
  ];

  for (const netError of networkErrors) {
    if (message.includes(netError)) {
      return true;
    }
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    name.includes('timeout')
  ) {
    return true;
  }

  if (message.includes('429') || message.includes('rate limit')) {
    return true;
  }

  const serverErrorPattern = /\b5\d{2}\b/;
  if (serverErrorPattern.test(message)) {
    return true;
  }

  const clientErrorPattern = /\b4\d{2}\b/;
  if (clientErrorPattern.test(message)) {
    return false;
  }

  if (
    message.includes('unauthorized') ||
    message.includes('permission denied') ||
    message.includes('acl token not found')
  ) {
    return false;
  }

  // Default: assume retryable for unknown errors (safer for external APIs)
  return true;
}

/**
 * Calculates the delay for a retry attempt using exponential backoff with jitter.
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt) + random(0, jitter)
 */
export function calculateRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs;

  return cappedDelay + jitter;
}

/**
 * Executes a function with retry logic, exponential backoff, and jitter.
 *
 * Non-retryable errors are rethrown as-is on first occurrence. When the retry
 * budget runs out the last error is wrapped in a RetryExhaustedError.
 *
 * @example
 * const page = await withRetry(
 *   () => getPage(path),
 *   {
 *     maxRetries: 3,
 *     onRetry: (error, attempt) => log.warn('Retrying', { attempt, error: error.message }),
 *   }
 * );
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError)) {
        throw lastError;
      }
      if (attempt >= opts.maxRetries) {
        throw new RetryExhaustedError(attempt + 1, lastError);
      }

      const delay = calculateRetryDelay(
        attempt,
        opts.baseDelayMs,
        opts.maxDelayMs,
        opts.jitterMs
      );

      opts.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
