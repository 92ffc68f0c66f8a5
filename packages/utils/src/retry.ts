import { Result, ok, err, toError } from './result.js';
import { logger } from './logger.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  retryableErrors?: readonly string[];
  // No further attempts once aborted
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  multiplier: 2,
  jitter: 0.1,
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const calculateDelay = (attempt: number, options: RetryOptions): number => {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitterRange = cappedDelay * options.jitter;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;
  return Math.max(0, cappedDelay + jitter);
};

const isRetryableError = (error: Error, retryableErrors?: readonly string[]): boolean => {
  if (!retryableErrors || retryableErrors.length === 0) {
    return true; // Retry all errors by default
  }
  const errorMessage = error.message.toLowerCase();
  const errorName = error.name.toLowerCase();
  return retryableErrors.some(
    (e) => errorMessage.includes(e.toLowerCase()) || errorName.includes(e.toLowerCase())
  );
};

export interface RetryError {
  type: 'retry_exhausted';
  message: string;
  attempts: number;
  lastError: Error;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<Result<T, RetryError>> {
  const opts: RetryOptions = { ...defaultRetryOptions, ...options };
  let lastError = new Error('No attempts were made');
  let attempts = 0;

  while (attempts < opts.maxAttempts) {
    try {
      attempts++;
      return ok(await fn());
    } catch (e) {
      lastError = toError(e);

      const isLastAttempt = attempts >= opts.maxAttempts;
      if (isLastAttempt || opts.signal?.aborted || !isRetryableError(lastError, opts.retryableErrors)) {
        break;
      }

      const delayMs = calculateDelay(attempts - 1, opts);

      if (opts.onRetry) {
        opts.onRetry(attempts, lastError, delayMs);
      } else {
        logger.warn(
          { attempt: attempts, maxAttempts: opts.maxAttempts, delayMs, error: lastError.message },
          'Retrying after error'
        );
      }

      await sleep(delayMs);
    }
  }

  return err({
    type: 'retry_exhausted',
    message: `Failed after ${attempts} attempts: ${lastError.message}`,
    attempts,
    lastError,
  });
}

export const retryPresets = {
  // MediaWiki asks clients to back off on 429 and maxlag responses
  wikipedia: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 8000,
    multiplier: 2,
    jitter: 0.2,
    retryableErrors: ['timeout', 'ECONNRESET', 'ECONNREFUSED', 'fetch failed', '429', '502', '503', '504', 'maxlag'],
  },
} as const satisfies Record<string, RetryOptions>;
