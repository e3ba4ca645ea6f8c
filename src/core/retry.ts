import { logger } from "./logger";
import { RateLimitError } from "./errors";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  isRetryable?: (error: unknown) => boolean;
  /** Upper bound on waiting for a rate-limit reset announced by the backend. */
  maxRateLimitWaitMs?: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterMs: 500,
  maxRateLimitWaitMs: 60000,
};

export class RetryExhaustedError extends Error {
  constructor(public attempts: number, public lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
    this.name = "RetryExhaustedError";
  }
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  context?: string
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterMs, isRetryable, maxRateLimitWaitMs = 60000 } = options;
  let lastError: unknown;
  let attempt = 0;

  while (attempt < Math.max(1, maxAttempts)) {
    attempt++;
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts) break;
      if (isRetryable && !isRetryable(error)) break;

      const backoff = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const delay =
        error instanceof RateLimitError && error.retryAfterSeconds !== undefined
          ? Math.max(backoff, Math.min(error.retryAfterSeconds * 1000, maxRateLimitWaitMs))
          : backoff;
      const jitter = Math.random() * jitterMs;
      const totalDelay = delay + jitter;

      logger.debug({ attempt, delay: totalDelay, context, error }, "Retrying after error");
      await sleep(totalDelay);
    }
  }

  throw new RetryExhaustedError(attempt, lastError);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
