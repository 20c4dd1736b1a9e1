import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";

/**
 * Bounded retry policy: a fixed number of attempts with a fixed pause
 * between them. There is no backoff.
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Pause between attempts in milliseconds */
  delayMs: number;
}

export interface RetryOptions {
  policy: RetryPolicy;
  /** Errors for which this returns false are rethrown immediately */
  isRetryable: (error: unknown) => boolean;
  /** Called before each pause with the attempt that just failed */
  onRetry?: (attempt: number, error: unknown) => void;
  /** Optional delay function for testing */
  delay?: DelayFn;
}

/**
 * Thrown when every attempt failed with a retryable error.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${reason}`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Run an operation under a bounded retry policy.
 * The operation receives the 1-based attempt number.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, isRetryable, onRetry, delay = realDelay } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < maxAttempts) {
        onRetry?.(attempt, error);
        await delay(policy.delayMs);
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
