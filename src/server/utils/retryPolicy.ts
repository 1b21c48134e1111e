import { isBridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import { errorMessage, sleep } from "../../shared/utils.js";

/**
 * Retry policy applied at one operation boundary.
 * `backoff(attempt)` is the delay before attempt `attempt + 1` (attempts start at 1).
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoff: (attempt: number) => number;
  isRetryable: (error: unknown) => boolean;
  /** Upper bound for a server-provided retry-after hint; longer hints are not waited out */
  maxRetryAfterMs?: number;
}

export interface RetryOptions {
  label?: string;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}

export function exponentialBackoff(baseMs: number, maxMs: number): (attempt: number) => number {
  return (attempt) => Math.min(maxMs, baseMs * Math.pow(2, Math.max(0, attempt - 1)));
}

export function isTransientError(error: unknown): boolean {
  return isBridgeError(error) && error.transient;
}

export function createRetryPolicy(options: {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  isRetryable?: (error: unknown) => boolean;
}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, options.maxAttempts),
    backoff: exponentialBackoff(options.backoffBaseMs, options.backoffMaxMs),
    isRetryable: options.isRetryable ?? isTransientError,
    maxRetryAfterMs: options.backoffMaxMs * 4,
  };
}

/** A single attempt with no retries */
export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  backoff: () => 0,
  isRetryable: () => false,
};

/**
 * Delay to wait before the next attempt, or undefined when the error should propagate.
 */
export function nextDelay(policy: RetryPolicy, attempt: number, error: unknown): number | undefined {
  if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
    return undefined;
  }

  if (isBridgeError(error) && error.retryAfterMs !== undefined) {
    if (policy.maxRetryAfterMs !== undefined && error.retryAfterMs > policy.maxRetryAfterMs) {
      return undefined;
    }
    return error.retryAfterMs;
  }

  return policy.backoff(attempt);
}

export async function runWithRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const delay = nextDelay(policy, attempt, error);
      if (delay === undefined || options.signal?.aborted) {
        throw error;
      }

      logger.debug(
        `${options.label ?? "operation"} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms: ${errorMessage(error)}`
      );
      await wait(delay);
    }
  }
}
