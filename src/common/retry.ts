import { Logger } from '@nestjs/common';
import { describeError, RetryExhaustedError } from './errors';

/**
 * Bounded exponential backoff for transient I/O.
 */
export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  /** Used in log lines and in the exhaustion error */
  label: string;
  logger?: Logger;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(
    policy.baseDelayMs * Math.pow(2, attempt - 1),
    policy.maxDelayMs,
  );
}

/**
 * Run `operation`, retrying failures up to `policy.maxRetries` times.
 *
 * @throws RetryExhaustedError wrapping the last failure once attempts run out
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const attempts = policy.maxRetries + 1;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < attempts) {
        const delay = backoffDelay(policy, attempt);
        options.logger?.warn(
          `${options.label} failed (attempt ${attempt}/${attempts}): ${describeError(error)}. Retrying in ${delay}ms...`,
        );
        await sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(options.label, attempts, lastError);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
