/**
 * Retry as a decorator over an invocation function. The wrapped function
 * knows nothing about attempts beyond the number it is handed.
 */

import { ToolInvocationError } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  multiplier: number;
}

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, backoffMs: 0, multiplier: 1 };

export interface RetryOptions {
  sleep: (ms: number) => Promise<void>;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ToolInvocationError && error.retryable;
}

/**
 * Delay before attempt `attempt + 1`: backoff x multiplier^(attempt - 1).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.backoffMs * Math.pow(policy.multiplier, attempt - 1));
}

function positiveInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

function nonNegative(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

/**
 * Read `max_attempts`, `backoff_ms` and `backoff_multiplier` from resolved
 * node arguments, falling back to `defaults`.
 */
export function retryPolicyFromArgs(args: Record<string, unknown>, defaults: RetryPolicy): RetryPolicy {
  const multiplier = nonNegative(args['backoff_multiplier']);
  return {
    maxAttempts: positiveInt(args['max_attempts']) ?? defaults.maxAttempts,
    backoffMs: nonNegative(args['backoff_ms']) ?? defaults.backoffMs,
    multiplier: multiplier !== undefined && multiplier >= 1 ? multiplier : defaults.multiplier,
  };
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  let attempt = 1;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await options.sleep(delayMs);
      attempt += 1;
    }
  }
}
