/**
 * Shared utilities for the kernel
 */

/**
 * Generate a plan/run identifier
 */
export function generatePlanId(): string {
  return crypto.randomUUID();
}

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Determine if an error message looks transient
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const retryablePatterns = [
    'timeout',
    'timed out',
    'rate limit',
    'too many requests',
    '429',
    '503',
    '502',
    '504',
    'connection refused',
    'econnrefused',
    'econnreset',
    'network error',
    'fetch failed',
  ];
  return retryablePatterns.some((pattern) => message.includes(pattern));
}

/**
 * Rough token estimate: one token per four characters of JSON.
 */
export function estimateTokens(value: unknown): number {
  if (value === undefined) return 0;
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  return Math.ceil(text.length / 4);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
