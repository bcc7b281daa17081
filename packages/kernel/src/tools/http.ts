/**
 * JSON over HTTP for the tool ABI and the registry, bounded by a timeout.
 */

import { ToolInvocationError } from '../errors.js';

export interface HttpRequestOptions {
  method: 'GET' | 'POST';
  body?: unknown;
  timeoutMs: number;
  /** Tool (or registry) name carried on the errors raised */
  target: string;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Perform a request and parse the JSON body. Every failure surfaces as a
 * ToolInvocationError; timeouts, network errors and 408/429/5xx responses
 * are retryable.
 */
export async function requestJson(url: string, options: HttpRequestOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      ...(options.body !== undefined && { body: JSON.stringify(options.body) }),
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ToolInvocationError(
        `Request to ${options.target} timed out after ${options.timeoutMs}ms`,
        options.target,
        true
      );
    }
    throw new ToolInvocationError(
      `Connection to ${options.target} failed: ${error instanceof Error ? error.message : String(error)}`,
      options.target,
      true
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    throw new ToolInvocationError(
      `HTTP ${response.status} from ${options.target}: ${response.statusText}`,
      options.target,
      isRetryableStatus(response.status),
      response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ToolInvocationError(
      `Invalid JSON from ${options.target}: ${error instanceof Error ? error.message : String(error)}`,
      options.target,
      false,
      response.status
    );
  }
}

export function joinUrl(base: string, ...parts: string[]): string {
  const trimmed = base.replace(/\/+$/, '');
  return [trimmed, ...parts.map((part) => encodeURIComponent(part))].join('/');
}
