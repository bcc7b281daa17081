/**
 * Request and response shapes for the memory tool. Acceptance rules for
 * writes live in the policy engine.
 */

import {
  DEFAULT_MEMORY_TTL,
  MemoryReadResultSchema,
  MemoryWriteRequestSchema,
  safeValidate,
  zodIssues,
  type MemoryWriteRequest,
} from '@mesh-kernel/contracts';
import { ArgumentResolutionError, ToolInvocationError } from '../errors.js';
import { isRecord } from '../shared/utils.js';

/**
 * Assemble a write request from resolved node arguments. `ttl` defaults to
 * 90 days.
 */
export function buildWriteRequest(args: Record<string, unknown>, nodeId: string): MemoryWriteRequest {
  const parsed = MemoryWriteRequestSchema.safeParse({
    key: args['key'],
    value: args['value'],
    provenance: args['provenance'],
    confidence: args['confidence'],
    ttl: args['ttl'] ?? DEFAULT_MEMORY_TTL,
  });
  if (!parsed.success) {
    const detail = zodIssues(parsed.error)
      .map((issue) => `${issue.path || 'args'}: ${issue.message}`)
      .join('; ');
    throw new ArgumentResolutionError(`Invalid memory write arguments: ${detail}`, 'args', nodeId);
  }
  return parsed.data;
}

export function writeArgs(request: MemoryWriteRequest): Record<string, unknown> {
  return {
    operation: 'write',
    key: request.key,
    value: request.value,
    provenance: request.provenance,
    confidence: request.confidence,
    ttl: request.ttl ?? DEFAULT_MEMORY_TTL,
  };
}

export function readKey(args: Record<string, unknown>, nodeId: string): string {
  const key = args['key'];
  if (typeof key !== 'string' || key === '') {
    throw new ArgumentResolutionError('Memory read requires a string key', 'args.key', nodeId);
  }
  return key;
}

/**
 * Value of a read: the entry's value, a bare `value`, or null when the
 * store reports the key missing or expired.
 */
export function readValue(result: unknown): { found: boolean; value: unknown } {
  const parsed = safeValidate(MemoryReadResultSchema, result);
  if (parsed) {
    if (!parsed.success) return { found: false, value: null };
    if (parsed.entry) return { found: true, value: parsed.entry.value ?? null };
    return { found: parsed.value !== undefined, value: parsed.value ?? null };
  }
  if (isRecord(result) && 'value' in result) {
    return { found: true, value: result['value'] ?? null };
  }
  return { found: result !== undefined && result !== null, value: result ?? null };
}

/**
 * The store may refuse a write on its own terms; surface that as a
 * non-retryable invocation failure.
 */
export function assertWriteStored(result: unknown, tool: string): void {
  const parsed = safeValidate(MemoryReadResultSchema, result);
  if (parsed && !parsed.success) {
    throw new ToolInvocationError(
      `Memory store ${tool} rejected the write: ${parsed.message ?? 'no reason given'}`,
      tool,
      false
    );
  }
}
