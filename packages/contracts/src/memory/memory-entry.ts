/**
 * Memory Contracts
 *
 * The memory tool stores facts with provenance and a TTL. The kernel only
 * sees entries through the memory-read / memory-write operations; storage
 * and expiry sweeping belong to the tool.
 */

import { z } from 'zod';
import { ISO_DURATION } from '../tools/tool-spec.js';

/** Writes below this confidence are rejected before reaching the store */
export const MEMORY_WRITE_MIN_CONFIDENCE = 0.8;

/** Default time-to-live for written facts */
export const DEFAULT_MEMORY_TTL = 'P90D';

export const MemoryOperationSchema = z.enum(['read', 'write', 'forget']);
export type MemoryOperation = z.infer<typeof MemoryOperationSchema>;

export const MemoryEntrySchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  provenance: z.array(z.string()).optional(),
  confidence: z.number().min(0).max(1).optional(),
  ttl: z.string().regex(ISO_DURATION).optional(),
  timestamp: z.string().datetime({ offset: true }),
});
export type MemoryEntry = z.infer<typeof MemoryEntrySchema>;

/**
 * A write request as the kernel assembles it from resolved node arguments.
 * Confidence and provenance floors are left to the policy engine, which
 * records a rejection as a violation.
 */
export const MemoryWriteRequestSchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  provenance: z.array(z.string()).optional(),
  confidence: z.number().optional(),
  ttl: z.string().regex(ISO_DURATION).optional(),
});
export type MemoryWriteRequest = z.infer<typeof MemoryWriteRequestSchema>;

/**
 * Result body of a memory tool read.
 */
export const MemoryReadResultSchema = z.object({
  success: z.boolean(),
  entry: z
    .object({
      value: z.unknown(),
      provenance: z.array(z.string()).optional(),
      confidence: z.number().optional(),
      ttl: z.string().optional(),
      timestamp: z.string().optional(),
    })
    .optional(),
  value: z.unknown().optional(),
  message: z.string().optional(),
});
export type MemoryReadResult = z.infer<typeof MemoryReadResultSchema>;
