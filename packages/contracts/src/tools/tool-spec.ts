/**
 * ToolSpec Contracts
 *
 * Machine-readable contract every tool publishes at its spec endpoint:
 * I/O schema, cost and latency constraints, provenance requirements and
 * policy rules. A ToolSpec is immutable once fetched for a run.
 */

import { z } from 'zod';

/** ISO-8601 duration such as P90D or PT30M */
export const ISO_DURATION = /^P(?!$)([0-9]+Y)?([0-9]+M)?([0-9]+W)?([0-9]+D)?(T(?=[0-9])([0-9]+H)?([0-9]+M)?([0-9]+S)?)?$/;

export const ToolConstraintsSchema = z.object({
  input_tokens_max: z.number().int().nonnegative().optional(),
  latency_p50_ms: z.number().int().nonnegative().optional(),
  cost_per_call_usd: z.number().nonnegative().optional(),
  rate_limit_qps: z.number().int().nonnegative().optional(),
  side_effects: z.boolean().optional(),
  /** Per-invocation timeout; falls back to the kernel default */
  timeout_ms: z.number().int().positive().optional(),
});
export type ToolConstraints = z.infer<typeof ToolConstraintsSchema>;

export const ToolPolicySchema = z.object({
  /** Predicates over `args` (and `output`) that block the call when true */
  deny_if: z.array(z.string().min(1)).optional(),
  /** What a deny_if match does to the run */
  on_violation: z.enum(['fail-node', 'halt-run']).optional(),
});
export type ToolPolicy = z.infer<typeof ToolPolicySchema>;

export const ToolSpecSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  version: z.string().optional(),
  io: z.object({
    input: z.record(z.string(), z.unknown()),
    output: z.record(z.string(), z.unknown()),
  }),
  capabilities: z.array(z.string().min(1)).optional(),
  constraints: ToolConstraintsSchema.optional(),
  provenance: z
    .object({
      attribution_required: z.boolean().optional(),
    })
    .optional(),
  quality: z
    .object({
      freshness_window: z.string().regex(ISO_DURATION).optional(),
      coverage_tags: z.array(z.string()).optional(),
    })
    .optional(),
  policy: ToolPolicySchema.optional(),
});
export type ToolSpec = z.infer<typeof ToolSpecSchema>;

/**
 * Registry listing entry: where a tool can be reached.
 */
export const RegistryEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

export const RegistryListingSchema = z.array(RegistryEntrySchema);

/**
 * Body returned by a tool's invoke endpoint.
 */
export const ToolInvokeResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
  usage: z
    .object({
      cost_usd: z.number().nonnegative().optional(),
      tokens_in: z.number().int().nonnegative().optional(),
      tokens_out: z.number().int().nonnegative().optional(),
    })
    .optional(),
  citations: z.array(z.string()).optional(),
});
export type ToolInvokeResponse = z.infer<typeof ToolInvokeResponseSchema>;

export function validateToolSpec(json: unknown): ToolSpec {
  return ToolSpecSchema.parse(json);
}
