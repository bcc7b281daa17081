/**
 * TraceEvent Schema
 *
 * Every scheduling and policy decision the kernel takes is recorded as one
 * signed, append-only TraceEvent. The ordered log for a run is the
 * authoritative record of what happened and why; it is streamed as NDJSON.
 */

import { z } from 'zod';

export const TraceEventTypeSchema = z.enum([
  'step-start',
  'step-end',
  'tool-invoke',
  'constraint-check',
  'policy-violation',
  'evidence-check',
  'memory-op',
  'capability-route',
  'plan-optimizer',
]);
export type TraceEventType = z.infer<typeof TraceEventTypeSchema>;

/** step_id used for run-level records */
export const PLAN_STEP_ID = 'plan';

export const TraceEventSchema = z.object({
  plan_id: z.string().min(1),
  /** Monotonic per run, starting at 1 */
  seq: z.number().int().positive(),
  /** Node id, `<node>/<task>` for spawned tasks, or `plan` */
  step_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  event_type: TraceEventTypeSchema,
  cost_usd: z.number().nonnegative().optional(),
  tokens_in: z.number().int().nonnegative().optional(),
  tokens_out: z.number().int().nonnegative().optional(),
  citations: z.array(z.string()).optional(),
  /** Base64 Ed25519 signature, chained to the previous event */
  signature: z.string().optional(),
  data: z.record(z.string(), z.unknown()).default({}),
});
export type TraceEvent = z.infer<typeof TraceEventSchema>;

export function validateTraceEvent(json: unknown): TraceEvent {
  return TraceEventSchema.parse(json);
}

/**
 * Check if an object is a valid TraceEvent
 */
export function isValidTraceEvent(event: unknown): event is TraceEvent {
  return TraceEventSchema.safeParse(event).success;
}
