/**
 * Run Result Contracts
 *
 * What a caller gets back from executing a plan: the final status, the point
 * of failure, per-node outcomes, cumulative telemetry and the full trace log.
 */

import { z } from 'zod';
import { TraceEventSchema } from '../trace/trace-event.js';

export const NodeStatusSchema = z.enum([
  'pending',
  'ready',
  'running',
  'completed',
  'failed',
  'skipped',
]);
export type NodeStatus = z.infer<typeof NodeStatusSchema>;

export const RunStatusSchema = z.enum(['completed', 'failed', 'halted']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const HaltReasonSchema = z.enum(['budget_exceeded', 'policy_violation', 'max_nodes']);
export type HaltReason = z.infer<typeof HaltReasonSchema>;

export const ErrorInfoSchema = z.object({
  code: z.string(),
  message: z.string(),
});
export type ErrorInfo = z.infer<typeof ErrorInfoSchema>;

export const NodeOutcomeSchema = z.object({
  status: NodeStatusSchema,
  /** Concrete tool used, after capability routing */
  tool: z.string().optional(),
  attempts: z.number().int().nonnegative().default(0),
  error: ErrorInfoSchema.optional(),
  skip_reason: z.string().optional(),
});
export type NodeOutcome = z.infer<typeof NodeOutcomeSchema>;

export const TelemetrySchema = z.object({
  cost_usd: z.number().nonnegative(),
  latency_ms: z.number().nonnegative(),
  tokens_in: z.number().int().nonnegative(),
  tokens_out: z.number().int().nonnegative(),
  invocations: z.number().int().nonnegative(),
});
export type Telemetry = z.infer<typeof TelemetrySchema>;

export const ViolationKindSchema = z.enum([
  'memory_confidence_low',
  'memory_provenance_missing',
  'memory_evidence_insufficient',
  'evidence_below_threshold',
  'deny_if',
  'citation_required',
]);
export type ViolationKind = z.infer<typeof ViolationKindSchema>;

export const ViolationSeveritySchema = z.enum(['advisory', 'node', 'run']);
export type ViolationSeverity = z.infer<typeof ViolationSeveritySchema>;

export const PolicyViolationRecordSchema = z.object({
  kind: ViolationKindSchema,
  severity: ViolationSeveritySchema,
  step_id: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});
export type PolicyViolationRecord = z.infer<typeof PolicyViolationRecordSchema>;

export const RunResultSchema = z.object({
  plan_id: z.string(),
  status: RunStatusSchema,
  halt_reason: HaltReasonSchema.optional(),
  failure: ErrorInfoSchema.extend({ node_id: z.string() }).optional(),
  nodes: z.record(z.string(), NodeOutcomeSchema),
  variables: z.record(z.string(), z.unknown()),
  telemetry: TelemetrySchema,
  violations: z.array(PolicyViolationRecordSchema),
  trace: z.array(TraceEventSchema),
  started_at: z.string().datetime({ offset: true }),
  finished_at: z.string().datetime({ offset: true }),
});
export type RunResult = z.infer<typeof RunResultSchema>;
