/**
 * Plan IR Contracts
 *
 * Wire format for declarative execution plans. A plan is a DAG of nodes drawn
 * from a fixed operation vocabulary, plus budget signals and stop conditions.
 *
 * Structural rules enforced here:
 * - Tool-invoking operations declare exactly one of `tool` or `capability`
 * - Control operations (branch, assert, spawn) declare neither
 *
 * Referential rules (unique ids, dangling edges, cycles, unknown variables)
 * need the whole plan and live in the kernel's plan validator.
 */

import { z } from 'zod';

// ============================================================================
// Operation Vocabulary
// ============================================================================

export const OPERATIONS = [
  'call',
  'map',
  'reduce',
  'branch',
  'assert',
  'spawn',
  'memory-read',
  'memory-write',
  'verify',
  'retry',
] as const;

export const OperationSchema = z.preprocess(
  (value) => {
    // Dotted spellings from earlier plan drafts
    if (value === 'mem.read') return 'memory-read';
    if (value === 'mem.write') return 'memory-write';
    return value;
  },
  z.enum(OPERATIONS),
);

export type Operation = (typeof OPERATIONS)[number];

/**
 * Operations that call out to an external tool and therefore need a tool or
 * a capability to route through.
 */
export const TOOL_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>([
  'call',
  'map',
  'reduce',
  'memory-read',
  'memory-write',
  'verify',
  'retry',
]);

export function isToolOperation(op: Operation): boolean {
  return TOOL_OPERATIONS.has(op);
}

/**
 * Argument names consumed by the kernel itself. They are never forwarded to
 * the invoked tool.
 */
export const RESERVED_ARGS = [
  'condition',
  'message',
  'items',
  'tasks',
  'join',
  'max_attempts',
  'backoff_ms',
  'backoff_multiplier',
  'wraps',
  'evidence',
  'min_confidence',
  'require_attribution',
  'operation',
] as const;

// ============================================================================
// Signals & Stop Conditions
// ============================================================================

export const SignalsSchema = z.object({
  /** Wall-clock latency ceiling summed over all invocations */
  latency_budget_ms: z.number().int().nonnegative().optional(),
  /** Spend ceiling in USD */
  cost_cap_usd: z.number().nonnegative().optional(),
  /** Declared risk appetite for the run */
  risk: z.number().min(0).max(1).optional(),
});
export type Signals = z.infer<typeof SignalsSchema>;

export const StopConditionsSchema = z.object({
  /** Stop admitting nodes once this many have been started */
  max_nodes: z.number().int().nonnegative().optional(),
  /** Evidence confidence floor for verify gates and evidence asserts */
  min_confidence: z.number().min(0).max(1).optional(),
});
export type StopConditions = z.infer<typeof StopConditionsSchema>;

// ============================================================================
// Nodes & Edges
// ============================================================================

export const NodeArgsSchema = z.record(z.string(), z.unknown());
export type NodeArgs = z.infer<typeof NodeArgsSchema>;

export const PlanNodeSchema = z
  .object({
    id: z.string().min(1),
    op: OperationSchema,
    tool: z.string().min(1).optional(),
    capability: z.string().min(1).optional(),
    args: NodeArgsSchema.optional(),
    /** Local name -> reference expression */
    bind: z.record(z.string(), z.string()).optional(),
    /** Context variable name -> path into this node's result */
    out: z.record(z.string(), z.string()).optional(),
  })
  .superRefine((node, ctx) => {
    const hasTool = node.tool !== undefined;
    const hasCapability = node.capability !== undefined;

    if (isToolOperation(node.op)) {
      if (!hasTool && !hasCapability) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tool'],
          message: `Node ${node.id} (${node.op}) requires either a tool or a capability`,
        });
      }
      if (hasTool && hasCapability) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['capability'],
          message: `Node ${node.id} declares both a tool and a capability`,
        });
      }
    } else if (hasTool || hasCapability) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasTool ? 'tool' : 'capability'],
        message: `Node ${node.id} (${node.op}) does not invoke a tool`,
      });
    }
  });
export type PlanNode = z.infer<typeof PlanNodeSchema>;

export const EdgeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  /** Branch label this edge is followed on; only meaningful after a branch node */
  when: z.string().min(1).optional(),
});
export type Edge = z.infer<typeof EdgeSchema>;

/**
 * A child invocation launched by a spawn node.
 */
export const SpawnTaskSchema = z
  .object({
    id: z.string().min(1),
    tool: z.string().min(1).optional(),
    capability: z.string().min(1).optional(),
    args: NodeArgsSchema.optional(),
  })
  .refine((task) => (task.tool === undefined) !== (task.capability === undefined), {
    message: 'Spawn task requires exactly one of tool or capability',
  });
export type SpawnTask = z.infer<typeof SpawnTaskSchema>;

export const SpawnJoinSchema = z.enum(['all', 'first-failure']);
export type SpawnJoin = z.infer<typeof SpawnJoinSchema>;

// ============================================================================
// Plan
// ============================================================================

export const PlanSchema = z.object({
  id: z.string().min(1).optional(),
  signals: SignalsSchema.optional(),
  nodes: z.array(PlanNodeSchema).min(1, 'Plan cannot be empty'),
  edges: z.array(EdgeSchema).optional(),
  stop_conditions: StopConditionsSchema.optional(),
});
export type Plan = z.infer<typeof PlanSchema>;

/**
 * Parse a plan, throwing a ZodError on structural problems.
 */
export function parsePlan(json: unknown): Plan {
  return PlanSchema.parse(json);
}
