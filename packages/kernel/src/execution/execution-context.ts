/**
 * ExecutionContext - per-run state owned by exactly one execution.
 *
 * Holds the variable mapping, the ToolSpec snapshot the run resolved
 * against, node states, recorded policy violations, the budget tracker and
 * the trace emitter. Enforces:
 * - Node states only move pending -> ready -> running -> terminal, or
 *   pending/ready -> skipped
 * - No node may remain running at finalization
 * - Finalization happens once
 */

import type {
  ErrorInfo,
  HaltReason,
  NodeOutcome,
  NodeStatus,
  PolicyViolationRecord,
  RunResult,
  RunStatus,
} from '@mesh-kernel/contracts';
import type { BudgetTracker } from '../budget/budget-tracker.js';
import type { ToolSpecSnapshot } from '../tools/tool-spec-cache.js';
import type { TraceEmitter } from '../trace/trace-emitter.js';

const TRANSITIONS: Record<NodeStatus, readonly NodeStatus[]> = {
  pending: ['ready', 'skipped'],
  ready: ['running', 'skipped'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
  skipped: [],
};

export interface ExecutionContextInit {
  planId: string;
  nodeIds: readonly string[];
  inputs?: Record<string, unknown>;
  snapshot: ToolSpecSnapshot;
  budget: BudgetTracker;
  trace: TraceEmitter;
  now?: () => number;
}

export interface RunConclusion {
  status: RunStatus;
  haltReason?: HaltReason;
  failure?: ErrorInfo & { node_id: string };
}

export class ExecutionContext {
  readonly planId: string;
  readonly snapshot: ToolSpecSnapshot;
  readonly budget: BudgetTracker;
  readonly trace: TraceEmitter;

  private readonly variables = new Map<string, unknown>();
  private readonly nodes = new Map<string, NodeOutcome>();
  private readonly violations: PolicyViolationRecord[] = [];
  private readonly now: () => number;
  private readonly startedAt: string;
  private finalized = false;

  constructor(init: ExecutionContextInit) {
    this.planId = init.planId;
    this.snapshot = init.snapshot;
    this.budget = init.budget;
    this.trace = init.trace;
    this.now = init.now ?? Date.now;
    this.startedAt = new Date(this.now()).toISOString();

    for (const [name, value] of Object.entries(init.inputs ?? {})) {
      this.variables.set(name, value);
    }
    for (const id of init.nodeIds) {
      this.nodes.set(id, { status: 'pending', attempts: 0 });
    }
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  get variableMap(): ReadonlyMap<string, unknown> {
    return this.variables;
  }

  bind(name: string, value: unknown): void {
    this.assertOpen('bind a variable');
    this.variables.set(name, value);
  }

  status(nodeId: string): NodeStatus {
    return this.outcome(nodeId).status;
  }

  nodesIn(status: NodeStatus): string[] {
    return Array.from(this.nodes.entries())
      .filter(([, outcome]) => outcome.status === status)
      .map(([id]) => id);
  }

  markReady(nodeId: string): void {
    this.transition(nodeId, 'ready');
  }

  markRunning(nodeId: string): void {
    this.transition(nodeId, 'running');
  }

  complete(nodeId: string): void {
    this.transition(nodeId, 'completed');
  }

  fail(nodeId: string, error: ErrorInfo): void {
    this.transition(nodeId, 'failed');
    this.outcome(nodeId).error = error;
  }

  skip(nodeId: string, reason: string): void {
    this.transition(nodeId, 'skipped');
    this.outcome(nodeId).skip_reason = reason;
  }

  /** Concrete tool a node ran against, after routing */
  setTool(nodeId: string, tool: string): void {
    this.outcome(nodeId).tool = tool;
  }

  countAttempt(nodeId: string): void {
    this.outcome(nodeId).attempts += 1;
  }

  recordViolation(violation: PolicyViolationRecord): void {
    this.assertOpen('record a violation');
    this.violations.push(violation);
  }

  /**
   * Violations recorded against any of the given nodes or their sub-steps.
   */
  violationsFor(nodeIds: Iterable<string>): PolicyViolationRecord[] {
    const ids = new Set(nodeIds);
    return this.violations.filter((v) => {
      const owner = v.step_id.split('/')[0] ?? v.step_id;
      return ids.has(owner);
    });
  }

  /**
   * Close the run and produce its result. Can only be called once, and
   * never while a node is still running.
   */
  finalize(conclusion: RunConclusion): RunResult {
    if (this.finalized) {
      throw new Error('Execution already finalized');
    }
    const running = this.nodesIn('running');
    if (running.length > 0) {
      throw new Error(`Cannot finalize while nodes are running: ${running.join(', ')}`);
    }
    this.finalized = true;

    const nodes: Record<string, NodeOutcome> = {};
    for (const [id, outcome] of this.nodes) nodes[id] = { ...outcome };

    return {
      plan_id: this.planId,
      status: conclusion.status,
      ...(conclusion.haltReason && { halt_reason: conclusion.haltReason }),
      ...(conclusion.failure && { failure: conclusion.failure }),
      nodes,
      variables: Object.fromEntries(this.variables),
      telemetry: this.budget.totals(),
      violations: [...this.violations],
      trace: [...this.trace.events()],
      started_at: this.startedAt,
      finished_at: new Date(this.now()).toISOString(),
    };
  }

  private outcome(nodeId: string): NodeOutcome {
    const outcome = this.nodes.get(nodeId);
    if (!outcome) {
      throw new Error(`Unknown node: ${nodeId}`);
    }
    return outcome;
  }

  private transition(nodeId: string, next: NodeStatus): void {
    this.assertOpen(`move ${nodeId} to ${next}`);
    const outcome = this.outcome(nodeId);
    if (!TRANSITIONS[outcome.status].includes(next)) {
      throw new Error(`Illegal transition for ${nodeId}: ${outcome.status} -> ${next}`);
    }
    outcome.status = next;
  }

  private assertOpen(action: string): void {
    if (this.finalized) {
      throw new Error(`Cannot ${action}: execution already finalized`);
    }
  }
}
