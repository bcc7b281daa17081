/**
 * Constraint Checker
 *
 * Pre-flight gate in front of every invocation, plus the budget-fit
 * estimate the capability router filters candidates with.
 */

import type { Plan, PolicyViolationRecord, ToolSpec } from '@mesh-kernel/contracts';
import type { PolicyEngine } from '../policy/policy-engine.js';
import { estimateTokens } from '../shared/utils.js';
import type { ToolSpecSnapshot } from '../tools/tool-spec-cache.js';
import type { BudgetTracker } from './budget-tracker.js';
import type { BudgetDimension } from '../errors.js';

export type PreflightResult =
  | { ok: true; estimated_tokens: number; predicate_errors: Array<{ predicate: string; message: string }> }
  | { ok: false; reason: 'budget_exhausted'; dimension: BudgetDimension; message: string }
  | { ok: false; reason: 'input_tokens'; estimated_tokens: number; limit: number; message: string }
  | { ok: false; reason: 'deny_if'; violation: PolicyViolationRecord; message: string };

export type FitResult = { fits: true } | { fits: false; reason: string };

export interface PlanEstimate {
  cost_usd: number;
  latency_ms: number;
  /** Tool nodes whose spec is missing from the snapshot */
  unresolved: string[];
  fits: boolean;
  exceeded: BudgetDimension[];
}

export class ConstraintChecker {
  constructor(
    private readonly tracker: BudgetTracker,
    private readonly policy: PolicyEngine
  ) {}

  /**
   * Gate an invocation: budget not exhausted, argument tokens within the
   * tool's input limit, no deny_if predicate over the arguments.
   */
  preflight(spec: ToolSpec, args: Record<string, unknown>, stepId: string): PreflightResult {
    const exhausted = this.tracker.exhausted();
    if (exhausted) {
      return {
        ok: false,
        reason: 'budget_exhausted',
        dimension: exhausted,
        message: `Budget for ${exhausted} is already exceeded`,
      };
    }

    const estimated = estimateTokens(args);
    const limit = spec.constraints?.input_tokens_max;
    if (limit !== undefined && estimated > limit) {
      return {
        ok: false,
        reason: 'input_tokens',
        estimated_tokens: estimated,
        limit,
        message: `Estimated ${estimated} input tokens exceed ${spec.name} limit of ${limit}`,
      };
    }

    const deny = this.policy.checkDenyRules(spec, 'args', { args }, stepId);
    if (deny.violation) {
      return { ok: false, reason: 'deny_if', violation: deny.violation, message: deny.violation.message };
    }

    return { ok: true, estimated_tokens: estimated, predicate_errors: deny.errors };
  }

  /**
   * Whether a tool's declared cost and p50 latency fit the remaining budget.
   */
  estimateFits(spec: ToolSpec): FitResult {
    const remaining = this.tracker.remaining();
    const cost = spec.constraints?.cost_per_call_usd ?? 0;
    const latency = spec.constraints?.latency_p50_ms ?? 0;

    if (remaining.cost_usd !== undefined && cost > remaining.cost_usd) {
      return { fits: false, reason: `over budget: cost ${cost} exceeds remaining ${remaining.cost_usd}` };
    }
    if (remaining.latency_ms !== undefined && latency > remaining.latency_ms) {
      return { fits: false, reason: `over budget: latency ${latency}ms exceeds remaining ${remaining.latency_ms}ms` };
    }
    return { fits: true };
  }
}

/**
 * Sum declared cost and latency over the plan's concrete tool nodes and
 * compare against the plan's signals. Advisory: recorded before the run,
 * never blocks it.
 */
export function checkPlanEstimate(plan: Plan, snapshot: ToolSpecSnapshot): PlanEstimate {
  let cost = 0;
  let latency = 0;
  const unresolved: string[] = [];

  for (const node of plan.nodes) {
    if (!node.tool) continue;
    const tool = snapshot.get(node.tool);
    if (!tool) {
      unresolved.push(node.id);
      continue;
    }
    cost += tool.spec.constraints?.cost_per_call_usd ?? 0;
    latency += tool.spec.constraints?.latency_p50_ms ?? 0;
  }

  const exceeded: BudgetDimension[] = [];
  const cap = plan.signals?.cost_cap_usd;
  const budget = plan.signals?.latency_budget_ms;
  if (cap !== undefined && cost > cap) exceeded.push('cost_usd');
  if (budget !== undefined && latency > budget) exceeded.push('latency_ms');

  return { cost_usd: cost, latency_ms: latency, unresolved, fits: exceeded.length === 0, exceeded };
}
