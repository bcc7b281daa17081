/**
 * Budget Tracker
 *
 * Single source of truth for what a run has consumed. `record` is one
 * synchronous step, so completions that land on the event loop back to back
 * cannot lose updates; totals only ever grow.
 */

import type { Signals, Telemetry } from '@mesh-kernel/contracts';
import type { BudgetDimension } from '../errors.js';

export interface Usage {
  cost_usd?: number;
  latency_ms?: number;
  tokens_in?: number;
  tokens_out?: number;
}

export type BudgetLimits = Partial<Record<BudgetDimension, number>>;

export type BudgetCheck =
  | { ok: true }
  | { ok: false; dimension: BudgetDimension; limit: number; actual: number; over_by: number };

export interface BudgetSummary {
  totals: Telemetry;
  limits: BudgetLimits;
  remaining: BudgetLimits;
}

const DIMENSIONS: readonly BudgetDimension[] = ['cost_usd', 'latency_ms'];

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

export function limitsFromSignals(signals: Signals | undefined): BudgetLimits {
  const limits: BudgetLimits = {};
  if (signals?.cost_cap_usd !== undefined) limits.cost_usd = signals.cost_cap_usd;
  if (signals?.latency_budget_ms !== undefined) limits.latency_ms = signals.latency_budget_ms;
  return limits;
}

export class BudgetTracker {
  private readonly telemetry: Telemetry = {
    cost_usd: 0,
    latency_ms: 0,
    tokens_in: 0,
    tokens_out: 0,
    invocations: 0,
  };

  constructor(readonly limits: BudgetLimits = {}) {}

  static fromSignals(signals: Signals | undefined): BudgetTracker {
    return new BudgetTracker(limitsFromSignals(signals));
  }

  /**
   * Add one invocation's usage. Negative or non-finite values count as zero.
   */
  record(usage: Usage): Telemetry {
    this.telemetry.cost_usd += nonNegative(usage.cost_usd);
    this.telemetry.latency_ms += nonNegative(usage.latency_ms);
    this.telemetry.tokens_in += Math.round(nonNegative(usage.tokens_in));
    this.telemetry.tokens_out += Math.round(nonNegative(usage.tokens_out));
    this.telemetry.invocations += 1;
    return this.totals();
  }

  totals(): Telemetry {
    return { ...this.telemetry };
  }

  /**
   * First capped dimension whose total exceeds its limit.
   */
  check(): BudgetCheck {
    for (const dimension of DIMENSIONS) {
      const limit = this.limits[dimension];
      const actual = this.telemetry[dimension];
      if (limit !== undefined && actual > limit) {
        return { ok: false, dimension, limit, actual, over_by: actual - limit };
      }
    }
    return { ok: true };
  }

  /** Headroom per capped dimension, never below zero */
  remaining(): BudgetLimits {
    const remaining: BudgetLimits = {};
    for (const dimension of DIMENSIONS) {
      const limit = this.limits[dimension];
      if (limit !== undefined) {
        remaining[dimension] = Math.max(0, limit - this.telemetry[dimension]);
      }
    }
    return remaining;
  }

  /**
   * A capped dimension already past its limit; nothing more may be spent.
   * Spending exactly up to a cap leaves the budget open.
   */
  exhausted(): BudgetDimension | undefined {
    const check = this.check();
    return check.ok ? undefined : check.dimension;
  }

  summary(): BudgetSummary {
    return { totals: this.totals(), limits: { ...this.limits }, remaining: this.remaining() };
  }
}
