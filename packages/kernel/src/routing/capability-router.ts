/**
 * Capability Router
 *
 * Picks one concrete tool for a capability tag: filter by tag, drop what
 * does not fit the remaining budget, then cheapest, fastest, earliest
 * registered. Deterministic for a given snapshot and remaining budget.
 */

import { RoutingError } from '../errors.js';
import type { FitResult } from '../budget/constraint-checker.js';
import type { ResolvedTool, ToolSpecSnapshot } from '../tools/tool-spec-cache.js';
import type { ToolSpec } from '@mesh-kernel/contracts';

export interface RouteRejection {
  tool: string;
  reason: string;
}

export interface RouteDecision {
  capability: string;
  selected: ResolvedTool;
  /** Every tool advertising the capability, in registration order */
  candidates: string[];
  rejected: RouteRejection[];
}

export type BudgetFit = (spec: ToolSpec) => FitResult;

function costOf(tool: ResolvedTool): number {
  return tool.spec.constraints?.cost_per_call_usd ?? 0;
}

function latencyOf(tool: ResolvedTool): number {
  return tool.spec.constraints?.latency_p50_ms ?? 0;
}

function compareTools(a: ResolvedTool, b: ResolvedTool): number {
  return costOf(a) - costOf(b) || latencyOf(a) - latencyOf(b) || a.registrationIndex - b.registrationIndex;
}

/**
 * Why `loser` ranked behind `winner`.
 */
function rankingReason(winner: ResolvedTool, loser: ResolvedTool): string {
  if (costOf(loser) > costOf(winner)) return 'cost too high';
  if (latencyOf(loser) > latencyOf(winner)) return 'latency too high';
  return 'registered later';
}

export function routeCapability(capability: string, snapshot: ToolSpecSnapshot, fits: BudgetFit): RouteDecision {
  const matching = snapshot.withCapability(capability);
  const rejected: RouteRejection[] = [];
  const eligible: ResolvedTool[] = [];

  for (const tool of matching) {
    const fit = fits(tool.spec);
    if (fit.fits) {
      eligible.push(tool);
    } else {
      rejected.push({ tool: tool.spec.name, reason: fit.reason });
    }
  }

  const ranked = [...eligible].sort(compareTools);
  const [selected, ...rest] = ranked;
  if (!selected) {
    throw new RoutingError(capability, rejected);
  }

  for (const tool of rest) {
    rejected.push({ tool: tool.spec.name, reason: rankingReason(selected, tool) });
  }

  return {
    capability,
    selected,
    candidates: matching.map((tool) => tool.spec.name),
    rejected,
  };
}

/**
 * Cheapest declared candidate for a capability, ignoring budget. Used for
 * estimates before a run starts.
 */
export function cheapestCandidate(capability: string, snapshot: ToolSpecSnapshot): ResolvedTool | undefined {
  return [...snapshot.withCapability(capability)].sort(compareTools)[0];
}
