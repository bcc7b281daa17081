/**
 * Plan Optimizer
 *
 * Groups a validated plan into dependency waves and orders each wave by
 * estimated cost x latency, so cheap fast calls go first and budget
 * overruns surface early. Nodes never cross a wave boundary.
 */

import { SpawnTaskSchema, type PlanNode } from '@mesh-kernel/contracts';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { computeWaves, type DependencyGraph } from '../plan/graph.js';
import { cheapestCandidate } from '../routing/capability-router.js';
import type { ResolvedTool, ToolSpecSnapshot } from '../tools/tool-spec-cache.js';

export interface NodeEstimate {
  cost_usd: number;
  latency_ms: number;
  score: number;
  /** Tool the estimate was taken from, when there is one */
  tool?: string;
}

export interface WaveOrder {
  index: number;
  /** Optimized order */
  nodes: string[];
  /** Declaration order */
  declared: string[];
  reordered: boolean;
  /** Declared-first minus optimized-first estimate; zero when not reordered */
  delta: { cost_usd: number; latency_ms: number };
}

export interface OptimizedPlan {
  waves: WaveOrder[];
  /** Flattened execution order */
  order: string[];
  /** Node id -> position in `order`; lower runs first */
  priority: ReadonlyMap<string, number>;
  estimates: Readonly<Record<string, NodeEstimate>>;
}

const TasksSchema = z.array(SpawnTaskSchema);

function fromTool(tool: ResolvedTool | undefined): NodeEstimate {
  const cost = tool?.spec.constraints?.cost_per_call_usd ?? 0;
  const latency = tool?.spec.constraints?.latency_p50_ms ?? 0;
  return { cost_usd: cost, latency_ms: latency, score: cost * latency, ...(tool && { tool: tool.spec.name }) };
}

function lookup(ref: { tool?: string; capability?: string }, snapshot: ToolSpecSnapshot): ResolvedTool | undefined {
  if (ref.tool) return snapshot.get(ref.tool);
  if (ref.capability) return cheapestCandidate(ref.capability, snapshot);
  return undefined;
}

export function estimateNode(node: PlanNode, snapshot: ToolSpecSnapshot): NodeEstimate {
  if (node.op === 'spawn') {
    const tasks = TasksSchema.safeParse(node.args?.['tasks']);
    if (!tasks.success) return { cost_usd: 0, latency_ms: 0, score: 0 };
    let cost = 0;
    let latency = 0;
    for (const task of tasks.data) {
      const estimate = fromTool(lookup(task, snapshot));
      cost += estimate.cost_usd;
      // Tasks run side by side
      latency = Math.max(latency, estimate.latency_ms);
    }
    return { cost_usd: cost, latency_ms: latency, score: cost * latency };
  }
  if (!node.tool && !node.capability) {
    return { cost_usd: 0, latency_ms: 0, score: 0 };
  }
  return fromTool(lookup(node, snapshot));
}

export function optimizePlan(graph: DependencyGraph, snapshot: ToolSpecSnapshot): OptimizedPlan {
  const { waves, cyclic } = computeWaves(graph);
  if (cyclic.length > 0) {
    throw new ValidationError(`Dependency cycle through ${cyclic.join(', ')}`, [
      { path: 'edges', message: `Dependency cycle through ${cyclic.join(', ')}`, code: 'cycle' },
    ]);
  }

  const estimates: Record<string, NodeEstimate> = {};
  const declaredIndex = new Map(graph.nodeIds.map((id, index) => [id, index]));
  for (const id of graph.nodeIds) {
    const node = graph.nodes.get(id);
    estimates[id] = node ? estimateNode(node, snapshot) : { cost_usd: 0, latency_ms: 0, score: 0 };
  }

  const scoreOf = (id: string): number => estimates[id]?.score ?? 0;
  const orders: WaveOrder[] = waves.map((declared, index) => {
    const nodes = [...declared].sort(
      (a, b) => scoreOf(a) - scoreOf(b) || (declaredIndex.get(a) ?? 0) - (declaredIndex.get(b) ?? 0)
    );
    const reordered = nodes.some((id, position) => id !== declared[position]);
    const declaredFirst = estimates[declared[0] ?? ''];
    const optimizedFirst = estimates[nodes[0] ?? ''];
    const delta =
      reordered && declaredFirst && optimizedFirst
        ? {
            cost_usd: declaredFirst.cost_usd - optimizedFirst.cost_usd,
            latency_ms: declaredFirst.latency_ms - optimizedFirst.latency_ms,
          }
        : { cost_usd: 0, latency_ms: 0 };
    return { index, nodes, declared, reordered, delta };
  });

  const order = orders.flatMap((wave) => wave.nodes);
  return {
    waves: orders,
    order,
    priority: new Map(order.map((id, position) => [id, position])),
    estimates,
  };
}
