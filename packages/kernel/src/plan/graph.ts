/**
 * Dependency graph of a plan: explicit edges plus data dependencies implied
 * by argument, bind and condition references to variables other nodes
 * publish.
 */

import type { Edge, Plan, PlanNode } from '@mesh-kernel/contracts';
import { ConditionError } from '../errors.js';
import { conditionReferences, parseCondition } from './conditions.js';
import { collectReferences, parseReference } from './variables.js';

export interface DependencyGraph {
  /** Node ids in declaration order */
  nodeIds: readonly string[];
  nodes: ReadonlyMap<string, PlanNode>;
  dependencies: ReadonlyMap<string, ReadonlySet<string>>;
  dependents: ReadonlyMap<string, ReadonlySet<string>>;
  /** Explicit edges leaving each node */
  outgoing: ReadonlyMap<string, readonly Edge[]>;
  /** Context variable -> nodes that publish it */
  producers: ReadonlyMap<string, readonly string[]>;
}

/**
 * Variables a node publishes: its `out` names, or its own id.
 */
export function publishedVariables(node: PlanNode): string[] {
  const names = Object.keys(node.out ?? {});
  return names.length > 0 ? names : [node.id];
}

export function conditionOf(node: PlanNode): string | undefined {
  const condition = node.args?.['condition'];
  return typeof condition === 'string' ? condition : undefined;
}

/**
 * Root names a node reads from the context. Bind locals are excluded;
 * the references inside the bind expressions themselves are included.
 */
export function nodeReferences(node: PlanNode): Set<string> {
  const locals = new Set(Object.keys(node.bind ?? {}));
  const roots = new Set<string>();

  const valueArgs = Object.entries(node.args ?? {})
    .filter(([key]) => key !== 'condition')
    .map(([, value]) => value);
  for (const root of collectReferences(valueArgs)) {
    if (!locals.has(root)) roots.add(root);
  }

  const condition = conditionOf(node);
  if (condition !== undefined) {
    try {
      for (const expression of conditionReferences(parseCondition(condition))) {
        const parsed = parseReference(expression);
        if (parsed && !locals.has(parsed.root)) roots.add(parsed.root);
      }
    } catch (error) {
      // Reported by the validator; the graph just has no edge for it
      if (!(error instanceof ConditionError)) throw error;
    }
  }

  for (const expression of Object.values(node.bind ?? {})) {
    const parsed = parseReference(expression);
    if (parsed) roots.add(parsed.root);
  }

  return roots;
}

export function buildDependencyGraph(plan: Plan): DependencyGraph {
  const nodes = new Map<string, PlanNode>();
  for (const node of plan.nodes) {
    if (!nodes.has(node.id)) nodes.set(node.id, node);
  }
  const nodeIds = Array.from(nodes.keys());

  const producers = new Map<string, string[]>();
  for (const node of nodes.values()) {
    for (const name of publishedVariables(node)) {
      const list = producers.get(name) ?? [];
      list.push(node.id);
      producers.set(name, list);
    }
  }

  const dependencies = new Map<string, Set<string>>(nodeIds.map((id) => [id, new Set<string>()]));
  const dependents = new Map<string, Set<string>>(nodeIds.map((id) => [id, new Set<string>()]));
  const outgoing = new Map<string, Edge[]>(nodeIds.map((id) => [id, []]));

  const link = (from: string, to: string): void => {
    if (from === to) return;
    dependencies.get(to)?.add(from);
    dependents.get(from)?.add(to);
  };

  for (const edge of plan.edges ?? []) {
    if (!nodes.has(edge.from) || !nodes.has(edge.to)) continue;
    outgoing.get(edge.from)?.push(edge);
    link(edge.from, edge.to);
  }

  for (const node of nodes.values()) {
    for (const root of nodeReferences(node)) {
      for (const producer of producers.get(root) ?? []) {
        link(producer, node.id);
      }
    }
  }

  return { nodeIds, nodes, dependencies, dependents, outgoing, producers };
}

/**
 * Kahn-style grouping into waves. A node lands in the first wave after all
 * of its dependencies. Nodes left over sit on or behind a cycle.
 */
export function computeWaves(graph: DependencyGraph): { waves: string[][]; cyclic: string[] } {
  const remaining = new Map<string, number>();
  for (const id of graph.nodeIds) {
    remaining.set(id, graph.dependencies.get(id)?.size ?? 0);
  }

  const waves: string[][] = [];
  let current = graph.nodeIds.filter((id) => remaining.get(id) === 0);
  const placed = new Set<string>();

  while (current.length > 0) {
    waves.push(current);
    for (const id of current) placed.add(id);
    const next: string[] = [];
    for (const id of current) {
      for (const dependent of graph.dependents.get(id) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        if (left === 0) next.push(dependent);
      }
    }
    // Keep declaration order inside a wave
    current = graph.nodeIds.filter((id) => next.includes(id));
  }

  return { waves, cyclic: graph.nodeIds.filter((id) => !placed.has(id)) };
}
