/**
 * Plan ingestion: parse into the strict Plan IR, then check everything that
 * needs the whole plan. A plan that fails here is never scheduled.
 */

import {
  OPERATIONS,
  PlanSchema,
  SpawnJoinSchema,
  SpawnTaskSchema,
  isToolOperation,
  validateSchema,
  type Plan,
  type ValidationIssue,
} from '@mesh-kernel/contracts';
import { z } from 'zod';
import { ConditionError, ValidationError } from '../errors.js';
import { buildDependencyGraph, computeWaves, nodeReferences, type DependencyGraph } from './graph.js';
import { conditionReferences, parseCondition } from './conditions.js';
import { isReference, parsePath, parseReference } from './variables.js';

export interface PlanValidationOptions {
  /** Names of input variables supplied at run start */
  inputs?: Iterable<string>;
  /** Registered tool names; unchecked when omitted */
  knownTools?: ReadonlySet<string>;
  /** Registered capability tags; unchecked when omitted */
  knownCapabilities?: ReadonlySet<string>;
}

export interface ValidatedPlan {
  plan: Plan;
  graph: DependencyGraph;
}

const SpawnTasksSchema = z.array(SpawnTaskSchema).min(1);

function issue(path: string, message: string, code = 'invalid_plan'): ValidationIssue {
  return { path, message, code };
}

function malformedReferences(value: unknown, path: string, out: ValidationIssue[]): void {
  if (typeof value === 'string') {
    if (isReference(value) && !parseReference(value)) {
      out.push(issue(path, `Malformed reference "${value}"`, 'invalid_reference'));
    }
  } else if (Array.isArray(value)) {
    value.forEach((item, index) => malformedReferences(item, `${path}.${index}`, out));
  } else if (typeof value === 'object' && value !== null) {
    for (const [key, item] of Object.entries(value)) {
      malformedReferences(item, `${path}.${key}`, out);
    }
  }
}

function checkOperationArgs(plan: Plan, options: PlanValidationOptions, issues: ValidationIssue[]): void {
  plan.nodes.forEach((node, index) => {
    const at = `nodes.${index}`;
    const args = node.args ?? {};

    for (const [key, value] of Object.entries(args)) {
      if (key !== 'condition') malformedReferences(value, `${at}.args.${key}`, issues);
    }
    for (const [name, expression] of Object.entries(node.bind ?? {})) {
      if (!parseReference(expression)) {
        issues.push(issue(`${at}.bind.${name}`, `Bind "${name}" must be a reference, got "${expression}"`, 'invalid_reference'));
      }
    }
    for (const [name, path] of Object.entries(node.out ?? {})) {
      const trimmed = path.startsWith('.') && path !== '.' ? path.slice(1) : path;
      if (!parsePath(trimmed)) {
        issues.push(issue(`${at}.out.${name}`, `Malformed output path "${path}"`));
      }
    }

    const condition = args['condition'];
    if (condition !== undefined) {
      if (typeof condition !== 'string') {
        issues.push(issue(`${at}.args.condition`, 'Condition must be a string'));
      } else {
        try {
          for (const expression of conditionReferences(parseCondition(condition))) {
            if (!parseReference(expression)) {
              issues.push(issue(`${at}.args.condition`, `Malformed reference "${expression}"`, 'invalid_reference'));
            }
          }
        } catch (error) {
          if (!(error instanceof ConditionError)) throw error;
          issues.push(issue(`${at}.args.condition`, error.message, 'invalid_condition'));
        }
      }
    }

    switch (node.op) {
      case 'branch':
        if (condition === undefined) {
          issues.push(issue(`${at}.args.condition`, `Branch ${node.id} requires a condition`));
        }
        break;
      case 'assert':
        if (condition === undefined && args['evidence'] === undefined) {
          issues.push(issue(`${at}.args`, `Assert ${node.id} requires a condition or evidence`));
        }
        break;
      case 'map':
      case 'reduce':
        if (args['items'] === undefined) {
          issues.push(issue(`${at}.args.items`, `${node.op} ${node.id} requires items`));
        }
        break;
      case 'spawn': {
        const tasks = SpawnTasksSchema.safeParse(args['tasks']);
        if (!tasks.success) {
          issues.push(issue(`${at}.args.tasks`, `Spawn ${node.id} requires a list of tasks with a tool or capability each`));
        } else {
          const seen = new Set<string>();
          tasks.data.forEach((task, taskIndex) => {
            if (seen.has(task.id)) {
              issues.push(issue(`${at}.args.tasks.${taskIndex}.id`, `Duplicate spawn task id "${task.id}"`));
            }
            seen.add(task.id);
            if (task.tool && options.knownTools && !options.knownTools.has(task.tool)) {
              issues.push(issue(`${at}.args.tasks.${taskIndex}.tool`, `Unknown tool "${task.tool}"`, 'unknown_tool'));
            }
            if (task.capability && options.knownCapabilities && !options.knownCapabilities.has(task.capability)) {
              issues.push(
                issue(`${at}.args.tasks.${taskIndex}.capability`, `Unknown capability "${task.capability}"`, 'unknown_capability')
              );
            }
          });
        }
        if (args['join'] !== undefined && !SpawnJoinSchema.safeParse(args['join']).success) {
          issues.push(issue(`${at}.args.join`, `Spawn join must be "all" or "first-failure"`));
        }
        break;
      }
      case 'retry': {
        const wraps = args['wraps'] ?? 'call';
        const wrapped = OPERATIONS.find((op) => op === wraps);
        if (!wrapped || wrapped === 'retry' || !isToolOperation(wrapped)) {
          issues.push(issue(`${at}.args.wraps`, `Retry ${node.id} cannot wrap "${String(wraps)}"`));
        }
        break;
      }
      case 'call':
      case 'memory-read':
      case 'memory-write':
      case 'verify':
        break;
    }

    if (node.tool && options.knownTools && !options.knownTools.has(node.tool)) {
      issues.push(issue(`${at}.tool`, `Unknown tool "${node.tool}"`, 'unknown_tool'));
    }
    if (node.capability && options.knownCapabilities && !options.knownCapabilities.has(node.capability)) {
      issues.push(issue(`${at}.capability`, `Unknown capability "${node.capability}"`, 'unknown_capability'));
    }
  });
}

/**
 * Parse then validate a plan. Throws ValidationError listing every issue.
 */
export function validatePlan(input: unknown, options: PlanValidationOptions = {}): ValidatedPlan {
  const parsed = validateSchema(PlanSchema, input);
  if (!parsed.success) {
    throw new ValidationError('Plan does not match the plan schema', parsed.errors);
  }
  const plan = parsed.data;
  const issues: ValidationIssue[] = [];

  const ids = new Set<string>();
  plan.nodes.forEach((node, index) => {
    if (ids.has(node.id)) {
      issues.push(issue(`nodes.${index}.id`, `Duplicate node id "${node.id}"`, 'duplicate_node'));
    }
    ids.add(node.id);
  });

  (plan.edges ?? []).forEach((edge, index) => {
    if (!ids.has(edge.from)) {
      issues.push(issue(`edges.${index}.from`, `Edge references unknown node "${edge.from}"`, 'dangling_edge'));
    }
    if (!ids.has(edge.to)) {
      issues.push(issue(`edges.${index}.to`, `Edge references unknown node "${edge.to}"`, 'dangling_edge'));
    }
    if (edge.from === edge.to) {
      issues.push(issue(`edges.${index}`, `Self edge on "${edge.from}"`, 'cycle'));
    }
    const source = plan.nodes.find((node) => node.id === edge.from);
    if (edge.when !== undefined && source && source.op !== 'branch') {
      issues.push(issue(`edges.${index}.when`, `Edge label "${edge.when}" leaves non-branch node "${edge.from}"`));
    }
  });

  checkOperationArgs(plan, options, issues);

  const graph = buildDependencyGraph(plan);
  const inputs = new Set(options.inputs ?? []);
  plan.nodes.forEach((node, index) => {
    for (const root of nodeReferences(node)) {
      if (!graph.producers.has(root) && !inputs.has(root)) {
        issues.push(
          issue(`nodes.${index}`, `Node ${node.id} references "${root}", which no input or node provides`, 'unknown_variable')
        );
      }
    }
  });

  const { cyclic } = computeWaves(graph);
  if (cyclic.length > 0) {
    issues.push(issue('edges', `Dependency cycle through ${cyclic.join(', ')}`, 'cycle'));
  }

  if (issues.length > 0) {
    throw new ValidationError(`Plan failed validation: ${issues[0]?.message ?? 'unknown issue'}`, issues);
  }

  return { plan, graph };
}
