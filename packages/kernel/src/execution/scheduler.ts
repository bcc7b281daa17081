/**
 * Scheduler
 *
 * Drives a validated, optimized plan to completion or to a reported
 * failure. Ready nodes are admitted in optimizer priority order up to
 * `maxConcurrency`; a node starts as soon as its own dependencies settle.
 *
 * Per tool invocation: route -> pre-flight -> invoke -> budget record and
 * overrun check -> evidence/policy -> trace -> bind.
 */

import {
  EvidenceSchema,
  EvidenceSummarySchema,
  OPERATIONS,
  PLAN_STEP_ID,
  RESERVED_ARGS,
  SpawnTaskSchema,
  isToolOperation,
  type ErrorInfo,
  type Evidence,
  type EvidenceSummary,
  type Operation,
  type Plan,
  type PlanNode,
  type PolicyViolationRecord,
  type RunResult,
  type SpawnTask,
  type ToolInvokeResponse,
} from '@mesh-kernel/contracts';
import { z } from 'zod';
import { checkPlanEstimate, ConstraintChecker, type PreflightResult } from '../budget/constraint-checker.js';
import type { KernelConfig } from '../config/index.js';
import {
  ArgumentResolutionError,
  AssertionFailed,
  BudgetExceeded,
  ConstraintViolation,
  EvidenceBelowThreshold,
  KernelError,
  PolicyViolationError,
  ToolInvocationError,
  toErrorInfo,
} from '../errors.js';
import { summarizeEvidence } from '../policy/evidence.js';
import { citationsOf, PolicyEngine } from '../policy/policy-engine.js';
import { assertWriteStored, buildWriteRequest, readKey, readValue, writeArgs } from '../memory/memory-ops.js';
import type { OptimizedPlan } from '../optimizer/plan-optimizer.js';
import { evaluateCondition, testCondition } from '../plan/conditions.js';
import type { DependencyGraph } from '../plan/graph.js';
import {
  resolveArgs,
  resolveBindings,
  resolveValue,
  selectOutput,
  type ResolutionScope,
} from '../plan/variables.js';
import { routeCapability } from '../routing/capability-router.js';
import { Semaphore } from '../shared/concurrency.js';
import { errorFields, silentLogger, type Logger } from '../shared/logger.js';
import { estimateTokens, isRecord, isRetryableError, sleep as defaultSleep } from '../shared/utils.js';
import type { ToolClient } from '../tools/tool-client.js';
import type { ResolvedTool } from '../tools/tool-spec-cache.js';
import type { ExecutionContext, RunConclusion } from './execution-context.js';
import { NO_RETRY, retryPolicyFromArgs, withRetry, type RetryPolicy } from './retry.js';

export interface SchedulerOptions {
  client: ToolClient;
  config: KernelConfig;
  policy?: PolicyEngine;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface RunState {
  ctx: ExecutionContext;
  plan: Plan;
  graph: DependencyGraph;
  optimized: OptimizedPlan;
  checker: ConstraintChecker;
  logger: Logger;
  fatal?: RunConclusion;
  firstFailure?: ErrorInfo & { node_id: string };
  /** Targets of branch edges that were not taken */
  unchosen: Set<string>;
  /** Nodes admitted so far, for max_nodes */
  started: number;
  budgetReported: boolean;
  /** Work still running after its node settled (spawn first-failure siblings) */
  detached: Set<Promise<unknown>>;
}

interface NodeExecution {
  node: PlanNode;
  stepId: string;
  scope: ResolutionScope;
  retry: RetryPolicy;
}

interface Invocation {
  tool: ResolvedTool;
  response: ToolInvokeResponse;
  result: unknown;
}

type ToolTarget = Pick<SpawnTask, 'tool' | 'capability'>;

const RESERVED: ReadonlySet<string> = new Set(RESERVED_ARGS);
const SpawnTasksSchema = z.array(SpawnTaskSchema);

function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${JSON.stringify(value)}`);
}

function withoutReserved(args: Record<string, unknown> | undefined): Record<string, unknown> {
  const forwarded: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args ?? {})) {
    if (!RESERVED.has(key)) forwarded[key] = value;
  }
  return forwarded;
}

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function branchLabel(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

export class Scheduler {
  private readonly client: ToolClient;
  private readonly config: KernelConfig;
  private readonly policy: PolicyEngine;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SchedulerOptions) {
    this.client = options.client;
    this.config = options.config;
    this.policy = options.policy ?? new PolicyEngine();
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(
    ctx: ExecutionContext,
    plan: Plan,
    graph: DependencyGraph,
    optimized: OptimizedPlan
  ): Promise<RunResult> {
    const run: RunState = {
      ctx,
      plan,
      graph,
      optimized,
      checker: new ConstraintChecker(ctx.budget, this.policy),
      logger: this.logger.child({ plan_id: ctx.planId }),
      unchosen: new Set(),
      started: 0,
      budgetReported: false,
      detached: new Set(),
    };

    run.logger.info({ nodes: graph.nodeIds.length, waves: optimized.waves.length }, 'Run started');
    this.emitPlanRecords(run);

    const inFlight = new Map<string, Promise<void>>();
    this.refreshReadiness(run);
    for (;;) {
      if (!run.fatal) this.admit(run, inFlight);
      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
      this.refreshReadiness(run);
    }
    await Promise.all(run.detached);
    this.skipRemaining(run);

    const conclusion = this.conclude(run);
    const summary = ctx.budget.summary();
    ctx.trace.emit({
      step_id: PLAN_STEP_ID,
      event_type: 'constraint-check',
      cost_usd: summary.totals.cost_usd,
      tokens_in: summary.totals.tokens_in,
      tokens_out: summary.totals.tokens_out,
      data: {
        kind: 'budget_summary',
        totals: summary.totals,
        limits: summary.limits,
        remaining: summary.remaining,
        status: conclusion.status,
        ...(conclusion.haltReason && { halt_reason: conclusion.haltReason }),
      },
    });

    const logFields = { status: conclusion.status, halt_reason: conclusion.haltReason, telemetry: summary.totals };
    if (conclusion.status === 'completed') {
      run.logger.info(logFields, 'Run finished');
    } else {
      run.logger.warn({ ...logFields, failure: conclusion.failure }, 'Run did not complete');
    }
    return ctx.finalize(conclusion);
  }

  // ==========================================================================
  // Control loop
  // ==========================================================================

  private emitPlanRecords(run: RunState): void {
    const { ctx, optimized } = run;
    for (const wave of optimized.waves) {
      const estimates: Record<string, unknown> = {};
      for (const id of wave.nodes) estimates[id] = optimized.estimates[id];
      ctx.trace.emit({
        step_id: PLAN_STEP_ID,
        event_type: 'plan-optimizer',
        data: { kind: 'wave_order', wave: wave.index, nodes: wave.nodes, estimates },
      });
      if (wave.reordered) {
        ctx.trace.emit({
          step_id: PLAN_STEP_ID,
          event_type: 'plan-optimizer',
          data: {
            kind: 'reorder',
            wave: wave.index,
            declared: wave.declared,
            ordered: wave.nodes,
            rationale: 'ascending estimated cost x latency',
            delta: wave.delta,
          },
        });
      }
    }

    const estimate = checkPlanEstimate(run.plan, ctx.snapshot);
    ctx.trace.emit({
      step_id: PLAN_STEP_ID,
      event_type: 'constraint-check',
      data: { kind: 'plan_estimate', ...estimate },
    });
    if (!estimate.fits) {
      run.logger.warn({ estimate }, 'Declared tool costs exceed the plan budget');
    }
  }

  private admit(run: RunState, inFlight: Map<string, Promise<void>>): void {
    const priority = run.optimized.priority;
    const ready = run.ctx
      .nodesIn('ready')
      .sort((a, b) => (priority.get(a) ?? Infinity) - (priority.get(b) ?? Infinity));

    for (const id of ready) {
      if (inFlight.size >= this.config.maxConcurrency) break;

      const maxNodes = run.plan.stop_conditions?.max_nodes;
      if (maxNodes !== undefined && run.started >= maxNodes) {
        run.ctx.trace.emit({
          step_id: PLAN_STEP_ID,
          event_type: 'constraint-check',
          data: { kind: 'max_nodes', max_nodes: maxNodes, started: run.started },
        });
        this.setFatal(run, { status: 'halted', haltReason: 'max_nodes' });
        break;
      }

      run.started += 1;
      const task = this.runNode(run, id).finally(() => {
        inFlight.delete(id);
      });
      inFlight.set(id, task);
    }
  }

  /**
   * Move pending nodes whose dependencies have all settled to ready, or
   * to skipped when a branch passed them by, a dependency failed, or every
   * dependency was skipped. Repeats until nothing changes, since a skip can
   * settle further nodes.
   */
  private refreshReadiness(run: RunState): void {
    const { ctx, graph } = run;
    let changed = true;
    while (changed) {
      changed = false;
      for (const id of graph.nodeIds) {
        if (ctx.status(id) !== 'pending') continue;
        const deps = Array.from(graph.dependencies.get(id) ?? []);
        const statuses = deps.map((dep) => ctx.status(dep));
        if (statuses.some((s) => s === 'pending' || s === 'ready' || s === 'running')) continue;

        let reason: string | undefined;
        if (run.unchosen.has(id)) reason = 'branch not taken';
        else if (statuses.includes('failed')) reason = 'dependency failed';
        else if (deps.length > 0 && !statuses.includes('completed')) reason = 'all dependencies skipped';

        if (reason) {
          this.skipNode(run, id, reason);
          changed = true;
        } else if (!run.fatal) {
          ctx.markReady(id);
        }
      }
    }
  }

  private skipRemaining(run: RunState): void {
    const reason = run.fatal ? `run ${run.fatal.status}` : 'not reached';
    for (const id of run.graph.nodeIds) {
      const status = run.ctx.status(id);
      if (status === 'pending' || status === 'ready') this.skipNode(run, id, reason);
    }
  }

  private skipNode(run: RunState, id: string, reason: string): void {
    run.ctx.skip(id, reason);
    run.ctx.trace.emit({ step_id: id, event_type: 'step-end', data: { status: 'skipped', reason } });
    run.logger.debug({ node_id: id, reason }, 'Node skipped');
  }

  private setFatal(run: RunState, conclusion: RunConclusion): void {
    if (run.fatal) return;
    run.fatal = conclusion;
    run.logger.warn(
      { status: conclusion.status, halt_reason: conclusion.haltReason, failure: conclusion.failure },
      'Run stopping: no further nodes will be admitted'
    );
  }

  private conclude(run: RunState): RunConclusion {
    if (run.fatal) {
      return {
        ...run.fatal,
        ...(!run.fatal.failure && run.firstFailure && { failure: run.firstFailure }),
      };
    }
    if (run.firstFailure) {
      return { status: 'failed', failure: run.firstFailure };
    }
    return { status: 'completed' };
  }

  // ==========================================================================
  // Node lifecycle
  // ==========================================================================

  private async runNode(run: RunState, id: string): Promise<void> {
    const node = run.graph.nodes.get(id);
    if (!node) {
      throw new Error(`Node ${id} missing from dependency graph`);
    }

    run.ctx.markRunning(id);
    run.ctx.trace.emit({ step_id: id, event_type: 'step-start', data: { op: node.op } });
    run.logger.debug({ node_id: id, op: node.op }, 'Node started');

    try {
      const scope = this.scopeFor(run, node);
      const exec: NodeExecution = { node, stepId: id, scope, retry: this.retryPolicyFor(node, scope) };
      const output = await this.dispatch(run, exec, node.op);
      this.bindOutputs(run, node, output);
      run.ctx.complete(id);
      run.ctx.trace.emit({ step_id: id, event_type: 'step-end', data: { status: 'completed' } });
      run.logger.debug({ node_id: id }, 'Node completed');
    } catch (error) {
      this.failNode(run, node, error);
    }
  }

  private failNode(run: RunState, node: PlanNode, error: unknown): void {
    const info = toErrorInfo(error);
    run.ctx.fail(node.id, info);
    run.ctx.trace.emit({ step_id: node.id, event_type: 'step-end', data: { status: 'failed', error: info } });

    if (error instanceof KernelError) {
      run.logger.warn({ node_id: node.id, code: info.code, message: info.message }, 'Node failed');
    } else {
      run.logger.error({ node_id: node.id, ...errorFields(error) }, 'Node failed with an unexpected error');
    }

    const failure = { node_id: node.id, ...info };
    run.firstFailure ??= failure;

    if (error instanceof KernelError && error.scope === 'run') {
      if (error instanceof BudgetExceeded) {
        this.setFatal(run, { status: 'halted', haltReason: 'budget_exceeded', failure });
      } else if (error instanceof PolicyViolationError) {
        this.setFatal(run, { status: 'halted', haltReason: 'policy_violation', failure });
      } else {
        this.setFatal(run, { status: 'failed', failure });
      }
    }
  }

  private scopeFor(run: RunState, node: PlanNode): ResolutionScope {
    const base: ResolutionScope = { variables: run.ctx.variableMap, nodeId: node.id };
    return { ...base, locals: resolveBindings(node.bind, base) };
  }

  private retryPolicyFor(node: PlanNode, scope: ResolutionScope): RetryPolicy {
    const args = node.args ?? {};
    const defaults: RetryPolicy = {
      maxAttempts: this.config.retry.maxAttempts,
      backoffMs: this.config.retry.backoffMs,
      multiplier: this.config.retry.backoffMultiplier,
    };
    if (node.op !== 'retry' && args['max_attempts'] === undefined) return NO_RETRY;
    return retryPolicyFromArgs(
      resolveArgs(
        {
          max_attempts: args['max_attempts'],
          backoff_ms: args['backoff_ms'],
          backoff_multiplier: args['backoff_multiplier'],
        },
        scope
      ),
      defaults
    );
  }

  private bindOutputs(run: RunState, node: PlanNode, output: unknown): void {
    const out = Object.entries(node.out ?? {});
    if (out.length === 0) {
      run.ctx.bind(node.id, output);
      return;
    }
    const selected = out.map(([name, path]) => [name, selectOutput(output, path, node.id)] as const);
    for (const [name, value] of selected) run.ctx.bind(name, value);
  }

  private dispatch(run: RunState, exec: NodeExecution, op: Operation): Promise<unknown> {
    switch (op) {
      case 'call':
        return this.runCall(run, exec);
      case 'map':
        return this.runMap(run, exec);
      case 'reduce':
        return this.runReduce(run, exec);
      case 'branch':
        return Promise.resolve(this.runBranch(run, exec));
      case 'assert':
        return Promise.resolve(this.runAssert(run, exec));
      case 'spawn':
        return this.runSpawn(run, exec);
      case 'memory-read':
        return this.runMemoryRead(run, exec);
      case 'memory-write':
        return this.runMemoryWrite(run, exec);
      case 'verify':
        return this.runVerify(run, exec);
      case 'retry':
        return this.runRetry(run, exec);
      default:
        return assertNever(op);
    }
  }

  // ==========================================================================
  // Operation handlers
  // ==========================================================================

  private async runCall(run: RunState, exec: NodeExecution): Promise<unknown> {
    const args = resolveArgs(withoutReserved(exec.node.args), exec.scope);
    const tool = this.route(run, exec, exec.node, exec.stepId);
    return (await this.invoke(run, exec, tool, args, exec.stepId)).result;
  }

  private async runMap(run: RunState, exec: NodeExecution): Promise<unknown[]> {
    const items = this.resolveItems(exec);
    const base = resolveArgs(withoutReserved(exec.node.args), exec.scope);
    const tool = this.route(run, exec, exec.node, exec.stepId);
    const results: unknown[] = new Array<unknown>(items.length).fill(null);
    const semaphore = new Semaphore(this.config.mapConcurrency);
    let firstError: { error: unknown } | undefined;

    await Promise.all(
      items.map((item, index) =>
        semaphore.run(async () => {
          if (firstError) return;
          try {
            const invocation = await this.invoke(run, exec, tool, { ...base, item, index }, `${exec.stepId}/${index}`);
            results[index] = invocation.result;
          } catch (error) {
            firstError ??= { error };
          }
        })
      )
    );

    if (firstError) throw firstError.error;
    return results;
  }

  private async runReduce(run: RunState, exec: NodeExecution): Promise<unknown> {
    const items = this.resolveItems(exec);
    const args = { ...resolveArgs(withoutReserved(exec.node.args), exec.scope), items };
    const tool = this.route(run, exec, exec.node, exec.stepId);
    return (await this.invoke(run, exec, tool, args, exec.stepId)).result;
  }

  private runBranch(run: RunState, exec: NodeExecution): { label: string } {
    const condition = exec.node.args?.['condition'];
    if (typeof condition !== 'string') {
      throw new ArgumentResolutionError('Branch requires a string condition', 'args.condition', exec.node.id);
    }
    const label = branchLabel(evaluateCondition(condition, exec.scope));

    const labelled = (run.graph.outgoing.get(exec.node.id) ?? []).filter((edge) => edge.when !== undefined);
    let chosen = labelled.filter((edge) => edge.when === label);
    if (chosen.length === 0) chosen = labelled.filter((edge) => edge.when === 'default');
    const taken = new Set(chosen.map((edge) => edge.to));
    for (const edge of labelled) {
      if (!taken.has(edge.to)) run.unchosen.add(edge.to);
    }

    run.logger.debug({ node_id: exec.node.id, label, taken: Array.from(taken) }, 'Branch evaluated');
    return { label };
  }

  private runAssert(run: RunState, exec: NodeExecution): { passed: true } {
    const { node, scope } = exec;
    const args = node.args ?? {};

    const condition = args['condition'];
    if (typeof condition === 'string' && !testCondition(condition, scope)) {
      const message = resolveValue(args['message'], scope);
      throw new AssertionFailed(typeof message === 'string' ? message : `Assertion failed: ${condition}`);
    }

    if (args['evidence'] !== undefined) {
      const summary = this.summaryFrom(resolveValue(args['evidence'], scope), node.id);
      const threshold =
        numberOrUndefined(resolveValue(args['min_confidence'], scope)) ?? run.plan.stop_conditions?.min_confidence;
      this.gate(run, exec.stepId, summary, threshold);
    }

    if (resolveValue(args['require_attribution'], scope) === true) {
      const upstream = run.graph.dependencies.get(node.id) ?? new Set<string>();
      const missing = run.ctx.violationsFor(upstream).filter((v) => v.kind === 'citation_required');
      if (missing.length > 0) {
        const violation: PolicyViolationRecord = {
          kind: 'citation_required',
          severity: 'run',
          step_id: exec.stepId,
          message: `Attribution required but ${missing.length} upstream invocation(s) returned no citations`,
          details: { steps: missing.map((v) => v.step_id) },
        };
        this.recordViolation(run, violation);
        throw new AssertionFailed(violation.message);
      }
    }

    return { passed: true };
  }

  private async runSpawn(run: RunState, exec: NodeExecution): Promise<Record<string, unknown>> {
    const { node } = exec;
    const parsed = SpawnTasksSchema.safeParse(node.args?.['tasks']);
    if (!parsed.success) {
      throw new ArgumentResolutionError('Spawn requires a list of tasks', 'args.tasks', node.id);
    }
    const join = node.args?.['join'] === 'first-failure' ? 'first-failure' : 'all';
    const semaphore = new Semaphore(this.config.mapConcurrency);
    const results: Record<string, unknown> = {};

    const runTask = (task: SpawnTask): Promise<void> =>
      semaphore.run(async () => {
        const stepId = `${node.id}/${task.id}`;
        run.ctx.trace.emit({ step_id: stepId, event_type: 'step-start', data: { op: 'spawn-task', task: task.id } });
        try {
          const args = resolveArgs(withoutReserved(task.args), exec.scope);
          const tool = this.route(run, exec, task, stepId);
          const invocation = await this.invoke(run, exec, tool, args, stepId);
          results[task.id] = invocation.result;
          run.ctx.trace.emit({
            step_id: stepId,
            event_type: 'step-end',
            data: { status: 'completed', tool: tool.spec.name },
          });
        } catch (error) {
          run.ctx.trace.emit({
            step_id: stepId,
            event_type: 'step-end',
            data: { status: 'failed', error: toErrorInfo(error) },
          });
          throw error;
        }
      });

    const tasks = parsed.data.map((task) => runTask(task));
    if (join === 'first-failure') {
      // Siblings keep running after the first failure; the run waits for
      // them before it finalizes so their records land in the trace.
      run.detached.add(Promise.allSettled(tasks));
      await Promise.all(tasks);
      return results;
    }

    const settled = await Promise.allSettled(tasks);
    const failed = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failed) throw failed.reason;
    return results;
  }

  private async runMemoryRead(run: RunState, exec: NodeExecution): Promise<unknown> {
    const args = resolveArgs(withoutReserved(exec.node.args), exec.scope);
    const key = readKey(args, exec.node.id);
    const tool = this.route(run, exec, exec.node, exec.stepId);
    const invocation = await this.invoke(run, exec, tool, { ...args, operation: 'read', key }, exec.stepId);
    const { found, value } = readValue(invocation.result);
    run.ctx.trace.emit({
      step_id: exec.stepId,
      event_type: 'memory-op',
      data: { operation: 'read', key, found, tool: tool.spec.name },
    });
    return value;
  }

  private async runMemoryWrite(run: RunState, exec: NodeExecution): Promise<unknown> {
    const { node, scope, stepId } = exec;
    const request = buildWriteRequest(resolveArgs(withoutReserved(node.args), scope), node.id);
    const evidenceArg = node.args?.['evidence'];
    const evidence = evidenceArg === undefined ? undefined : this.evidenceFrom(resolveValue(evidenceArg, scope), node.id);

    const violations = this.policy.checkMemoryWrite(request, stepId, evidence);
    if (violations.length > 0) {
      for (const violation of violations) this.recordViolation(run, violation);
      run.ctx.trace.emit({
        step_id: stepId,
        event_type: 'memory-op',
        data: {
          kind: 'memory_write_rejected',
          operation: 'write',
          key: request.key,
          accepted: false,
          violations: violations.map((v) => v.kind),
        },
      });
      run.logger.info({ node_id: node.id, key: request.key, violations: violations.map((v) => v.kind) }, 'Memory write rejected');
      return {
        accepted: false,
        violations: violations.map((v) => ({ kind: v.kind, message: v.message })),
      };
    }

    const tool = this.route(run, exec, node, stepId);
    const invocation = await this.invoke(run, exec, tool, writeArgs(request), stepId);
    assertWriteStored(invocation.result, tool.spec.name);
    run.ctx.trace.emit({
      step_id: stepId,
      event_type: 'memory-op',
      data: { operation: 'write', key: request.key, accepted: true, tool: tool.spec.name },
    });
    return { accepted: true, key: request.key };
  }

  private async runVerify(run: RunState, exec: NodeExecution): Promise<{ evidence: Evidence; summary: EvidenceSummary }> {
    const args = resolveArgs(withoutReserved(exec.node.args), exec.scope);
    const tool = this.route(run, exec, exec.node, exec.stepId);
    const invocation = await this.invoke(run, exec, tool, args, exec.stepId);

    const evidence = EvidenceSchema.safeParse(invocation.result);
    if (!evidence.success) {
      throw new ToolInvocationError(`Tool ${tool.spec.name} returned malformed evidence`, tool.spec.name, false);
    }
    const summary = summarizeEvidence(evidence.data);
    const threshold =
      numberOrUndefined(resolveValue(exec.node.args?.['min_confidence'], exec.scope)) ??
      run.plan.stop_conditions?.min_confidence;
    this.gate(run, exec.stepId, summary, threshold);
    return { evidence: evidence.data, summary };
  }

  private runRetry(run: RunState, exec: NodeExecution): Promise<unknown> {
    const wraps = exec.node.args?.['wraps'] ?? 'call';
    const wrapped = OPERATIONS.find((op) => op === wraps);
    if (!wrapped || wrapped === 'retry' || !isToolOperation(wrapped)) {
      throw new ArgumentResolutionError(`Retry cannot wrap "${String(wraps)}"`, 'args.wraps', exec.node.id);
    }
    return this.dispatch(run, exec, wrapped);
  }

  // ==========================================================================
  // Invocation pipeline
  // ==========================================================================

  private route(run: RunState, exec: NodeExecution, target: ToolTarget, stepId: string): ResolvedTool {
    const { ctx } = run;
    if (target.tool) {
      const tool = ctx.snapshot.get(target.tool);
      if (!tool) {
        throw new ToolInvocationError(`Tool ${target.tool} is not registered`, target.tool, false);
      }
      if (stepId === exec.node.id) ctx.setTool(exec.node.id, tool.spec.name);
      return tool;
    }

    const capability = target.capability ?? '';
    try {
      const decision = routeCapability(capability, ctx.snapshot, (spec) => run.checker.estimateFits(spec));
      ctx.trace.emit({
        step_id: stepId,
        event_type: 'capability-route',
        data: {
          capability,
          selected: decision.selected.spec.name,
          candidates: decision.candidates,
          rejected: decision.rejected,
        },
      });
      if (stepId === exec.node.id) ctx.setTool(exec.node.id, decision.selected.spec.name);
      return decision.selected;
    } catch (error) {
      ctx.trace.emit({
        step_id: stepId,
        event_type: 'capability-route',
        data: {
          capability,
          selected: null,
          candidates: ctx.snapshot.withCapability(capability).map((tool) => tool.spec.name),
          error: toErrorInfo(error),
        },
      });
      throw error;
    }
  }

  private invoke(
    run: RunState,
    exec: NodeExecution,
    tool: ResolvedTool,
    args: Record<string, unknown>,
    stepId: string
  ): Promise<Invocation> {
    return withRetry((attempt) => this.attempt(run, exec, tool, args, stepId, attempt), exec.retry, {
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        run.logger.warn(
          { node_id: exec.node.id, step_id: stepId, attempt, delay_ms: delayMs, ...errorFields(error) },
          'Retrying tool invocation'
        );
      },
    });
  }

  private async attempt(
    run: RunState,
    exec: NodeExecution,
    tool: ResolvedTool,
    args: Record<string, unknown>,
    stepId: string,
    attempt: number
  ): Promise<Invocation> {
    const { ctx } = run;
    const spec = tool.spec;

    const preflight = run.checker.preflight(spec, args, stepId);
    ctx.trace.emit({
      step_id: stepId,
      event_type: 'constraint-check',
      data: preflight.ok
        ? { kind: 'preflight', tool: spec.name, passed: true, estimated_tokens: preflight.estimated_tokens }
        : { kind: 'preflight', tool: spec.name, passed: false, reason: preflight.reason, message: preflight.message },
    });

    if (!preflight.ok) {
      throw this.preflightFailure(run, preflight, spec.name, stepId);
    }
    for (const predicateError of preflight.predicate_errors) {
      run.logger.warn({ tool: spec.name, ...predicateError }, 'deny_if predicate could not be evaluated');
    }

    ctx.countAttempt(exec.node.id);
    const timeoutMs = spec.constraints?.timeout_ms ?? this.config.toolTimeoutMs;
    const started = this.now();
    let response: ToolInvokeResponse;
    try {
      response = await this.client.invoke(tool, args, { timeoutMs });
    } catch (error) {
      const failure =
        error instanceof ToolInvocationError
          ? error
          : new ToolInvocationError(
              error instanceof Error ? error.message : String(error),
              spec.name,
              error instanceof Error && isRetryableError(error)
            );
      const latency = this.now() - started;
      ctx.budget.record({ latency_ms: latency, tokens_in: estimateTokens(args) });
      ctx.trace.emit({
        step_id: stepId,
        event_type: 'tool-invoke',
        data: { tool: spec.name, attempt, ok: false, latency_ms: latency, retryable: failure.retryable, error: failure.toInfo() },
      });
      this.checkBudget(run, stepId);
      throw failure;
    }

    const latency = this.now() - started;
    const cost = response.usage?.cost_usd ?? spec.constraints?.cost_per_call_usd ?? 0;
    const tokensIn = response.usage?.tokens_in ?? estimateTokens(args);
    const tokensOut = response.usage?.tokens_out ?? estimateTokens(response.result);
    ctx.budget.record({ cost_usd: cost, latency_ms: latency, tokens_in: tokensIn, tokens_out: tokensOut });

    const citations = citationsOf(response);
    ctx.trace.emit({
      step_id: stepId,
      event_type: 'tool-invoke',
      cost_usd: cost,
      tokens_in: tokensIn,
      tokens_out: tokensOut,
      ...(citations.length > 0 && { citations }),
      data: { tool: spec.name, attempt, ok: true, latency_ms: latency },
    });
    this.checkBudget(run, stepId);

    const attribution = this.policy.checkAttribution(spec, response, stepId);
    if (attribution) this.recordViolation(run, attribution);

    const deny = this.policy.checkDenyRules(spec, 'output', { args, output: response.result }, stepId);
    if (deny.violation) {
      this.recordViolation(run, deny.violation);
      throw new PolicyViolationError(deny.violation.message, 'deny_if', deny.violation.severity);
    }

    return { tool, response, result: response.result };
  }

  private preflightFailure(
    run: RunState,
    preflight: Exclude<PreflightResult, { ok: true }>,
    tool: string,
    stepId: string
  ): KernelError {
    switch (preflight.reason) {
      case 'budget_exhausted': {
        this.checkBudget(run, stepId);
        const limit = run.ctx.budget.limits[preflight.dimension] ?? 0;
        return new BudgetExceeded(preflight.dimension, limit, run.ctx.budget.totals()[preflight.dimension]);
      }
      case 'input_tokens':
        return new ConstraintViolation(preflight.message, tool);
      case 'deny_if':
        this.recordViolation(run, preflight.violation);
        return new PolicyViolationError(preflight.message, 'deny_if', preflight.violation.severity);
      default:
        return assertNever(preflight);
    }
  }

  /**
   * The first invocation that takes a capped total past its limit halts the
   * run. Its own result still stands.
   */
  private checkBudget(run: RunState, stepId: string): void {
    const check = run.ctx.budget.check();
    if (check.ok || run.budgetReported) return;
    run.budgetReported = true;

    const error = new BudgetExceeded(check.dimension, check.limit, check.actual);
    run.ctx.trace.emit({
      step_id: stepId,
      event_type: 'constraint-check',
      data: {
        kind: 'budget_exceeded',
        dimension: check.dimension,
        limit: check.limit,
        actual: check.actual,
        over_by: check.over_by,
      },
    });
    const nodeId = stepId.split('/')[0] ?? stepId;
    this.setFatal(run, {
      status: 'halted',
      haltReason: 'budget_exceeded',
      failure: { node_id: nodeId, ...error.toInfo() },
    });
  }

  private gate(run: RunState, stepId: string, summary: EvidenceSummary, threshold: number | undefined): void {
    const violation = this.policy.checkEvidenceGate(summary, threshold, stepId);
    run.ctx.trace.emit({
      step_id: stepId,
      event_type: 'evidence-check',
      data: {
        kind: violation ? 'evidence_below_threshold' : 'evidence_summary',
        summary,
        threshold: threshold ?? null,
        passed: !violation,
      },
    });
    if (violation && threshold !== undefined) {
      run.ctx.recordViolation(violation);
      throw new EvidenceBelowThreshold(summary.mean_confidence, threshold);
    }
  }

  private recordViolation(run: RunState, violation: PolicyViolationRecord): void {
    run.ctx.recordViolation(violation);
    run.ctx.trace.emit({
      step_id: violation.step_id,
      event_type: 'policy-violation',
      data: {
        kind: violation.kind,
        severity: violation.severity,
        message: violation.message,
        ...(violation.details && { details: violation.details }),
      },
    });
    const fields = { step_id: violation.step_id, kind: violation.kind, severity: violation.severity };
    if (violation.severity === 'advisory') {
      run.logger.info(fields, violation.message);
    } else {
      run.logger.warn(fields, violation.message);
    }
  }

  // ==========================================================================
  // Argument helpers
  // ==========================================================================

  private resolveItems(exec: NodeExecution): unknown[] {
    const items = resolveValue(exec.node.args?.['items'], exec.scope);
    if (!Array.isArray(items)) {
      throw new ArgumentResolutionError(
        `${exec.node.op} ${exec.node.id} needs items to resolve to an array`,
        String(exec.node.args?.['items']),
        exec.node.id
      );
    }
    return items;
  }

  private summaryFrom(value: unknown, nodeId: string): EvidenceSummary {
    if (isRecord(value)) {
      const nested = EvidenceSummarySchema.safeParse(value['summary']);
      if (nested.success) return nested.data;
    }
    const direct = EvidenceSummarySchema.safeParse(value);
    if (direct.success) return direct.data;
    return summarizeEvidence(this.evidenceFrom(value, nodeId));
  }

  private evidenceFrom(value: unknown, nodeId: string): Evidence {
    const source = isRecord(value) && isRecord(value['evidence']) ? value['evidence'] : value;
    const parsed = EvidenceSchema.safeParse(source);
    if (!parsed.success || !isRecord(source)) {
      throw new ArgumentResolutionError('evidence does not resolve to Evidence or a verify result', 'args.evidence', nodeId);
    }
    return parsed.data;
  }
}
