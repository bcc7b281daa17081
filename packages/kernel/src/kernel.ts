/**
 * Kernel
 *
 * Entry point for embedding: resolves a fresh ToolSpec snapshot, validates
 * and optimizes a plan against it, and runs it through the scheduler with a
 * per-run context, budget and trace.
 */

import type { RunResult } from '@mesh-kernel/contracts';
import { BudgetTracker } from './budget/budget-tracker.js';
import { createConfig, type KernelConfig } from './config/index.js';
import { ExecutionContext } from './execution/execution-context.js';
import { Scheduler } from './execution/scheduler.js';
import { optimizePlan, type OptimizedPlan } from './optimizer/plan-optimizer.js';
import { validatePlan, type ValidatedPlan } from './plan/validate.js';
import { PolicyEngine } from './policy/policy-engine.js';
import { errorFields, silentLogger, type Logger } from './shared/logger.js';
import { generatePlanId, sleep as defaultSleep } from './shared/utils.js';
import { HttpToolRegistry, StaticToolRegistry, type ToolRegistry } from './tools/registry.js';
import { HttpToolClient, type ToolClient } from './tools/tool-client.js';
import { ToolSpecCache, type ToolSpecSnapshot } from './tools/tool-spec-cache.js';
import { TraceEmitter, type TraceSink } from './trace/trace-emitter.js';
import { TraceSigner } from './trace/trace-signer.js';

export interface KernelOptions {
  config?: KernelConfig;
  /** Where tool specs come from; ignored when `cache` is given */
  registry?: ToolRegistry;
  cache?: ToolSpecCache;
  client?: ToolClient;
  /** Trace signer; loaded from `config.traceSigningKey` when omitted */
  signer?: TraceSigner;
  policy?: PolicyEngine;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  /** Initial context variables */
  inputs?: Record<string, unknown>;
  /** Receives every trace event as it is emitted; closed when the run ends */
  sink?: TraceSink;
}

export interface PreparedPlan extends ValidatedPlan {
  snapshot: ToolSpecSnapshot;
  optimized: OptimizedPlan;
}

export class Kernel {
  readonly config: KernelConfig;
  private readonly cache: ToolSpecCache;
  private readonly client: ToolClient;
  private readonly signer: TraceSigner | undefined;
  private readonly policy: PolicyEngine;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: KernelOptions) {
    this.config = options.config ?? createConfig();
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.client = options.client ?? new HttpToolClient();
    this.policy = options.policy ?? new PolicyEngine();

    if (options.cache) {
      this.cache = options.cache;
    } else if (options.registry) {
      this.cache = new ToolSpecCache(options.registry, { logger: this.logger, now: this.now });
    } else {
      throw new Error('Kernel requires a tool registry or a ToolSpec cache');
    }

    this.signer =
      options.signer ?? (this.config.traceSigningKey ? TraceSigner.fromPem(this.config.traceSigningKey) : undefined);
  }

  /**
   * Kernel wired from configuration alone: the registry service when
   * `registryUrl` is set, the static tool file otherwise.
   */
  static async fromConfig(config: KernelConfig, logger?: Logger): Promise<Kernel> {
    const registry = config.registryUrl
      ? new HttpToolRegistry(config.registryUrl)
      : await StaticToolRegistry.fromFile(config.toolConfigPath);
    return new Kernel({ config, registry, ...(logger && { logger }) });
  }

  /** PEM public key that verifies this kernel's traces, when it signs them */
  publicKeyPem(): string | undefined {
    return this.signer?.publicKeyPem();
  }

  snapshot(): Promise<ToolSpecSnapshot> {
    return this.cache.ensureFresh(this.config.specMaxAgeMs);
  }

  /**
   * Validate a plan against the registered tools. Throws ValidationError.
   */
  async validate(plan: unknown, inputs: Record<string, unknown> = {}): Promise<ValidatedPlan> {
    return this.validateAgainst(plan, inputs, await this.snapshot());
  }

  async prepare(plan: unknown, inputs: Record<string, unknown> = {}): Promise<PreparedPlan> {
    const snapshot = await this.snapshot();
    const validated = this.validateAgainst(plan, inputs, snapshot);
    return { ...validated, snapshot, optimized: optimizePlan(validated.graph, snapshot) };
  }

  /**
   * Execute a plan. Plans that fail validation are rejected with a
   * ValidationError before any node runs; everything after that is reported
   * in the returned RunResult.
   */
  async runPlan(plan: unknown, options: RunOptions = {}): Promise<RunResult> {
    const inputs = options.inputs ?? {};
    const prepared = await this.prepare(plan, inputs);
    const planId = prepared.plan.id ?? generatePlanId();
    const logger = this.logger.child({ plan_id: planId });

    const trace = new TraceEmitter({
      planId,
      logger,
      now: this.now,
      ...(this.signer && { signer: this.signer }),
      ...(options.sink && { sink: options.sink }),
    });
    const ctx = new ExecutionContext({
      planId,
      nodeIds: prepared.graph.nodeIds,
      inputs,
      snapshot: prepared.snapshot,
      budget: BudgetTracker.fromSignals(prepared.plan.signals),
      trace,
      now: this.now,
    });
    const scheduler = new Scheduler({
      client: this.client,
      config: this.config,
      policy: this.policy,
      logger: this.logger,
      now: this.now,
      sleep: this.sleep,
    });

    try {
      return await scheduler.execute(ctx, prepared.plan, prepared.graph, prepared.optimized);
    } finally {
      if (options.sink) {
        await options.sink.close().catch((error: unknown) => {
          logger.error(errorFields(error), 'Failed to close trace sink');
        });
      }
    }
  }

  private validateAgainst(plan: unknown, inputs: Record<string, unknown>, snapshot: ToolSpecSnapshot): ValidatedPlan {
    return validatePlan(plan, {
      inputs: Object.keys(inputs),
      knownTools: snapshot.names(),
      knownCapabilities: snapshot.capabilities(),
    });
  }
}
