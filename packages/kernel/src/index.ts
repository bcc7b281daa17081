/**
 * @mesh-kernel/kernel
 *
 * Executes plan DAGs against HTTP tool services under budget, evidence and
 * policy gates, and records a signed, replayable trace of every decision.
 *
 * @packageDocumentation
 */

export { Kernel, type KernelOptions, type PreparedPlan, type RunOptions } from './kernel.js';

// Errors
export * from './errors.js';

// Configuration and logging
export * from './config/index.js';
export { createLogger, silentLogger, isLogLevel, type Logger, type LoggerOptions, type LogLevel } from './shared/logger.js';
export { Semaphore } from './shared/concurrency.js';

// Plan handling
export * from './plan/variables.js';
export * from './plan/conditions.js';
export * from './plan/graph.js';
export * from './plan/validate.js';
export * from './optimizer/plan-optimizer.js';

// Execution
export * from './execution/execution-context.js';
export * from './execution/retry.js';
export { Scheduler, type SchedulerOptions } from './execution/scheduler.js';

// Budget, policy and routing
export * from './budget/budget-tracker.js';
export * from './budget/constraint-checker.js';
export * from './policy/evidence.js';
export * from './policy/policy-engine.js';
export * from './routing/capability-router.js';
export * from './memory/memory-ops.js';

// Tools
export * from './tools/http.js';
export * from './tools/registry.js';
export * from './tools/tool-client.js';
export * from './tools/tool-spec-cache.js';

// Trace
export * from './trace/trace-signer.js';
export * from './trace/trace-emitter.js';
export * from './trace/replay.js';
