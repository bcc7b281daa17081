/**
 * Kernel error taxonomy.
 *
 * `scope` decides propagation: `node` errors fail only the node they are
 * attributed to, `run` errors stop admission of new nodes for the whole run.
 */

import type { ErrorInfo, ViolationKind, ViolationSeverity } from '@mesh-kernel/contracts';
import type { ValidationIssue } from '@mesh-kernel/contracts';

export type ErrorScope = 'node' | 'run';

export abstract class KernelError extends Error {
  abstract readonly code: string;
  abstract readonly scope: ErrorScope;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

/**
 * Bad or missing variable path while resolving a node's arguments.
 */
export class ArgumentResolutionError extends KernelError {
  readonly code = 'ARGUMENT_RESOLUTION';
  readonly scope = 'node';

  constructor(
    message: string,
    readonly expression: string,
    readonly nodeId?: string
  ) {
    super(message);
  }
}

/**
 * Malformed condition expression, or one that cannot be evaluated against
 * the values it was given (ordering a string against a number, a bad regex).
 */
export class ConditionError extends KernelError {
  readonly code = 'CONDITION';
  readonly scope = 'node';

  constructor(
    message: string,
    readonly expression: string,
    readonly position?: number
  ) {
    super(message);
  }
}

/**
 * Network, timeout or remote error from a tool call.
 */
export class ToolInvocationError extends KernelError {
  readonly code = 'TOOL_INVOCATION';
  readonly scope = 'node';

  constructor(
    message: string,
    readonly tool: string,
    readonly retryable: boolean,
    readonly status?: number
  ) {
    super(message);
  }
}

/**
 * Plan rejected before execution starts.
 */
export class ValidationError extends KernelError {
  readonly code = 'VALIDATION';
  readonly scope = 'run';

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super(message);
  }
}

/**
 * No registered tool satisfies a capability.
 */
export class RoutingError extends KernelError {
  readonly code = 'ROUTING';
  readonly scope = 'run';

  constructor(
    readonly capability: string,
    readonly reasons: Array<{ tool: string; reason: string }> = []
  ) {
    super(
      reasons.length > 0
        ? `No tool available for capability "${capability}": ${reasons
            .map((r) => `${r.tool} (${r.reason})`)
            .join(', ')}`
        : `No tool registered for capability "${capability}"`
    );
  }
}

export type BudgetDimension = 'cost_usd' | 'latency_ms';

export class BudgetExceeded extends KernelError {
  readonly code = 'BUDGET_EXCEEDED';
  readonly scope = 'run';

  constructor(
    readonly dimension: BudgetDimension,
    readonly limit: number,
    readonly actual: number
  ) {
    super(`Budget exceeded on ${dimension}: ${actual} > ${limit}`);
  }

  get overBy(): number {
    return this.actual - this.limit;
  }
}

/**
 * Invocation refused before the call: the arguments exceed the tool's
 * declared input token limit.
 */
export class ConstraintViolation extends KernelError {
  readonly code = 'CONSTRAINT_VIOLATION';
  readonly scope = 'node';

  constructor(
    message: string,
    readonly tool: string
  ) {
    super(message);
  }
}

export class PolicyViolationError extends KernelError {
  readonly code = 'POLICY_VIOLATION';
  readonly scope: ErrorScope;

  constructor(
    message: string,
    readonly kind: ViolationKind,
    readonly severity: ViolationSeverity
  ) {
    super(message);
    this.scope = severity === 'run' ? 'run' : 'node';
  }
}

export class EvidenceBelowThreshold extends KernelError {
  readonly code = 'EVIDENCE_BELOW_THRESHOLD';
  readonly scope = 'run';

  constructor(
    readonly confidence: number,
    readonly threshold: number
  ) {
    super(`Evidence confidence ${confidence.toFixed(2)} is below required ${threshold.toFixed(2)}`);
  }
}

export class AssertionFailed extends KernelError {
  readonly code = 'ASSERTION_FAILED';
  readonly scope = 'run';
}

/**
 * Normalise anything thrown into a KernelError-compatible info record.
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof KernelError) {
    return error.toInfo();
  }
  const err = error instanceof Error ? error : new Error(String(error));
  return { code: err.name || 'UNKNOWN_ERROR', message: err.message };
}
