/**
 * Evidence & Policy Engine
 *
 * Turns static ToolSpec rules, memory-write requests and verification
 * output into violation records. Stateless: the scheduler decides what a
 * violation does to the node or the run from its severity.
 */

import {
  MEMORY_WRITE_MIN_CONFIDENCE,
  type Evidence,
  type EvidenceSummary,
  type MemoryWriteRequest,
  type PolicyViolationRecord,
  type ToolInvokeResponse,
  type ToolSpec,
  type ViolationSeverity,
} from '@mesh-kernel/contracts';
import { ConditionError } from '../errors.js';
import { bareRoots, parseCondition, testCondition, type ConditionNode } from '../plan/conditions.js';
import { isRecord } from '../shared/utils.js';
import { validateForStorage } from './evidence.js';

export type DenyPhase = 'args' | 'output';

export interface DenyRuleOutcome {
  violation?: PolicyViolationRecord;
  /** Predicates that could not be parsed or evaluated; they never match */
  errors: Array<{ predicate: string; message: string }>;
}

export function denySeverity(spec: ToolSpec): ViolationSeverity {
  return spec.policy?.on_violation === 'halt-run' ? 'run' : 'node';
}

/**
 * Citations returned with an invocation, from the response envelope or a
 * `citations` array on the result object.
 */
export function citationsOf(response: ToolInvokeResponse): string[] {
  if (response.citations && response.citations.length > 0) return response.citations;
  const result = response.result;
  if (isRecord(result) && Array.isArray(result['citations'])) {
    return result['citations'].filter((item): item is string => typeof item === 'string');
  }
  return [];
}

export class PolicyEngine {
  private readonly parsed = new Map<string, ConditionNode | ConditionError>();

  /**
   * Acceptance rules for a memory write. An empty list means accepted.
   */
  checkMemoryWrite(request: MemoryWriteRequest, stepId: string, evidence?: Evidence): PolicyViolationRecord[] {
    const violations: PolicyViolationRecord[] = [];

    if (request.confidence === undefined || request.confidence < MEMORY_WRITE_MIN_CONFIDENCE) {
      violations.push({
        kind: 'memory_confidence_low',
        severity: 'advisory',
        step_id: stepId,
        message: `Memory write confidence ${request.confidence ?? 'missing'} is below ${MEMORY_WRITE_MIN_CONFIDENCE}`,
        details: { key: request.key, confidence: request.confidence ?? null },
      });
    }

    if (!request.provenance || request.provenance.length === 0) {
      violations.push({
        kind: 'memory_provenance_missing',
        severity: 'advisory',
        step_id: stepId,
        message: 'Memory write requires non-empty provenance',
        details: { key: request.key },
      });
    }

    if (evidence) {
      const check = validateForStorage(evidence, MEMORY_WRITE_MIN_CONFIDENCE);
      if (!check.ok) {
        violations.push({
          kind: 'memory_evidence_insufficient',
          severity: 'advisory',
          step_id: stepId,
          message: `Evidence does not support storage: ${check.reason}`,
          details: { key: request.key, ...check },
        });
      }
    }

    return violations;
  }

  /**
   * Evaluate a tool's deny_if predicates. Predicates mentioning `output`
   * run in the output phase, the rest before the call. The first match
   * wins.
   */
  checkDenyRules(
    spec: ToolSpec,
    phase: DenyPhase,
    values: { args: Record<string, unknown>; output?: unknown },
    stepId: string
  ): DenyRuleOutcome {
    const outcome: DenyRuleOutcome = { errors: [] };

    for (const predicate of spec.policy?.deny_if ?? []) {
      const node = this.parse(predicate);
      if (node instanceof ConditionError) {
        outcome.errors.push({ predicate, message: node.message });
        continue;
      }
      const predicatePhase: DenyPhase = bareRoots(node).has('output') ? 'output' : 'args';
      if (predicatePhase !== phase) continue;

      let matched: boolean;
      try {
        matched = testCondition(node, {
          variables: new Map(),
          roots: phase === 'output' ? { args: values.args, output: values.output } : { args: values.args },
        });
      } catch (error) {
        outcome.errors.push({
          predicate,
          message: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (matched) {
        outcome.violation = {
          kind: 'deny_if',
          severity: denySeverity(spec),
          step_id: stepId,
          message: `Tool ${spec.name} denied by policy: ${predicate}`,
          details: { tool: spec.name, predicate, phase },
        };
        return outcome;
      }
    }

    return outcome;
  }

  /**
   * Advisory violation when a tool requires attribution and the invocation
   * came back without citations.
   */
  checkAttribution(spec: ToolSpec, response: ToolInvokeResponse, stepId: string): PolicyViolationRecord | undefined {
    if (spec.provenance?.attribution_required !== true) return undefined;
    if (citationsOf(response).length > 0) return undefined;
    return {
      kind: 'citation_required',
      severity: 'advisory',
      step_id: stepId,
      message: `Tool ${spec.name} requires attribution but returned no citations`,
      details: { tool: spec.name },
    };
  }

  /**
   * Confidence gate for verify nodes and evidence asserts.
   */
  checkEvidenceGate(
    summary: EvidenceSummary,
    threshold: number | undefined,
    stepId: string
  ): PolicyViolationRecord | undefined {
    if (threshold === undefined || summary.mean_confidence >= threshold) return undefined;
    return {
      kind: 'evidence_below_threshold',
      severity: 'run',
      step_id: stepId,
      message: `Evidence confidence ${summary.mean_confidence.toFixed(2)} is below required ${threshold.toFixed(2)}`,
      details: { mean_confidence: summary.mean_confidence, threshold },
    };
  }

  private parse(predicate: string): ConditionNode | ConditionError {
    let node = this.parsed.get(predicate);
    if (!node) {
      try {
        node = parseCondition(predicate);
      } catch (error) {
        if (!(error instanceof ConditionError)) throw error;
        node = error;
      }
      this.parsed.set(predicate, node);
    }
    return node;
  }
}
