/**
 * Trace replay: parse a stored NDJSON trace, reduce it to the scheduling
 * decisions it records, and compare two runs decision by decision.
 *
 * Events are grouped per step rather than compared in global order:
 * concurrent nodes may interleave differently between runs while every
 * step still makes the same decisions.
 */

import {
  PLAN_STEP_ID,
  TraceEventSchema,
  zodIssues,
  type Plan,
  type TraceEvent,
  type TraceEventType,
  type ValidationIssue,
} from '@mesh-kernel/contracts';
import { ValidationError } from '../errors.js';
import { ToolSpecSnapshot } from '../tools/tool-spec-cache.js';

export interface TraceSummary {
  plan_id: string | undefined;
  /** step_id -> event types in emission order */
  steps: Record<string, TraceEventType[]>;
  /** node id -> final status from its step-end record */
  outcomes: Record<string, string>;
  status: string | undefined;
  halt_reason: string | undefined;
}

export type DivergenceKind = 'missing_step' | 'extra_step' | 'event_sequence' | 'outcome' | 'status';

export interface Divergence {
  kind: DivergenceKind;
  step_id: string;
  expected: unknown;
  actual: unknown;
}

export interface ReplayBundle {
  format: 'mesh-replay-bundle';
  version: 1;
  plan: Plan;
  trace: TraceEvent[];
  tool_versions: Record<string, string | null>;
  public_key?: string;
  created_at: string;
}

/**
 * Parse NDJSON, validating every line. Blank lines are ignored.
 */
export function parseTraceStream(ndjson: string): TraceEvent[] {
  const events: TraceEvent[] = [];
  const issues: ValidationIssue[] = [];
  let invalid = 0;

  ndjson.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      issues.push({
        path: `line ${index + 1}`,
        message: error instanceof Error ? error.message : String(error),
        code: 'invalid_json',
      });
      invalid += 1;
      return;
    }
    const parsed = TraceEventSchema.safeParse(json);
    if (!parsed.success) {
      for (const issue of zodIssues(parsed.error)) {
        issues.push({ ...issue, path: `line ${index + 1}${issue.path ? `: ${issue.path}` : ''}` });
      }
      invalid += 1;
      return;
    }
    events.push(parsed.data);
  });

  if (issues.length > 0) {
    throw new ValidationError(`Trace stream has ${invalid} invalid record(s)`, issues);
  }
  return events;
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

export function summarizeTrace(events: readonly TraceEvent[]): TraceSummary {
  const summary: TraceSummary = {
    plan_id: events[0]?.plan_id,
    steps: {},
    outcomes: {},
    status: undefined,
    halt_reason: undefined,
  };

  for (const event of events) {
    const sequence = summary.steps[event.step_id] ?? [];
    sequence.push(event.event_type);
    summary.steps[event.step_id] = sequence;

    if (event.event_type === 'step-end' && event.step_id !== PLAN_STEP_ID) {
      const status = stringField(event.data, 'status');
      if (status) summary.outcomes[event.step_id] = status;
    }
    if (event.event_type === 'constraint-check' && stringField(event.data, 'kind') === 'budget_summary') {
      summary.status = stringField(event.data, 'status');
      summary.halt_reason = stringField(event.data, 'halt_reason');
    }
  }

  return summary;
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}

/**
 * Every point where `actual` made a different decision from `expected`.
 */
export function compareTraces(expected: readonly TraceEvent[], actual: readonly TraceEvent[]): Divergence[] {
  const a = summarizeTrace(expected);
  const b = summarizeTrace(actual);
  const divergences: Divergence[] = [];

  for (const [stepId, sequence] of Object.entries(a.steps)) {
    const other = b.steps[stepId];
    if (!other) {
      divergences.push({ kind: 'missing_step', step_id: stepId, expected: sequence, actual: null });
    } else if (!sameSequence(sequence, other)) {
      divergences.push({ kind: 'event_sequence', step_id: stepId, expected: sequence, actual: other });
    }
  }
  for (const [stepId, sequence] of Object.entries(b.steps)) {
    if (!a.steps[stepId]) {
      divergences.push({ kind: 'extra_step', step_id: stepId, expected: null, actual: sequence });
    }
  }

  const nodes = new Set([...Object.keys(a.outcomes), ...Object.keys(b.outcomes)]);
  for (const nodeId of nodes) {
    if (a.outcomes[nodeId] !== b.outcomes[nodeId]) {
      divergences.push({
        kind: 'outcome',
        step_id: nodeId,
        expected: a.outcomes[nodeId] ?? null,
        actual: b.outcomes[nodeId] ?? null,
      });
    }
  }

  if (a.status !== b.status || a.halt_reason !== b.halt_reason) {
    divergences.push({
      kind: 'status',
      step_id: PLAN_STEP_ID,
      expected: { status: a.status ?? null, halt_reason: a.halt_reason ?? null },
      actual: { status: b.status ?? null, halt_reason: b.halt_reason ?? null },
    });
  }

  return divergences;
}

export function createReplayBundle(
  plan: Plan,
  trace: readonly TraceEvent[],
  toolVersions: ToolSpecSnapshot | Record<string, string | null>,
  options: { publicKey?: string; now?: () => number } = {}
): ReplayBundle {
  return {
    format: 'mesh-replay-bundle',
    version: 1,
    plan,
    trace: [...trace],
    tool_versions: toolVersions instanceof ToolSpecSnapshot ? toolVersions.versions() : { ...toolVersions },
    ...(options.publicKey !== undefined && { public_key: options.publicKey }),
    created_at: new Date((options.now ?? Date.now)()).toISOString(),
  };
}
