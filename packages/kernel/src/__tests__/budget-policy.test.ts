/**
 * Budget accounting, pre-flight constraints, capability routing, evidence
 * rollups and policy rules.
 */

import { describe, it, expect } from 'vitest';
import { parsePlan, type Evidence } from '@mesh-kernel/contracts';
import { RoutingError } from '../errors';
import { BudgetTracker } from '../budget/budget-tracker';
import { ConstraintChecker, checkPlanEstimate } from '../budget/constraint-checker';
import { cheapestCandidate, routeCapability } from '../routing/capability-router';
import { summarizeEvidence, validateForStorage } from '../policy/evidence';
import { PolicyEngine, citationsOf } from '../policy/policy-engine';
import { DOC_SEARCH, GROUND_VERIFY, snapshotOf, toolSpec } from './helpers';

describe('BudgetTracker', () => {
  it('sums usage and ignores negative or non-finite values', () => {
    const tracker = new BudgetTracker({ cost_usd: 1, latency_ms: 1000 });

    tracker.record({ cost_usd: 0.25, latency_ms: 300, tokens_in: 10.4, tokens_out: 5 });
    const totals = tracker.record({ cost_usd: -1, latency_ms: Number.NaN });

    expect(totals).toEqual({ cost_usd: 0.25, latency_ms: 300, tokens_in: 10, tokens_out: 5, invocations: 2 });
    expect(tracker.check()).toEqual({ ok: true });
    expect(tracker.remaining()).toEqual({ cost_usd: 0.75, latency_ms: 700 });
  });

  it('reports the first dimension over its limit', () => {
    const tracker = new BudgetTracker({ cost_usd: 1, latency_ms: 1000 });

    tracker.record({ cost_usd: 0.5, latency_ms: 1100 });

    expect(tracker.check()).toEqual({ ok: false, dimension: 'latency_ms', limit: 1000, actual: 1100, over_by: 100 });
    expect(tracker.exhausted()).toBe('latency_ms');
    expect(tracker.remaining()).toEqual({ cost_usd: 0.5, latency_ms: 0 });
  });

  it('takes its limits from plan signals', () => {
    const tracker = BudgetTracker.fromSignals({ cost_cap_usd: 2, risk: 0.1 });

    expect(tracker.limits).toEqual({ cost_usd: 2 });
    expect(BudgetTracker.fromSignals(undefined).check()).toEqual({ ok: true });
  });
});

describe('ConstraintChecker', () => {
  const policy = new PolicyEngine();

  it('refuses arguments over the input token limit', () => {
    const checker = new ConstraintChecker(new BudgetTracker(), policy);
    const spec = toolSpec('t', { constraints: { input_tokens_max: 3 } });

    expect(checker.preflight(spec, { q: 'abcdefghij' }, 'n')).toEqual({
      ok: false,
      reason: 'input_tokens',
      estimated_tokens: 5,
      limit: 3,
      message: 'Estimated 5 input tokens exceed t limit of 3',
    });
  });

  it('applies deny_if predicates over the arguments', () => {
    const checker = new ConstraintChecker(new BudgetTracker(), policy);
    const spec = toolSpec('t', { policy: { deny_if: ['args.amount > 100'] } });

    const denied = checker.preflight(spec, { amount: 150 }, 'n');
    expect(denied).toMatchObject({ ok: false, reason: 'deny_if', message: 'Tool t denied by policy: args.amount > 100' });

    expect(checker.preflight(spec, { amount: 5 }, 'n')).toEqual({ ok: true, estimated_tokens: 3, predicate_errors: [] });
  });

  it('passes calls whose predicates cannot be evaluated and reports why', () => {
    const checker = new ConstraintChecker(new BudgetTracker(), policy);
    const spec = toolSpec('t', { policy: { deny_if: ['args.name < 1', 'len('] } });

    const result = checker.preflight(spec, { name: 'x' }, 'n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.predicate_errors.map((e) => e.predicate)).toEqual(['args.name < 1', 'len(']);
    expect(result.predicate_errors[0]?.message).toBe('Cannot order string against number with "<"');
  });

  it('keeps calling when a capped dimension is spent exactly to its limit', () => {
    const tracker = new BudgetTracker({ cost_usd: 1 });
    tracker.record({ cost_usd: 1 });

    expect(tracker.exhausted()).toBeUndefined();
    expect(new ConstraintChecker(tracker, policy).preflight(DOC_SEARCH, {}, 'n')).toEqual({
      ok: true,
      estimated_tokens: 1,
      predicate_errors: [],
    });
  });

  it('refuses every call once a capped total is past its limit', () => {
    const tracker = new BudgetTracker({ cost_usd: 1 });
    tracker.record({ cost_usd: 1.5 });

    expect(new ConstraintChecker(tracker, policy).preflight(DOC_SEARCH, {}, 'n')).toEqual({
      ok: false,
      reason: 'budget_exhausted',
      dimension: 'cost_usd',
      message: 'Budget for cost_usd is already exceeded',
    });
  });

  it('estimates whether a tool fits the remaining budget', () => {
    const byCost = new ConstraintChecker(new BudgetTracker({ cost_usd: 0.0015 }), policy);
    const byLatency = new ConstraintChecker(new BudgetTracker({ latency_ms: 100 }), policy);

    expect(byCost.estimateFits(DOC_SEARCH)).toEqual({ fits: true });
    expect(byCost.estimateFits(GROUND_VERIFY)).toEqual({
      fits: false,
      reason: 'over budget: cost 0.002 exceeds remaining 0.0015',
    });
    expect(byLatency.estimateFits(DOC_SEARCH)).toEqual({
      fits: false,
      reason: 'over budget: latency 120ms exceeds remaining 100ms',
    });
  });

  it('estimates a whole plan against its signals', () => {
    const plan = parsePlan({
      signals: { cost_cap_usd: 0.002, latency_budget_ms: 1000 },
      nodes: [
        { id: 'a', op: 'call', tool: 'doc.search.local' },
        { id: 'b', op: 'verify', tool: 'ground.verify' },
        { id: 'c', op: 'call', tool: 'not.registered' },
        { id: 'd', op: 'branch', args: { condition: 'true' } },
      ],
    });

    const estimate = checkPlanEstimate(plan, snapshotOf([DOC_SEARCH, GROUND_VERIFY]));

    expect(estimate.cost_usd).toBeCloseTo(0.003);
    expect(estimate).toMatchObject({ latency_ms: 420, unresolved: ['c'], fits: false, exceeded: ['cost_usd'] });
  });
});

describe('routeCapability', () => {
  const snapshot = snapshotOf([
    toolSpec('search.a', { capabilities: ['search'], constraints: { cost_per_call_usd: 0.002, latency_p50_ms: 50 } }),
    toolSpec('search.b', { capabilities: ['search'], constraints: { cost_per_call_usd: 0.001, latency_p50_ms: 200 } }),
    toolSpec('search.c', { capabilities: ['search'], constraints: { cost_per_call_usd: 0.001, latency_p50_ms: 100 } }),
    toolSpec('search.d', { capabilities: ['search'], constraints: { cost_per_call_usd: 0.001, latency_p50_ms: 100 } }),
    toolSpec('verify.a', { capabilities: ['verify'] }),
  ]);

  it('prefers cheapest, then fastest, then earliest registered', () => {
    const decision = routeCapability('search', snapshot, () => ({ fits: true }));

    expect(decision.selected.spec.name).toBe('search.c');
    expect(decision.candidates).toEqual(['search.a', 'search.b', 'search.c', 'search.d']);
    expect(decision.rejected).toEqual([
      { tool: 'search.d', reason: 'registered later' },
      { tool: 'search.b', reason: 'latency too high' },
      { tool: 'search.a', reason: 'cost too high' },
    ]);
  });

  it('skips candidates that do not fit the budget', () => {
    const decision = routeCapability('search', snapshot, (spec) =>
      spec.name === 'search.c' ? { fits: false, reason: 'over budget' } : { fits: true }
    );

    expect(decision.selected.spec.name).toBe('search.d');
    expect(decision.rejected[0]).toEqual({ tool: 'search.c', reason: 'over budget' });
  });

  it('fails when nothing is eligible', () => {
    expect(() => routeCapability('verify', snapshot, () => ({ fits: false, reason: 'over budget' }))).toThrow(
      'No tool available for capability "verify": verify.a (over budget)'
    );
    expect(() => routeCapability('teleport', snapshot, () => ({ fits: true }))).toThrow(RoutingError);
    expect(() => routeCapability('teleport', snapshot, () => ({ fits: true }))).toThrow(
      'No tool registered for capability "teleport"'
    );
  });

  it('picks the cheapest candidate for estimates', () => {
    expect(cheapestCandidate('search', snapshot)?.spec.name).toBe('search.c');
    expect(cheapestCandidate('teleport', snapshot)).toBeUndefined();
  });
});

const mixedEvidence: Evidence = {
  claims: ['c1', 'c2'],
  supports: [{ claim_id: 'c1', source: 'doc-1', confidence: 0.5 }],
  contradicts: [{ claim_id: 'c2', source: 'doc-2', confidence: 0.25 }],
  verdicts: [
    { claim_id: 'c1', verdict: 'supported', confidence: 0.75, needs_citation: false },
    { claim_id: 'c2', verdict: 'contradicted', confidence: 0.25, needs_citation: true },
  ],
};

describe('evidence', () => {
  it('summarises verdicts and rolls up each claim', () => {
    expect(summarizeEvidence(mixedEvidence)).toEqual({
      total_claims: 2,
      supported_claims: 1,
      contradicted_claims: 1,
      mean_confidence: 0.5,
      min_confidence: 0.25,
      max_confidence: 0.75,
      needs_citation_count: 1,
      per_claim: {
        c1: { supports: 1, contradictions: 0, average_confidence: 0.625, min_confidence: 0.5, max_confidence: 0.75 },
        c2: { supports: 0, contradictions: 1, average_confidence: 0.25, min_confidence: 0.25, max_confidence: 0.25 },
      },
    });
  });

  it('summarises empty evidence as zero confidence', () => {
    expect(summarizeEvidence({ claims: [], supports: [], contradicts: [], verdicts: [] })).toMatchObject({
      total_claims: 0,
      mean_confidence: 0,
      min_confidence: 0,
      max_confidence: 0,
      per_claim: {},
    });
  });

  it('refuses storage on low confidence, then on unsupported claims', () => {
    expect(validateForStorage(mixedEvidence, 0.8)).toEqual({
      ok: false,
      reason: 'insufficient_confidence',
      mean_confidence: 0.5,
      required: 0.8,
    });
    expect(validateForStorage(mixedEvidence, 0.5)).toEqual({ ok: false, reason: 'missing_support', claim_id: 'c2' });
  });

  it('refuses storage when most verdicts contradict', () => {
    const evidence: Evidence = {
      claims: ['c1', 'c2', 'c3'],
      supports: ['c1', 'c2', 'c3'].map((claim_id) => ({ claim_id, source: 'doc-1', confidence: 0.9 })),
      contradicts: [],
      verdicts: [
        { claim_id: 'c1', verdict: 'contradicted', confidence: 0.9, needs_citation: false },
        { claim_id: 'c2', verdict: 'contradicted', confidence: 0.9, needs_citation: false },
        { claim_id: 'c3', verdict: 'supported', confidence: 0.9, needs_citation: false },
      ],
    };

    const check = validateForStorage(evidence, 0.8);

    expect(check).toMatchObject({ ok: false, reason: 'too_many_contradictions', threshold: 0.5 });
    if (check.ok || check.reason !== 'too_many_contradictions') return;
    expect(check.ratio).toBeCloseTo(2 / 3);
  });
});

describe('PolicyEngine', () => {
  const engine = new PolicyEngine();

  it('accepts a confident memory write with provenance', () => {
    expect(engine.checkMemoryWrite({ key: 'k', value: 1, confidence: 0.9, provenance: ['doc-1'] }, 'w')).toEqual([]);
  });

  it('lists every reason a memory write is refused', () => {
    const violations = engine.checkMemoryWrite({ key: 'k', value: 1 }, 'w', mixedEvidence);

    expect(violations.map((v) => [v.kind, v.message])).toEqual([
      ['memory_confidence_low', 'Memory write confidence missing is below 0.8'],
      ['memory_provenance_missing', 'Memory write requires non-empty provenance'],
      ['memory_evidence_insufficient', 'Evidence does not support storage: insufficient_confidence'],
    ]);
    expect(violations.every((v) => v.severity === 'advisory' && v.step_id === 'w')).toBe(true);
  });

  it('evaluates output predicates only in the output phase', () => {
    const spec = toolSpec('t', { policy: { deny_if: ['contains(output.flags, "pii")'], on_violation: 'halt-run' } });

    expect(engine.checkDenyRules(spec, 'args', { args: {} }, 'n')).toEqual({ errors: [] });
    expect(engine.checkDenyRules(spec, 'output', { args: {}, output: { flags: ['pii'] } }, 'n').violation).toEqual({
      kind: 'deny_if',
      severity: 'run',
      step_id: 'n',
      message: 'Tool t denied by policy: contains(output.flags, "pii")',
      details: { tool: 't', predicate: 'contains(output.flags, "pii")', phase: 'output' },
    });
  });

  it('flags missing citations on tools that require attribution', () => {
    const spec = toolSpec('t', { provenance: { attribution_required: true } });

    expect(engine.checkAttribution(spec, { result: { citations: ['doc-1'] } }, 'n')).toBeUndefined();
    expect(engine.checkAttribution(DOC_SEARCH, { result: {} }, 'n')).toBeUndefined();
    expect(engine.checkAttribution(spec, { result: {} }, 'n')).toMatchObject({
      kind: 'citation_required',
      severity: 'advisory',
      message: 'Tool t requires attribution but returned no citations',
    });
  });

  it('reads citations from the envelope before the result', () => {
    expect(citationsOf({ citations: ['a'], result: { citations: ['b'] } })).toEqual(['a']);
    expect(citationsOf({ result: { citations: ['b', 3] } })).toEqual(['b']);
    expect(citationsOf({ result: 'text' })).toEqual([]);
  });

  it('gates evidence below the threshold', () => {
    const summary = summarizeEvidence(mixedEvidence);

    expect(engine.checkEvidenceGate(summary, undefined, 'g')).toBeUndefined();
    expect(engine.checkEvidenceGate(summary, 0.5, 'g')).toBeUndefined();
    expect(engine.checkEvidenceGate(summary, 0.8, 'g')).toMatchObject({
      kind: 'evidence_below_threshold',
      severity: 'run',
      message: 'Evidence confidence 0.50 is below required 0.80',
    });
  });
});
