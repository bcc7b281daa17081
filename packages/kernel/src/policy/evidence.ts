/**
 * Evidence rollup and storage fitness.
 */

import type { ClaimSummary, Evidence, EvidenceSummary } from '@mesh-kernel/contracts';

/** Largest share of contradicted verdicts evidence may carry and still be stored */
export const MAX_CONTRADICTION_RATIO = 0.5;

interface ClaimAccumulator {
  supports: number;
  contradictions: number;
  sum: number;
  count: number;
  min: number;
  max: number;
}

function newAccumulator(): ClaimAccumulator {
  return { supports: 0, contradictions: 0, sum: 0, count: 0, min: Infinity, max: -Infinity };
}

function addConfidence(acc: ClaimAccumulator, value: number): void {
  acc.sum += value;
  acc.count += 1;
  acc.min = Math.min(acc.min, value);
  acc.max = Math.max(acc.max, value);
}

function toClaimSummary(acc: ClaimAccumulator): ClaimSummary {
  const hasValues = acc.count > 0;
  return {
    supports: acc.supports,
    contradictions: acc.contradictions,
    average_confidence: hasValues ? acc.sum / acc.count : null,
    min_confidence: hasValues ? acc.min : null,
    max_confidence: hasValues ? acc.max : null,
  };
}

/**
 * Summarise evidence. Headline confidence figures come from the verdicts;
 * per-claim figures fold in supports, contradictions and verdicts alike.
 */
export function summarizeEvidence(evidence: Evidence): EvidenceSummary {
  const claims = new Map<string, ClaimAccumulator>();
  const claim = (id: string): ClaimAccumulator => {
    let acc = claims.get(id);
    if (!acc) {
      acc = newAccumulator();
      claims.set(id, acc);
    }
    return acc;
  };

  for (const id of evidence.claims) claim(id);

  for (const support of evidence.supports) {
    const acc = claim(support.claim_id);
    acc.supports += 1;
    addConfidence(acc, support.confidence);
  }

  for (const contradiction of evidence.contradicts) {
    const acc = claim(contradiction.claim_id);
    acc.contradictions += 1;
    addConfidence(acc, contradiction.confidence);
  }

  let supported = 0;
  let contradicted = 0;
  let sum = 0;
  let min = Infinity;
  let max = 0;
  for (const verdict of evidence.verdicts) {
    if (verdict.verdict === 'supported') supported += 1;
    if (verdict.verdict === 'contradicted') contradicted += 1;
    sum += verdict.confidence;
    min = Math.min(min, verdict.confidence);
    max = Math.max(max, verdict.confidence);
    addConfidence(claim(verdict.claim_id), verdict.confidence);
  }

  const total = evidence.verdicts.length;
  const perClaim: Record<string, ClaimSummary> = {};
  for (const [id, acc] of claims) perClaim[id] = toClaimSummary(acc);

  return {
    total_claims: total,
    supported_claims: supported,
    contradicted_claims: contradicted,
    mean_confidence: total > 0 ? sum / total : 0,
    min_confidence: min === Infinity ? 0 : min,
    max_confidence: max,
    needs_citation_count: evidence.verdicts.filter((v) => v.needs_citation).length,
    per_claim: perClaim,
  };
}

export type StorageCheck =
  | { ok: true }
  | { ok: false; reason: 'insufficient_confidence'; mean_confidence: number; required: number }
  | { ok: false; reason: 'missing_support'; claim_id: string }
  | { ok: false; reason: 'too_many_contradictions'; ratio: number; threshold: number };

/**
 * Whether evidence is strong enough to back a stored fact.
 */
export function validateForStorage(evidence: Evidence, minConfidence: number): StorageCheck {
  const summary = summarizeEvidence(evidence);

  if (summary.mean_confidence < minConfidence) {
    return {
      ok: false,
      reason: 'insufficient_confidence',
      mean_confidence: summary.mean_confidence,
      required: minConfidence,
    };
  }

  for (const [claimId, claim] of Object.entries(summary.per_claim)) {
    if (claim.supports === 0) {
      return { ok: false, reason: 'missing_support', claim_id: claimId };
    }
  }

  if (summary.total_claims > 0) {
    const ratio = summary.contradicted_claims / summary.total_claims;
    if (ratio > MAX_CONTRADICTION_RATIO) {
      return { ok: false, reason: 'too_many_contradictions', ratio, threshold: MAX_CONTRADICTION_RATIO };
    }
  }

  return { ok: true };
}
