/**
 * Evidence Contracts
 *
 * Structured support/contradiction/verdict data returned by a verification
 * tool. Produced once per verify invocation and never mutated afterwards.
 */

import { z } from 'zod';

const ConfidenceScore = z.number().min(0).max(1);

export const EvidenceLinkSchema = z.object({
  claim_id: z.string().min(1),
  source: z.string().min(1),
  confidence: ConfidenceScore,
  explanation: z.string().optional(),
});
export type EvidenceLink = z.infer<typeof EvidenceLinkSchema>;

export const VerdictTypeSchema = z.enum(['supported', 'contradicted', 'neutral']);
export type VerdictType = z.infer<typeof VerdictTypeSchema>;

export const VerdictSchema = z.object({
  claim_id: z.string().min(1),
  verdict: VerdictTypeSchema,
  confidence: ConfidenceScore,
  needs_citation: z.boolean(),
});
export type Verdict = z.infer<typeof VerdictSchema>;

export const EvidenceSchema = z.object({
  claims: z.array(z.string()).default([]),
  supports: z.array(EvidenceLinkSchema).default([]),
  contradicts: z.array(EvidenceLinkSchema).default([]),
  verdicts: z.array(VerdictSchema).default([]),
});
export type Evidence = z.infer<typeof EvidenceSchema>;

/**
 * Per-claim rollup inside an evidence summary.
 */
export const ClaimSummarySchema = z.object({
  supports: z.number().int().nonnegative(),
  contradictions: z.number().int().nonnegative(),
  average_confidence: ConfidenceScore.nullable(),
  min_confidence: ConfidenceScore.nullable(),
  max_confidence: ConfidenceScore.nullable(),
});
export type ClaimSummary = z.infer<typeof ClaimSummarySchema>;

export const EvidenceSummarySchema = z.object({
  total_claims: z.number().int().nonnegative(),
  supported_claims: z.number().int().nonnegative(),
  contradicted_claims: z.number().int().nonnegative(),
  mean_confidence: ConfidenceScore,
  min_confidence: ConfidenceScore,
  max_confidence: ConfidenceScore,
  needs_citation_count: z.number().int().nonnegative(),
  per_claim: z.record(z.string(), ClaimSummarySchema),
});
export type EvidenceSummary = z.infer<typeof EvidenceSummarySchema>;

export function validateEvidence(json: unknown): Evidence {
  return EvidenceSchema.parse(json);
}
