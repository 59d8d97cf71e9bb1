/**
 * Human-readable verdict explanation.
 *
 * @module analyzer/verdict-summary
 */

import { partitionEvidence } from "./aggregation";
import type { Evidence, Verdict } from "./types";

export const NO_SOURCES_SUMMARY = "No sources found to evaluate this claim.";
export const NO_EVIDENCE_SUMMARY = "No evidence found to evaluate this claim.";

const EXCERPT_CHARS = 200;

function verdictSentence(verdict: Verdict): string {
  switch (verdict) {
    case "SUPPORTED":
      return "This claim is SUPPORTED by the available evidence.";
    case "CONTRADICTED":
      return "This claim is CONTRADICTED by the available evidence.";
    default:
      return "There is INSUFFICIENT EVIDENCE to verify this claim.";
  }
}

function strongest(evidence: readonly Evidence[]): Evidence | null {
  let best: Evidence | null = null;
  for (const e of evidence) {
    if (!best || e.confidence > best.confidence) best = e;
  }
  return best;
}

export function buildEvidenceSummary(evidence: readonly Evidence[], verdict: Verdict): string {
  if (evidence.length === 0) return NO_EVIDENCE_SUMMARY;

  const { supporting, contradicting, neutral } = partitionEvidence(evidence);
  const parts = [
    verdictSentence(verdict),
    `Found ${evidence.length} sources: ${supporting.length} supporting, ${contradicting.length} contradicting, ${neutral.length} neutral.`,
  ];

  const bestSupporting = strongest(supporting);
  if (bestSupporting?.supportingText) {
    parts.push(`Key supporting evidence: ${bestSupporting.supportingText.slice(0, EXCERPT_CHARS)}...`);
  }

  const bestContradicting = strongest(contradicting);
  if (bestContradicting?.supportingText) {
    parts.push(`Key contradicting evidence: ${bestContradicting.supportingText.slice(0, EXCERPT_CHARS)}...`);
  }

  return parts.join(" ");
}
