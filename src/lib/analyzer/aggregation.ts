/**
 * Verdict Aggregation
 *
 * Folds per-source Evidence into one verdict. Each side's score is the sum
 * of confidence × source credibility; ensemble-derived evidence gets a
 * multiplier for cross-model agreement.
 *
 * @module analyzer/aggregation
 */

import { DEFAULT_VERDICT_CONFIG, type VerdictConfig } from "../config-schemas";
import { calibrateConfidence } from "./confidence-calibration";
import type { Evidence, EvidenceBreakdown, ExtractionMethod, Verdict } from "./types";

/** Named, overridable decision constants. Tunable, not proven optimal. */
export const VERDICT_THRESHOLDS: VerdictConfig = DEFAULT_VERDICT_CONFIG;

export type SynthesizedVerdict = Exclude<Verdict, "ERROR">;

export interface VerdictSynthesis {
  verdict: SynthesizedVerdict;
  confidence: number;
  breakdown: EvidenceBreakdown;
  /** S / (S + C); null when both sides are empty */
  supportRatio: number | null;
}

export interface EvidencePartition {
  supporting: Evidence[];
  contradicting: Evidence[];
  neutral: Evidence[];
}

export function partitionEvidence(evidence: readonly Evidence[]): EvidencePartition {
  return {
    supporting: evidence.filter((e) => e.supportsClaim === true),
    contradicting: evidence.filter((e) => e.supportsClaim === false),
    neutral: evidence.filter((e) => e.supportsClaim === null),
  };
}

/**
 * Weight of one Evidence item in its side's score.
 */
export function getEvidenceWeight(evidence: Evidence, config: VerdictConfig = VERDICT_THRESHOLDS): number {
  const base = evidence.confidence * evidence.source.credibilityScore;
  return evidence.extractionMethod === "ensemble_analysis" ? base * config.ensembleBoost : base;
}

function sideScore(evidence: readonly Evidence[], config: VerdictConfig): number {
  return evidence.reduce((sum, e) => sum + getEvidenceWeight(e, config), 0);
}

export function countExtractionMethods(evidence: readonly Evidence[]): Partial<Record<ExtractionMethod, number>> {
  const counts: Partial<Record<ExtractionMethod, number>> = {};
  for (const e of evidence) {
    counts[e.extractionMethod] = (counts[e.extractionMethod] ?? 0) + 1;
  }
  return counts;
}

export function synthesizeVerdict(
  evidence: readonly Evidence[],
  config: VerdictConfig = VERDICT_THRESHOLDS,
): VerdictSynthesis {
  const { supporting, contradicting, neutral } = partitionEvidence(evidence);
  const supportingScore = sideScore(supporting, config);
  const contradictingScore = sideScore(contradicting, config);
  const breakdown: EvidenceBreakdown = {
    supporting: supporting.length,
    contradicting: contradicting.length,
    neutral: neutral.length,
    supportingScore,
    contradictingScore,
  };

  const total = supportingScore + contradictingScore;
  if (total === 0) {
    return { verdict: "INSUFFICIENT_EVIDENCE", confidence: 0, breakdown, supportRatio: null };
  }

  const supportRatio = supportingScore / total;
  let verdict: SynthesizedVerdict = "INSUFFICIENT_EVIDENCE";
  if (supportRatio >= config.supportThreshold && supporting.length > 0) {
    verdict = "SUPPORTED";
  } else if (supportRatio <= config.contradictThreshold && contradicting.length > 0) {
    verdict = "CONTRADICTED";
  }

  const { calibratedConfidence } = calibrateConfidence(supportRatio, evidence, config);
  return { verdict, confidence: calibratedConfidence, breakdown, supportRatio };
}
