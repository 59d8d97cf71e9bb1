/**
 * Confidence Calibration
 *
 * Deterministic blend of three factors into the reported verdict confidence:
 *   1. Decisiveness: distance of the support ratio from the undecided 0.5
 *   2. Quality: mean per-evidence confidence
 *   3. Diversity: distinct source URLs against a target count
 *
 * The result is hard-capped below certainty. Pure functions only.
 *
 * @module analyzer/confidence-calibration
 */

import { DEFAULT_VERDICT_CONFIG, type VerdictConfig } from "../config-schemas";
import type { Evidence } from "./types";

export interface CalibrationFactors {
  decisiveness: number;
  quality: number;
  diversity: number;
}

export interface CalibrationResult {
  calibratedConfidence: number;
  factors: CalibrationFactors;
}

/** |ratio − 0.5| scaled to [0, 1]. */
export function calculateDecisiveness(supportRatio: number): number {
  if (!Number.isFinite(supportRatio)) return 0;
  return Math.min(1, Math.abs(supportRatio - 0.5) * 2);
}

export function calculateMeanConfidence(evidence: readonly Evidence[]): number {
  if (evidence.length === 0) return 0;
  return evidence.reduce((sum, e) => sum + e.confidence, 0) / evidence.length;
}

export function calculateSourceDiversity(evidence: readonly Evidence[], diversityTarget: number): number {
  const distinctUrls = new Set(evidence.map((e) => e.source.url)).size;
  return Math.min(1, distinctUrls / Math.max(1, diversityTarget));
}

export function clampConfidence(value: number, maxConfidence: number = DEFAULT_VERDICT_CONFIG.maxConfidence): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(maxConfidence, value));
}

export function calibrateConfidence(
  supportRatio: number,
  evidence: readonly Evidence[],
  config: VerdictConfig = DEFAULT_VERDICT_CONFIG,
): CalibrationResult {
  const factors: CalibrationFactors = {
    decisiveness: calculateDecisiveness(supportRatio),
    quality: calculateMeanConfidence(evidence),
    diversity: calculateSourceDiversity(evidence, config.diversityTarget),
  };
  const { weights } = config;
  const raw =
    factors.decisiveness * weights.decisiveness +
    factors.quality * weights.quality +
    factors.diversity * weights.diversity;

  return {
    calibratedConfidence: clampConfidence(raw, config.maxConfidence),
    factors,
  };
}
