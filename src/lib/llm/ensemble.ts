/**
 * Ensemble Response Scoring
 *
 * Deterministic quality heuristic and winner selection for concurrent
 * multi-provider calls. The winner is always one real response; scores are
 * never averaged into a synthetic answer.
 *
 * @module llm/ensemble
 */

import type { VotingMethod } from "../config-schemas";
import type { LLMResponse } from "./provider";

export interface ResponseQualityConfig {
  /** Below this many characters a response is considered truncated */
  minUsefulLength: number;
  /** Lower bound of the preferred length band */
  goodLength: number;
  /** Beyond this a response is considered rambling */
  maxPreferredLength: number;
  hedgeWords: string[];
  /** Penalty per unit of hedge density (hedges / words) */
  hedgePenaltyFactor: number;
  maxHedgePenalty: number;
}

export const DEFAULT_QUALITY_CONFIG: ResponseQualityConfig = {
  minUsefulLength: 20,
  goodLength: 100,
  maxPreferredLength: 2000,
  hedgeWords: ["maybe", "perhaps", "possibly", "might", "unclear", "uncertain", "unsure", "apparently", "allegedly"],
  hedgePenaltyFactor: 5,
  maxHedgePenalty: 0.4,
};

function lengthScore(length: number, config: ResponseQualityConfig): number {
  if (length < config.minUsefulLength) return 0.2;
  if (length < config.goodLength) return 0.5;
  if (length <= config.maxPreferredLength) return 0.8;
  return 0.7;
}

/**
 * Score a response in [0, 1]: a length band baseline minus a penalty
 * proportional to hedge-word density.
 */
export function scoreResponseQuality(content: string, config: ResponseQualityConfig = DEFAULT_QUALITY_CONFIG): number {
  const text = content.trim();
  const words = text.toLowerCase().match(/[a-z']+/g) ?? [];
  const hedgeSet = new Set(config.hedgeWords);
  const hedges = words.filter((w) => hedgeSet.has(w)).length;
  const density = words.length > 0 ? hedges / words.length : 0;
  const penalty = Math.min(density * config.hedgePenaltyFactor, config.maxHedgePenalty);
  return Math.max(0, Math.min(1, lengthScore(text.length, config) - penalty));
}

export interface EnsembleCandidate {
  response: LLMResponse;
  quality: number;
  successRate: number;
}

export interface EnsembleVote {
  winner: EnsembleCandidate;
  /** Final score per provider name */
  scores: Record<string, number>;
}

export function candidateScore(candidate: EnsembleCandidate, votingMethod: VotingMethod): number {
  return votingMethod === "weighted" ? candidate.quality * candidate.successRate : candidate.quality;
}

/**
 * Pick the highest-scoring candidate. Ties keep the earlier candidate, so the
 * caller's provider order breaks them.
 */
export function selectEnsembleWinner(
  candidates: readonly EnsembleCandidate[],
  votingMethod: VotingMethod,
): EnsembleVote | null {
  let winner: EnsembleCandidate | null = null;
  let best = -Infinity;
  const scores: Record<string, number> = {};

  for (const candidate of candidates) {
    const score = candidateScore(candidate, votingMethod);
    scores[candidate.response.providerName] = score;
    if (score > best) {
      best = score;
      winner = candidate;
    }
  }

  return winner ? { winner, scores } : null;
}
