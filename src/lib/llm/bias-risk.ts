/**
 * Bias Risk Assessor
 *
 * Keyword heuristic that flags politically sensitive topics before a
 * provider is chosen, and inspects responses afterwards for avoidance and
 * omission patterns. It is a proxy for routing, not a model of bias.
 *
 * @module llm/bias-risk
 */

import type { BiasPolicy } from "../config-schemas";

export const DEFAULT_BIAS_POLICY: BiasPolicy = {
  sensitiveKeywords: [
    "berlin wall",
    "tiananmen square",
    "hong kong protests",
    "taiwan independence",
    "tibet",
    "xinjiang",
    "uyghur",
    "falun gong",
    "democracy china",
    "human rights china",
    "censorship china",
    "cultural revolution",
  ],
  highRiskPatterns: ["berlin wall.*1989", "tiananmen.*1989", "hong kong.*protest"],
  avoidancePhrases: [
    "insufficient information",
    "cannot be verified",
    "unclear from sources",
    "disputed claims",
    "different perspectives",
    "complex situation",
    "multiple viewpoints",
    "sensitive topic",
    "political nature",
  ],
  confirmationTerms: ["fell", "fall", "collapsed", "ended", "demolished"],
};

export const HIGH_RISK_SCORE = 0.8;
const PER_KEYWORD_SCORE = 0.3;
const MAX_KEYWORD_SCORE = 0.7;

const AVOIDANCE_PHRASE_SCORE = 0.9;
const NO_CONFIRMATION_SCORE = 0.8;
const NO_CONFIRMATION_MIN_LENGTH = 50;
const OMISSION_SCORE = 0.7;
const BIASED_ABOVE = 0.6;

const YEAR_PATTERN = /\b(1[0-9]{3}|20[0-9]{2})\b/g;

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

export type BiasLevel = "HIGH" | "MEDIUM" | "LOW" | "MINIMAL";

export interface ResponseBiasAssessment {
  biasScore: number;
  level: BiasLevel;
  avoidanceScore: number;
  omissionScore: number;
  isBiased: boolean;
}

export function categorizeBiasLevel(score: number): BiasLevel {
  if (score >= 0.8) return "HIGH";
  if (score >= 0.6) return "MEDIUM";
  if (score >= 0.3) return "LOW";
  return "MINIMAL";
}

function extractYears(text: string): string[] {
  return Array.from(new Set(text.match(YEAR_PATTERN) ?? []));
}

export class BiasRiskAssessor {
  private readonly policy: BiasPolicy;
  private readonly highRiskPatterns: RegExp[];

  constructor(policy: BiasPolicy = DEFAULT_BIAS_POLICY) {
    this.policy = policy;
    this.highRiskPatterns = policy.highRiskPatterns.map((source) => new RegExp(source));
  }

  private countKeywordHits(lowered: string): number {
    return this.policy.sensitiveKeywords.filter((keyword) => lowered.includes(keyword)).length;
  }

  /**
   * Risk in [0, 1] that a provider will deflect on this text. Compound
   * patterns (topic plus the year it is known for) pin the score at 0.8.
   */
  assess(text: string): number {
    const lowered = text.toLowerCase();
    const hits = this.countKeywordHits(lowered);
    if (hits === 0) return 0;

    if (this.highRiskPatterns.some((pattern) => pattern.test(lowered))) {
      return HIGH_RISK_SCORE;
    }
    return Math.min(PER_KEYWORD_SCORE * hits, MAX_KEYWORD_SCORE);
  }

  assessResponseBias(originalText: string, responseText: string): ResponseBiasAssessment {
    const original = originalText.toLowerCase();
    const response = responseText.toLowerCase();

    const sensitive = this.countKeywordHits(original) > 0;
    const years = extractYears(original);

    let avoidanceScore = 0;
    let omissionScore = 0;

    if (sensitive && years.length > 0) {
      if (this.policy.avoidancePhrases.some((phrase) => response.includes(phrase))) {
        avoidanceScore = AVOIDANCE_PHRASE_SCORE;
      }
      const confirms = this.policy.confirmationTerms.some((term) => response.includes(term));
      if (!confirms && response.length > NO_CONFIRMATION_MIN_LENGTH) {
        avoidanceScore = Math.max(avoidanceScore, NO_CONFIRMATION_SCORE);
      }

      const mentionsDate =
        years.some((year) => response.includes(year)) || MONTH_NAMES.some((month) => response.includes(month));
      if (!mentionsDate) {
        omissionScore = OMISSION_SCORE;
      }
    }

    const biasScore = Math.max(avoidanceScore, omissionScore);
    return {
      biasScore,
      level: categorizeBiasLevel(biasScore),
      avoidanceScore,
      omissionScore,
      isBiased: biasScore > BIASED_ABOVE,
    };
  }
}
