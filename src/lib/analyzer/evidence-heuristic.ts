/**
 * Heuristic Evidence Analysis
 *
 * Keyword-overlap judgment of one source against one claim, used when no
 * provider can answer. It only reports a contradiction on concrete
 * signals (a negated claim keyword or a conflicting year); weak overlap
 * stays undetermined.
 *
 * @module analyzer/evidence-heuristic
 */

import type { Claim, Evidence, Source, SupportState } from "./types";

export const HEURISTIC_THRESHOLDS = {
  /** Fraction of claim words that must appear in the source */
  overlapRatio: 0.4,
  /** Characters of content at which the length factor saturates */
  saturationLength: 500,
  maxSupportingSentences: 2,
  weights: {
    overlap: 0.5,
    credibility: 0.3,
    length: 0.2,
  },
} as const;

const NEGATION_WORDS = ["not", "no", "never", "false"];

const STOPWORDS = new Set([
  "a",
  "an",
  "the",
  "in",
  "on",
  "at",
  "of",
  "to",
  "for",
  "by",
  "with",
  "from",
  "and",
  "or",
  "is",
  "was",
  "are",
  "were",
  "be",
  "been",
  "it",
  "its",
  "this",
  "that",
  "as",
]);

const YEAR_PATTERN = /^(1[0-9]{3}|20[0-9]{2})$/;

// ============================================================================
// TOKENIZATION
// ============================================================================

/** Lower-cased whitespace tokens with surrounding punctuation stripped. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((w) => w.replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, ""))
    .filter((w) => w.length > 0);
}

export function wordSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

function splitSentences(content: string): string[] {
  return content
    .split(/[.!?]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function countShared(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let shared = 0;
  for (const w of a) {
    if (b.has(w)) shared++;
  }
  return shared;
}

export function overlapRatio(claimText: string, content: string): number {
  const claimWords = wordSet(claimText);
  if (claimWords.size === 0) return 0;
  return countShared(claimWords, wordSet(content)) / claimWords.size;
}

// ============================================================================
// SIGNALS
// ============================================================================

/** Sentences sharing at least min(2, 0.3·|claim|) words with the claim. */
export function findOverlappingSentences(claimText: string, content: string): string[] {
  const claimWords = wordSet(claimText);
  if (claimWords.size === 0) return [];
  const required = Math.min(2, claimWords.size * 0.3);
  return splitSentences(content).filter((sentence) => countShared(claimWords, wordSet(sentence)) >= required);
}

export function extractSupportingText(claimText: string, content: string): string {
  if (!content) return "";
  return findOverlappingSentences(claimText, content)
    .slice(0, HEURISTIC_THRESHOLDS.maxSupportingSentences)
    .join(". ");
}

/** A negation word directly in front of a claim keyword (stopwords excluded). */
export function hasContextualNegation(claimText: string, content: string): boolean {
  const keywords = Array.from(wordSet(claimText)).filter((w) => !STOPWORDS.has(w));
  if (keywords.length === 0) return false;
  const pattern = new RegExp(
    `\\b(?:${NEGATION_WORDS.join("|")})\\s+(?:${keywords.map(escapeRegExp).join("|")})\\b`,
  );
  return pattern.test(content.toLowerCase());
}

function yearsIn(text: string): Set<string> {
  return new Set(tokenize(text).filter((w) => YEAR_PATTERN.test(w)));
}

/**
 * The claim names a year, none of the sentences about the claim repeat it,
 * and those sentences name a different one.
 */
export function hasYearMismatch(claimText: string, content: string): boolean {
  const claimYears = yearsIn(claimText);
  if (claimYears.size === 0) return false;

  const sentenceYears = yearsIn(findOverlappingSentences(claimText, content).join(" "));
  if (sentenceYears.size === 0) return false;
  return countShared(claimYears, sentenceYears) === 0;
}

// ============================================================================
// ASSESSMENT
// ============================================================================

export interface HeuristicAssessment {
  supportsClaim: SupportState;
  confidence: number;
  supportingText: string;
  overlap: number;
  negated: boolean;
  yearMismatch: boolean;
}

export function assessSupportHeuristically(
  claimText: string,
  source: Pick<Source, "content" | "credibilityScore">,
): HeuristicAssessment {
  const content = source.content;
  if (!content) {
    return { supportsClaim: null, confidence: 0, supportingText: "", overlap: 0, negated: false, yearMismatch: false };
  }

  const overlap = overlapRatio(claimText, content);
  const negated = hasContextualNegation(claimText, content);
  const yearMismatch = hasYearMismatch(claimText, content);

  let supportsClaim: SupportState = null;
  if (overlap > HEURISTIC_THRESHOLDS.overlapRatio) {
    supportsClaim = !(negated || yearMismatch);
  }

  const { weights, saturationLength } = HEURISTIC_THRESHOLDS;
  const lengthFactor = Math.min(content.length / saturationLength, 1);
  const confidence = Math.min(
    overlap * weights.overlap + source.credibilityScore * weights.credibility + lengthFactor * weights.length,
    1,
  );

  return {
    supportsClaim,
    confidence,
    supportingText: extractSupportingText(claimText, content),
    overlap,
    negated,
    yearMismatch,
  };
}

export function analyzeSourceHeuristically(
  claim: Pick<Claim, "text">,
  source: Source,
  fallbackReason?: string,
): Evidence {
  const assessment = assessSupportHeuristically(claim.text, source);
  return {
    source,
    supportingText: assessment.supportingText,
    supportsClaim: assessment.supportsClaim,
    confidence: assessment.confidence,
    extractionMethod: "basic_analysis",
    metadata: {
      overlap: assessment.overlap,
      negated: assessment.negated,
      yearMismatch: assessment.yearMismatch,
      ...(fallbackReason ? { fallbackReason } : {}),
    },
  };
}
