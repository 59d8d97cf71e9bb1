/**
 * Pipeline Stages
 *
 * The stages that prepare a claim for the Oracle. Each stage receives the
 * claim and returns an updated copy. The defaults here are rule-based; any
 * stage can be replaced by another `ClaimStage` implementation.
 *
 * @module pipeline/stages
 */

import type { Claim, ClaimType, Entity, Source, SubClaim } from "../analyzer/types";

export interface ClaimStage {
  readonly name: string;
  process(claim: Claim): Promise<Claim>;
}

/** Raw input failed validation before any analysis ran. */
export class InputRejectedError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Input rejected: ${reason}`);
    this.name = "InputRejectedError";
    this.reason = reason;
  }
}

// ============================================================================
// HERALD: CLEANING & VALIDATION
// ============================================================================

export const INPUT_LIMITS = {
  minLength: 10,
  maxLength: 1000,
  minLetters: 3,
} as const;

export function validateClaimText(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return "empty input";
  if (trimmed.length < INPUT_LIMITS.minLength) return `too short (${trimmed.length} chars)`;
  if (trimmed.length > INPUT_LIMITS.maxLength) return `too long (${trimmed.length} chars)`;
  if (trimmed.replace(/[^a-zA-Z]/g, "").length < INPUT_LIMITS.minLetters) return "no meaningful words";
  return null;
}

export function cleanClaimText(text: string): string {
  let cleaned = text
    .trim()
    .replace(/\s+/g, " ")
    .replace(/[“”„]/g, '"')
    .replace(/[‘’‚]/g, "'")
    .replace(/[–—]/g, "-")
    // eslint-disable-next-line no-control-regex
    .replace(/[\u0000-\u001F\u007F]/g, "");

  if (!/[.!?]$/.test(cleaned)) {
    cleaned += ".";
  }
  return cleaned;
}

export class HeraldStage implements ClaimStage {
  readonly name = "herald";

  async process(claim: Claim): Promise<Claim> {
    const problem = validateClaimText(claim.text);
    if (problem) {
      console.warn(`[Herald] ${problem}`);
      throw new InputRejectedError(problem);
    }
    const text = cleanClaimText(claim.text);
    console.log(`[Herald] Processed claim: "${text.slice(0, 50)}"`);
    return { ...claim, text };
  }
}

// ============================================================================
// ILLUMINATOR: CLASSIFICATION & ENTITIES
// ============================================================================

const DATE_PATTERNS = [
  /\b\d{4}\b/,
  /\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2},?\s+\d{4}\b/,
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{4}\b/,
];

const BIOGRAPHICAL_KEYWORDS = [
  "born",
  "birth",
  "died",
  "death",
  "lived",
  "age",
  "married",
  "graduated",
  "studied",
  "worked",
  "served",
  "became",
  "appointed",
  "elected",
];

const CORPORATE_KEYWORDS = [
  "founded",
  "established",
  "company",
  "corporation",
  "business",
  "startup",
  "ipo",
  "acquired",
  "merger",
  "revenue",
  "profit",
  "headquarters",
];

const NEWS_KEYWORDS = [
  "announced",
  "reported",
  "happened",
  "occurred",
  "event",
  "incident",
  "today",
  "yesterday",
  "recently",
  "breaking",
];

const ORGANIZATION_PATTERN = /\b[A-Z][a-z]*(?:\s+[A-Z][a-z]*)*\s+(?:Inc|Corp|Company|Corporation|Ltd|LLC)\b/g;

function mentionsAny(lowered: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => lowered.includes(k));
}

export function classifyClaimType(text: string): ClaimType {
  const lowered = text.toLowerCase();
  const biographical = mentionsAny(lowered, BIOGRAPHICAL_KEYWORDS);
  const corporate = mentionsAny(lowered, CORPORATE_KEYWORDS);

  if (DATE_PATTERNS.some((p) => p.test(text))) {
    if (biographical) return "biographical_fact";
    if (corporate) return "corporate_fact";
    return "historical_date";
  }
  if (biographical) return "biographical_fact";
  if (corporate) return "corporate_fact";
  if (mentionsAny(lowered, NEWS_KEYWORDS)) return "news_event";
  return "unknown";
}

export function extractEntities(text: string, now: Date = new Date()): Entity[] {
  const entities: Entity[] = [];
  const latestYear = now.getFullYear() + 10;

  for (const match of text.matchAll(/\b\d{4}\b/g)) {
    const year = Number.parseInt(match[0], 10);
    const start = match.index ?? 0;
    if (year >= 1000 && year <= latestYear) {
      entities.push({ text: match[0], entityType: "DATE", startPos: start, endPos: start + match[0].length, confidence: 0.7 });
    }
  }

  for (const match of text.matchAll(ORGANIZATION_PATTERN)) {
    const start = match.index ?? 0;
    entities.push({ text: match[0], entityType: "ORG", startPos: start, endPos: start + match[0].length, confidence: 0.6 });
  }

  return entities;
}

export class IlluminatorStage implements ClaimStage {
  readonly name = "illuminator";

  async process(claim: Claim): Promise<Claim> {
    const claimType = classifyClaimType(claim.text);
    const entities = extractEntities(claim.text);
    console.log(`[Illuminator] Classified claim as ${claimType} with ${entities.length} entities`);
    return { ...claim, claimType, entities };
  }
}

// ============================================================================
// LOGICIAN: DECOMPOSITION
// ============================================================================

export function decomposeClaim(claim: Claim): SubClaim[] {
  const whole: SubClaim = {
    text: claim.text,
    entities: claim.entities,
    claimType: claim.claimType,
    verifiable: true,
  };

  if (claim.claimType !== "historical_date") return [whole];

  const dates = claim.entities.filter((e) => e.entityType === "DATE");
  if (dates.length === 0) return [whole];

  return dates.map((date) => ({
    text: `The event '${claim.text}' occurred in ${date.text}`,
    entities: [date],
    claimType: "historical_date",
    verifiable: true,
  }));
}

export class LogicianStage implements ClaimStage {
  readonly name = "logician";

  async process(claim: Claim): Promise<Claim> {
    const subClaims = decomposeClaim(claim);
    return { ...claim, subClaims };
  }
}

// ============================================================================
// SEEKER: SOURCE ATTACHMENT
// ============================================================================

/** Supplies candidate sources for a claim (search backend, fixture file, ...). */
export type SourceProvider = (claim: Claim) => Promise<readonly Source[]>;

export interface SourceAttachmentOptions {
  maxSourcesPerClaim?: number;
}

/**
 * Attaches sources to the claim, most relevant first, capped per claim.
 * Without a provider the sources already on the claim are kept.
 */
export class SourceAttachmentStage implements ClaimStage {
  readonly name = "seeker";

  private readonly provider: SourceProvider | null;
  private readonly maxSourcesPerClaim: number;

  constructor(provider: SourceProvider | null = null, options: SourceAttachmentOptions = {}) {
    this.provider = provider;
    this.maxSourcesPerClaim = options.maxSourcesPerClaim ?? 5;
  }

  async process(claim: Claim): Promise<Claim> {
    const found = this.provider ? await this.provider(claim) : claim.sources;
    const sources = [...found]
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, this.maxSourcesPerClaim);
    console.log(`[Seeker] Attached ${sources.length} sources`);
    return { ...claim, sources };
  }
}
