/**
 * Claim Verification - Shared Types
 *
 * Data contracts handed between pipeline stages and consumed by the
 * evidence analyzer and verdict synthesizer.
 *
 * @module analyzer/types
 */

// ============================================================================
// CLAIMS
// ============================================================================

export type ClaimType =
  | "historical_date"
  | "biographical_fact"
  | "corporate_fact"
  | "news_event"
  | "unknown";

export interface Entity {
  text: string;
  /** PERSON, ORG, DATE, GPE, ... */
  entityType: string;
  startPos: number;
  endPos: number;
  confidence: number;
}

export interface SubClaim {
  readonly text: string;
  readonly entities: readonly Entity[];
  readonly claimType: ClaimType;
  readonly verifiable: boolean;
}

export interface Claim {
  id: string;
  text: string;
  claimType: ClaimType;
  entities: Entity[];
  subClaims: SubClaim[];
  sources: Source[];
  createdAt: Date;
}

export function createClaim(text: string, id?: string): Claim {
  const createdAt = new Date();
  return {
    id: id ?? String(createdAt.getTime()),
    text,
    claimType: "unknown",
    entities: [],
    subClaims: [],
    sources: [],
    createdAt,
  };
}

// ============================================================================
// SOURCES & EVIDENCE
// ============================================================================

export type SourceType = "wikipedia" | "news" | "fact_check" | "web";

export interface Source {
  readonly url: string;
  readonly title: string;
  readonly content: string;
  readonly sourceType: SourceType;
  /** Static trust weight assigned at discovery time (0-1) */
  readonly credibilityScore: number;
  readonly relevanceScore: number;
  readonly publicationDate?: Date;
}

export type ExtractionMethod = "llm_analysis" | "ensemble_analysis" | "basic_analysis";

/**
 * Tri-state support signal. `null` means the relationship could not be
 * determined and is never treated as a contradiction.
 */
export type SupportState = true | false | null;

export interface EvidenceMetadata {
  provider?: string;
  providerKind?: string;
  model?: string;
  assessment?: string;
  reasoning?: string;
  ensembleSize?: number;
  votingMethod?: string;
  fallbackReason?: string;
  missingFields?: string[];
  biasRiskScore?: number;
  [key: string]: unknown;
}

export type Evidence = Readonly<{
  source: Source;
  supportingText: string;
  supportsClaim: SupportState;
  confidence: number;
  extractionMethod: ExtractionMethod;
  metadata: Readonly<EvidenceMetadata>;
}>;

// ============================================================================
// VERDICTS
// ============================================================================

export type Verdict = "SUPPORTED" | "CONTRADICTED" | "INSUFFICIENT_EVIDENCE" | "ERROR";

export interface EvidenceBreakdown {
  supporting: number;
  contradicting: number;
  neutral: number;
  supportingScore: number;
  contradictingScore: number;
}

export interface VerificationMetadata {
  biasRiskScore?: number;
  meetsConfidenceThreshold?: boolean;
  evidenceBreakdown?: EvidenceBreakdown;
  extractionMethods?: Partial<Record<ExtractionMethod, number>>;
  providersUsed?: string[];
}

export interface VerificationResult {
  originalClaim: string;
  verdict: Verdict;
  confidence: number;
  evidenceSummary: string;
  sources: Source[];
  /** Seconds */
  processingTime: number;
  timestamp: Date;
  errorMessage?: string;
  metadata?: VerificationMetadata;
}
