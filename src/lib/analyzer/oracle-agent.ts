/**
 * Oracle Agent
 *
 * Final pipeline stage: analyzes the claim's sources into Evidence,
 * synthesizes the verdict and renders the summary. `process` never rejects;
 * internal failures become an ERROR result.
 *
 * @module analyzer/oracle-agent
 */

import { DEFAULT_ENGINE_CONFIG, type VerdictConfig } from "../config-schemas";
import { BiasRiskAssessor } from "../llm/bias-risk";
import { SynthesisError, errorMessage } from "../llm/errors";
import { VERDICT_THRESHOLDS, countExtractionMethods, synthesizeVerdict } from "./aggregation";
import type { EvidenceAnalyzer } from "./evidence-analyzer";
import type { Claim, Evidence, VerificationResult } from "./types";
import { NO_SOURCES_SUMMARY, buildEvidenceSummary } from "./verdict-summary";

export interface OracleAgentOptions {
  verdictConfig?: VerdictConfig;
  /** Confidence at which a verdict counts as actionable (reported in metadata) */
  confidenceThreshold?: number;
  biasAssessor?: BiasRiskAssessor;
}

function elapsedSeconds(startTime: number): number {
  return (Date.now() - startTime) / 1000;
}

function providersUsed(evidence: readonly Evidence[]): string[] {
  const names = evidence.map((e) => e.metadata.provider).filter((p): p is string => typeof p === "string");
  return Array.from(new Set(names));
}

export class OracleAgent {
  readonly name = "oracle";

  private readonly analyzer: EvidenceAnalyzer;
  private readonly verdictConfig: VerdictConfig;
  private readonly confidenceThreshold: number;
  private readonly biasAssessor: BiasRiskAssessor;

  constructor(analyzer: EvidenceAnalyzer, options: OracleAgentOptions = {}) {
    this.analyzer = analyzer;
    this.verdictConfig = options.verdictConfig ?? VERDICT_THRESHOLDS;
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_ENGINE_CONFIG.processing.confidenceThreshold;
    this.biasAssessor = options.biasAssessor ?? new BiasRiskAssessor();
  }

  async process(claim: Claim): Promise<VerificationResult> {
    const startTime = Date.now();

    try {
      const sources = claim.sources;
      if (sources.length === 0) {
        return {
          originalClaim: claim.text,
          verdict: "INSUFFICIENT_EVIDENCE",
          confidence: 0,
          evidenceSummary: NO_SOURCES_SUMMARY,
          sources: [],
          processingTime: elapsedSeconds(startTime),
          timestamp: new Date(),
        };
      }

      const evidence = await this.analyzer.analyze(claim, sources);
      const result = this.synthesize(claim, evidence, startTime);
      console.log(`[Oracle] Verdict: ${result.verdict} (confidence: ${result.confidence.toFixed(2)})`);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Oracle] Processing error: ${message}`);
      return {
        originalClaim: claim.text,
        verdict: "ERROR",
        confidence: 0,
        evidenceSummary: `Error processing claim: ${message}`,
        sources: [],
        processingTime: elapsedSeconds(startTime),
        timestamp: new Date(),
        errorMessage: message,
      };
    }
  }

  private synthesize(claim: Claim, evidence: readonly Evidence[], startTime: number): VerificationResult {
    try {
      const synthesis = synthesizeVerdict(evidence, this.verdictConfig);
      return {
        originalClaim: claim.text,
        verdict: synthesis.verdict,
        confidence: synthesis.confidence,
        evidenceSummary: buildEvidenceSummary(evidence, synthesis.verdict),
        sources: claim.sources,
        processingTime: elapsedSeconds(startTime),
        timestamp: new Date(),
        metadata: {
          biasRiskScore: this.biasAssessor.assess(claim.text),
          meetsConfidenceThreshold: synthesis.confidence >= this.confidenceThreshold,
          evidenceBreakdown: synthesis.breakdown,
          extractionMethods: countExtractionMethods(evidence),
          providersUsed: providersUsed(evidence),
        },
      };
    } catch (error) {
      throw new SynthesisError(`Verdict synthesis failed: ${errorMessage(error)}`, error);
    }
  }
}
