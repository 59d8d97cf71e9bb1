/**
 * Evidence Analyzer
 *
 * Produces one Evidence per Source for a claim. Each source is judged by a
 * language model through the ProviderManager (single routed call or
 * ensemble); when no provider can answer, the keyword heuristic takes over
 * for that source.
 *
 * Results keep the order of the input sources regardless of concurrency.
 *
 * @module analyzer/evidence-analyzer
 */

import pLimit from "p-limit";

import type { EngineCapabilities } from "../config-schemas";
import type { GenerationOutcome, ProviderManager } from "../llm/provider-manager";
import type { LLMMessage } from "../llm/provider";
import { debugLog } from "./debug";
import { analyzeSourceHeuristically } from "./evidence-heuristic";
import { DEFAULT_MAX_CONTENT_CHARS, buildEvidenceMessages, parseEvidenceAnalysis } from "./evidence-prompt";
import type { Claim, Evidence, Source } from "./types";

export const EVIDENCE_GENERATION = {
  agentName: "oracle",
  temperature: 0.1,
  maxOutputTokens: 400,
} as const;

export type AnalyzerCapabilities = Pick<EngineCapabilities, "ensembleEnabled" | "votingMethod" | "analysisConcurrency">;

export interface EvidenceAnalyzerOptions {
  capabilities?: Partial<AnalyzerCapabilities>;
  maxContentChars?: number;
  agentName?: string;
}

const DEFAULT_ANALYZER_CAPABILITIES: AnalyzerCapabilities = {
  ensembleEnabled: false,
  votingMethod: "weighted",
  analysisConcurrency: 1,
};

export class EvidenceAnalyzer {
  private readonly manager: ProviderManager | null;
  private readonly capabilities: AnalyzerCapabilities;
  private readonly maxContentChars: number;
  private readonly agentName: string;

  constructor(manager: ProviderManager | null, options: EvidenceAnalyzerOptions = {}) {
    this.manager = manager;
    this.capabilities = { ...DEFAULT_ANALYZER_CAPABILITIES, ...options.capabilities };
    this.maxContentChars = options.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS;
    this.agentName = options.agentName ?? EVIDENCE_GENERATION.agentName;
  }

  /** True when at least one registered provider can be called. */
  hasLanguageModel(): boolean {
    return this.manager !== null && this.manager.getAvailableProviders().some((p) => p.available);
  }

  async analyze(claim: Claim, sources: readonly Source[]): Promise<Evidence[]> {
    if (sources.length === 0) return [];

    if (!this.hasLanguageModel()) {
      console.warn(`[EvidenceAnalyzer] No LLM provider available; using basic analysis for ${sources.length} sources`);
      return sources.map((source) => analyzeSourceHeuristically(claim, source, "no provider available"));
    }

    const limit = pLimit(Math.max(1, this.capabilities.analysisConcurrency));
    // Promise.all keeps input order even when calls finish out of order
    return Promise.all(sources.map((source) => limit(() => this.analyzeSource(claim, source))));
  }

  /** One routed call with its single fallback, or one ensemble round. Failures are not retried. */
  private requestAnalysis(manager: ProviderManager, messages: LLMMessage[]): Promise<GenerationOutcome> {
    const generation = {
      temperature: EVIDENCE_GENERATION.temperature,
      maxOutputTokens: EVIDENCE_GENERATION.maxOutputTokens,
    };
    if (this.capabilities.ensembleEnabled) {
      return manager.tryGenerateEnsemble(messages, { ...generation, votingMethod: this.capabilities.votingMethod });
    }
    return manager.tryGenerate(messages, { ...generation, agentName: this.agentName });
  }

  async analyzeSource(claim: Claim, source: Source): Promise<Evidence> {
    if (!this.manager) {
      return analyzeSourceHeuristically(claim, source, "no provider available");
    }
    const messages = buildEvidenceMessages(claim, source, this.maxContentChars);
    const outcome = await this.requestAnalysis(this.manager, messages);

    if (!outcome.ok) {
      console.warn(
        `[EvidenceAnalyzer] LLM analysis failed for "${source.title}": ${outcome.error.message}, falling back to basic analysis`,
      );
      return analyzeSourceHeuristically(claim, source, outcome.error.message);
    }

    const { response } = outcome;
    const { analysis, missingFields } = parseEvidenceAnalysis(response.content);
    if (missingFields.length > 0) {
      debugLog(`[EvidenceAnalyzer] Incomplete analysis for "${source.title}"`, {
        missingFields,
        provider: response.providerName,
        content: response.content,
      });
    }

    const ensembleSize = typeof response.metadata.ensembleSize === "number" ? response.metadata.ensembleSize : undefined;
    const votingMethod = typeof response.metadata.votingMethod === "string" ? response.metadata.votingMethod : undefined;
    const evidence: Evidence = {
      source,
      supportingText: analysis.relevantText,
      supportsClaim: analysis.supports,
      confidence: analysis.confidence,
      extractionMethod: ensembleSize !== undefined ? "ensemble_analysis" : "llm_analysis",
      metadata: {
        provider: response.providerName,
        providerKind: response.provider,
        model: response.model,
        assessment: analysis.assessment,
        reasoning: analysis.reasoning,
        biasRiskScore: response.metadata.biasRiskScore,
        ...(ensembleSize !== undefined ? { ensembleSize, votingMethod } : {}),
        ...(missingFields.length > 0 ? { missingFields } : {}),
        ...(response.metadata.fallbackUsed ? { fallbackReason: `fallback after ${response.metadata.failedProvider}` } : {}),
      },
    };

    console.log(
      `[EvidenceAnalyzer] ${evidence.extractionMethod} for "${source.title}": ${analysis.assessment} (confidence: ${analysis.confidence.toFixed(2)})`,
    );
    return evidence;
  }
}
