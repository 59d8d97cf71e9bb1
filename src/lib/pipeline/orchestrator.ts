/**
 * Claim Pipeline
 *
 * Runs a claim through Herald → Illuminator → Logician → Seeker → Oracle
 * and reports the total processing time. Every failure becomes an ERROR
 * result; neither entry point rejects.
 *
 * @module pipeline/orchestrator
 */

import { EvidenceAnalyzer } from "../analyzer/evidence-analyzer";
import { OracleAgent } from "../analyzer/oracle-agent";
import { createClaim, type Claim, type Source, type VerificationResult } from "../analyzer/types";
import type { LoadedEngineConfig } from "../config-loader";
import { BiasRiskAssessor, DEFAULT_BIAS_POLICY } from "../llm/bias-risk";
import { errorMessage } from "../llm/errors";
import { ProviderManager } from "../llm/provider-manager";
import { createProvider, type ProviderFactory } from "../llm/providers";
import { executeClaimsInParallel } from "./parallel-claims";
import {
  HeraldStage,
  IlluminatorStage,
  LogicianStage,
  SourceAttachmentStage,
  type ClaimStage,
  type SourceProvider,
} from "./stages";

export const BATCH_TIMEOUT_MESSAGE = "Batch timed out";

export interface ClaimInput {
  text: string;
  id?: string;
  sources?: Source[];
}

export interface BatchSettings {
  parallel: boolean;
  maxWorkers: number;
  timeoutMs: number;
}

export interface ClaimPipelineOptions {
  /** Stages run before the Oracle; defaults to the rule-based stages */
  stages?: readonly ClaimStage[];
  batch?: Partial<BatchSettings>;
}

export interface ClaimPipelineDependencies {
  sourceProvider?: SourceProvider;
  providerFactory?: ProviderFactory;
  /** Skip provider construction entirely (heuristic analysis only) */
  manager?: ProviderManager | null;
}

const DEFAULT_BATCH_SETTINGS: BatchSettings = {
  parallel: false,
  maxWorkers: 3,
  timeoutMs: 600_000,
};

function toClaimInput(input: string | ClaimInput): ClaimInput {
  return typeof input === "string" ? { text: input } : input;
}

function errorResult(claimText: string, message: string, startTime: number): VerificationResult {
  return {
    originalClaim: claimText,
    verdict: "ERROR",
    confidence: 0,
    evidenceSummary: `Pipeline error: ${message}`,
    sources: [],
    processingTime: (Date.now() - startTime) / 1000,
    timestamp: new Date(),
    errorMessage: message,
  };
}

export class ClaimPipeline {
  private readonly stages: readonly ClaimStage[];
  private readonly oracle: OracleAgent;
  private readonly batch: BatchSettings;

  constructor(oracle: OracleAgent, options: ClaimPipelineOptions = {}) {
    this.oracle = oracle;
    this.stages = options.stages ?? [
      new HeraldStage(),
      new IlluminatorStage(),
      new LogicianStage(),
      new SourceAttachmentStage(),
    ];
    this.batch = { ...DEFAULT_BATCH_SETTINGS, ...options.batch };
  }

  /**
   * Wire the full pipeline from a loaded configuration.
   */
  static async create(loaded: LoadedEngineConfig, deps: ClaimPipelineDependencies = {}): Promise<ClaimPipeline> {
    const { config, capabilities } = loaded;
    const manager =
      deps.manager !== undefined
        ? deps.manager
        : await ProviderManager.fromConfig(config, deps.providerFactory ?? createProvider);

    const analyzer = new EvidenceAnalyzer(manager, {
      capabilities,
      maxContentChars: config.processing.maxContentChars,
    });
    const oracle = new OracleAgent(analyzer, {
      verdictConfig: config.verdict,
      confidenceThreshold: config.processing.confidenceThreshold,
      biasAssessor: new BiasRiskAssessor(config.biasPolicy ?? DEFAULT_BIAS_POLICY),
    });

    return new ClaimPipeline(oracle, {
      stages: [
        new HeraldStage(),
        new IlluminatorStage(),
        new LogicianStage(),
        new SourceAttachmentStage(deps.sourceProvider ?? null, {
          maxSourcesPerClaim: config.processing.maxSourcesPerClaim,
        }),
      ],
      batch: {
        parallel: capabilities.parallelEnabled,
        maxWorkers: capabilities.maxWorkers,
        timeoutMs: config.parallel.batchTimeoutMs,
      },
    });
  }

  async processClaim(input: string | ClaimInput): Promise<VerificationResult> {
    const { text, id, sources } = toClaimInput(input);
    const startTime = Date.now();

    try {
      let claim: Claim = { ...createClaim(text, id), sources: sources ?? [] };
      for (const stage of this.stages) {
        console.log(`[Pipeline] Stage ${stage.name}`);
        claim = await stage.process(claim);
      }

      const result = await this.oracle.process(claim);
      const totalTime = (Date.now() - startTime) / 1000;
      console.log(`[Pipeline] Completed in ${totalTime.toFixed(2)}s with verdict: ${result.verdict}`);
      return { ...result, processingTime: totalTime };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Pipeline] Processing error: ${message}`);
      return errorResult(text, message, startTime);
    }
  }

  /**
   * Process claims sequentially, or through the worker pool when parallel
   * processing is enabled. Results keep input order.
   */
  async processBatch(inputs: readonly (string | ClaimInput)[]): Promise<VerificationResult[]> {
    const claims = inputs.map(toClaimInput);
    const startTime = Date.now();
    const maxConcurrency = this.batch.parallel ? this.batch.maxWorkers : 1;
    console.log(`[Pipeline] Processing batch of ${claims.length} claims (workers: ${maxConcurrency})`);

    const outcomes = await executeClaimsInParallel(
      claims.map((claim, index) => ({
        id: String(index),
        execute: () => this.processClaim(claim),
      })),
      {
        maxConcurrency,
        timeoutMs: this.batch.timeoutMs,
        onProgress: (completed, total) => console.log(`[Pipeline] Progress: ${completed}/${total} claims`),
      },
    );

    return claims.map((claim, index) => {
      const outcome = outcomes.get(String(index));
      if (outcome?.status === "fulfilled") return outcome.value;
      if (outcome?.status === "rejected") return errorResult(claim.text, errorMessage(outcome.reason), startTime);
      return errorResult(claim.text, BATCH_TIMEOUT_MESSAGE, startTime);
    });
  }
}
