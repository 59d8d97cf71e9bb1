/**
 * Provider Manager
 *
 * Routes generation requests across the registered providers:
 * explicit name → agent mapping → bias-aware safe allowlist → global
 * preference order. A failed call gets exactly one fallback on a provider of
 * a different kind. Also runs concurrent ensembles and pre-flight cost
 * estimates.
 *
 * The registry is built once and never mutated; per-provider counters live in
 * {@link ProviderStats}.
 *
 * @module llm/provider-manager
 */

import { DEFAULT_ROUTING_CONFIG, type EngineConfig, type RoutingConfig, type VotingMethod } from "../config-schemas";
import { classifyError } from "../error-classification";
import { BiasRiskAssessor, DEFAULT_BIAS_POLICY } from "./bias-risk";
import { estimateTextCost } from "./cost";
import {
  DEFAULT_QUALITY_CONFIG,
  scoreResponseQuality,
  selectEnsembleWinner,
  type EnsembleCandidate,
  type ResponseQualityConfig,
} from "./ensemble";
import {
  GenerationError,
  NoProviderAvailableError,
  ProviderUnavailableError,
  errorMessage,
  type ProviderCallError,
} from "./errors";
import type {
  GenerationOptions,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  ProviderKind,
  ResponseMetadata,
} from "./provider";
import { ProviderStats, type ProviderPerformance } from "./provider-stats";
import { agentProviderName, createProvider, planProviders, type ProviderFactory } from "./providers";

// ============================================================================
// TYPES
// ============================================================================

export interface ProviderEntry {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  readonly provider: LLMProvider;
}

export interface ProviderInfo {
  name: string;
  kind: ProviderKind;
  model: string;
  available: boolean;
  successRate: number;
  requests: number;
}

export interface SelectionRequest {
  providerName?: string;
  agentName?: string;
  biasRisk?: number;
}

export interface ManagerGenerateOptions extends GenerationOptions {
  agentName?: string;
  providerName?: string;
}

export interface EnsembleOptions extends GenerationOptions {
  providerNames?: readonly string[];
  votingMethod?: VotingMethod;
}

export type GenerationOutcome = { ok: true; response: LLMResponse } | { ok: false; error: ProviderCallError };

export interface ProviderManagerOptions {
  routing?: RoutingConfig;
  biasAssessor?: BiasRiskAssessor;
  stats?: ProviderStats;
  qualityConfig?: ResponseQualityConfig;
}

function splitGenerationOptions(options: GenerationOptions): GenerationOptions {
  return {
    temperature: options.temperature,
    maxOutputTokens: options.maxOutputTokens,
    timeoutMs: options.timeoutMs,
  };
}

function toProviderCallError(error: unknown, providerName: string, kind: ProviderKind | null): ProviderCallError {
  if (error instanceof GenerationError || error instanceof NoProviderAvailableError) return error;
  const classified = classifyError(error);
  return new GenerationError(`${providerName} generation failed: ${classified.message}`, {
    providerName,
    providerKind: kind,
    category: classified.category,
    cause: error,
  });
}

// ============================================================================
// MANAGER
// ============================================================================

export class ProviderManager {
  private readonly registry: ReadonlyMap<string, ProviderEntry>;
  private readonly routing: RoutingConfig;
  private readonly biasAssessor: BiasRiskAssessor;
  private readonly stats: ProviderStats;
  private readonly qualityConfig: ResponseQualityConfig;

  constructor(providers: readonly LLMProvider[], options: ProviderManagerOptions = {}) {
    const registry = new Map<string, ProviderEntry>();
    for (const provider of providers) {
      if (registry.has(provider.name)) {
        console.warn(`[ProviderManager] Duplicate provider name ${provider.name}; keeping the last registration`);
      }
      registry.set(provider.name, {
        name: provider.name,
        kind: provider.kind,
        model: provider.model,
        provider,
      });
    }
    this.registry = registry;
    this.routing = options.routing ?? DEFAULT_ROUTING_CONFIG;
    this.biasAssessor = options.biasAssessor ?? new BiasRiskAssessor();
    this.stats = options.stats ?? new ProviderStats();
    this.qualityConfig = options.qualityConfig ?? DEFAULT_QUALITY_CONFIG;
  }

  /**
   * Build providers from configuration, probe each once, and register the
   * ones that answered. Skipped entries are logged, never thrown.
   */
  static async fromConfig(config: EngineConfig, factory: ProviderFactory = createProvider): Promise<ProviderManager> {
    const plan = planProviders(config);
    for (const { name, reason } of plan.skipped) {
      console.warn(`[ProviderManager] ${new ProviderUnavailableError(name, reason).message}`);
    }

    const providers = plan.settings.map(factory);
    const probed = await Promise.all(
      providers.map(async (provider) => ({ provider, available: await provider.initialize() })),
    );

    const available: LLMProvider[] = [];
    for (const { provider, available: ok } of probed) {
      if (ok) {
        available.push(provider);
      } else {
        console.warn(
          `[ProviderManager] ${new ProviderUnavailableError(provider.name, "availability probe failed").message}`,
        );
      }
    }

    console.log(`[ProviderManager] Registered ${available.length} of ${providers.length} configured providers`);
    return new ProviderManager(available, {
      routing: config.routing,
      biasAssessor: new BiasRiskAssessor(config.biasPolicy ?? DEFAULT_BIAS_POLICY),
    });
  }

  // ==========================================================================
  // SELECTION
  // ==========================================================================

  private usable(name: string): ProviderEntry | null {
    const entry = this.registry.get(name);
    return entry && entry.provider.isAvailable() ? entry : null;
  }

  private isElevated(biasRisk: number): boolean {
    return biasRisk >= this.routing.biasRiskThreshold;
  }

  /** Candidate names in routing order, safe allowlist first when risk is elevated. */
  private routingOrder(biasRisk: number): string[] {
    const order = this.isElevated(biasRisk)
      ? [...this.routing.safeProviders, ...this.routing.preferenceOrder]
      : [...this.routing.preferenceOrder];
    return Array.from(new Set(order));
  }

  selectProvider(request: SelectionRequest = {}): LLMProvider {
    const biasRisk = request.biasRisk ?? 0;

    if (request.providerName) {
      const explicit = this.usable(request.providerName);
      if (explicit) return explicit.provider;
    }

    if (request.agentName) {
      const mapped = this.usable(agentProviderName(request.agentName));
      if (mapped) return mapped.provider;
    }

    if (this.isElevated(biasRisk)) {
      for (const name of this.routing.safeProviders) {
        const entry = this.usable(name);
        if (entry) return entry.provider;
      }
      throw new NoProviderAvailableError(
        `No bias-safe LLM provider available (bias risk ${biasRisk.toFixed(2)})`,
      );
    }

    for (const name of this.routing.preferenceOrder) {
      const entry = this.usable(name);
      if (entry) return entry.provider;
    }

    throw new NoProviderAvailableError();
  }

  /** Next provider after a failure, never of the failed provider's kind. */
  private selectFallback(failed: LLMProvider, biasRisk: number): LLMProvider | null {
    for (const name of this.routingOrder(biasRisk)) {
      const entry = this.usable(name);
      if (entry && entry.kind !== failed.kind) return entry.provider;
    }
    return null;
  }

  // ==========================================================================
  // GENERATION
  // ==========================================================================

  private async callProvider(
    provider: LLMProvider,
    messages: readonly LLMMessage[],
    options: GenerationOptions,
  ): Promise<LLMResponse> {
    try {
      const response = await provider.generate(messages, options);
      this.stats.recordSuccess(provider.name, response.usage.processingTimeMs, response.usage.estimatedCost);
      return response;
    } catch (error) {
      const callError = toProviderCallError(error, provider.name, provider.kind);
      const category = callError instanceof GenerationError ? callError.category : "unknown";
      this.stats.recordFailure(provider.name, callError.message, category);
      throw callError;
    }
  }

  private assessMessages(messages: readonly LLMMessage[]): { biasRisk: number; userText: string } {
    const userText = messages
      .filter((m) => m.role !== "system")
      .map((m) => m.content)
      .join("\n");
    const biasRisk = this.biasAssessor.assess(messages.map((m) => m.content).join("\n"));
    return { biasRisk, userText };
  }

  private annotate(
    response: LLMResponse,
    biasRisk: number,
    userText: string,
    extra: Record<string, unknown>,
  ): LLMResponse {
    const metadata: ResponseMetadata = { ...response.metadata, ...extra, biasRiskScore: biasRisk };
    if (this.isElevated(biasRisk)) {
      metadata.responseBias = this.biasAssessor.assessResponseBias(userText, response.content);
    }
    return { ...response, metadata };
  }

  /**
   * Generate with routing and a single fallback. Rejects with
   * NoProviderAvailableError when nothing can be selected, or with the
   * GenerationError of the last attempt.
   */
  async generate(messages: readonly LLMMessage[], options: ManagerGenerateOptions = {}): Promise<LLMResponse> {
    const { biasRisk, userText } = this.assessMessages(messages);
    const primary = this.selectProvider({
      providerName: options.providerName,
      agentName: options.agentName,
      biasRisk,
    });
    const generationOptions = splitGenerationOptions(options);

    try {
      const response = await this.callProvider(primary, messages, generationOptions);
      return this.annotate(response, biasRisk, userText, { fallbackUsed: false });
    } catch (error) {
      const fallback = this.selectFallback(primary, biasRisk);
      if (!fallback) throw error;

      console.warn(
        `[ProviderManager] ${primary.name} failed (${errorMessage(error)}); falling back to ${fallback.name}`,
      );
      const response = await this.callProvider(fallback, messages, generationOptions);
      return this.annotate(response, biasRisk, userText, {
        fallbackUsed: true,
        failedProvider: primary.name,
      });
    }
  }

  /** Same routing as {@link generate}, with the failure returned instead of thrown. */
  async tryGenerate(messages: readonly LLMMessage[], options: ManagerGenerateOptions = {}): Promise<GenerationOutcome> {
    try {
      return { ok: true, response: await this.generate(messages, options) };
    } catch (error) {
      return { ok: false, error: toProviderCallError(error, options.providerName ?? "router", null) };
    }
  }

  private selectEnsembleMembers(providerNames: readonly string[] | undefined, biasRisk: number): LLMProvider[] {
    const names = providerNames && providerNames.length > 0 ? providerNames : this.routingOrder(biasRisk);
    const members: LLMProvider[] = [];
    const kinds = new Set<ProviderKind>();
    for (const name of names) {
      if (members.length >= this.routing.maxEnsembleSize) break;
      const entry = this.usable(name);
      if (!entry || kinds.has(entry.kind)) continue;
      kinds.add(entry.kind);
      members.push(entry.provider);
    }
    return members;
  }

  /**
   * Query up to `maxEnsembleSize` providers of distinct kinds concurrently and
   * return the single best-scoring response.
   */
  async generateEnsemble(messages: readonly LLMMessage[], options: EnsembleOptions = {}): Promise<LLMResponse> {
    const votingMethod = options.votingMethod ?? "weighted";
    const { biasRisk, userText } = this.assessMessages(messages);
    const members = this.selectEnsembleMembers(options.providerNames, biasRisk);
    if (members.length === 0) {
      throw new NoProviderAvailableError("No available LLM provider found for ensemble");
    }

    const generationOptions = splitGenerationOptions(options);
    const settled = await Promise.allSettled(
      members.map((provider) => this.callProvider(provider, messages, generationOptions)),
    );

    const candidates: EnsembleCandidate[] = [];
    const failures: string[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        candidates.push({
          response: outcome.value,
          quality: scoreResponseQuality(outcome.value.content, this.qualityConfig),
          successRate: this.stats.successRate(outcome.value.providerName),
        });
      } else {
        failures.push(`${members[i]?.name ?? "unknown"}: ${errorMessage(outcome.reason)}`);
      }
    });

    const vote = selectEnsembleWinner(candidates, votingMethod);
    if (!vote) {
      throw new GenerationError(`All ensemble providers failed: ${failures.join("; ")}`, {
        providerName: "ensemble",
        category: "provider_outage",
      });
    }
    if (failures.length > 0) {
      console.warn(`[ProviderManager] Ensemble partial failure: ${failures.join("; ")}`);
    }

    return this.annotate(vote.winner.response, biasRisk, userText, {
      fallbackUsed: false,
      ensembleSize: candidates.length,
      votingMethod,
      ensembleProviders: members.map((p) => p.name),
      ensembleScores: vote.scores,
    });
  }

  /** Same as {@link generateEnsemble}, with the failure returned instead of thrown. */
  async tryGenerateEnsemble(messages: readonly LLMMessage[], options: EnsembleOptions = {}): Promise<GenerationOutcome> {
    try {
      return { ok: true, response: await this.generateEnsemble(messages, options) };
    } catch (error) {
      return { ok: false, error: toProviderCallError(error, "ensemble", null) };
    }
  }

  // ==========================================================================
  // INTROSPECTION
  // ==========================================================================

  /** Linear pre-flight estimate; unknown provider ⇒ 0. */
  estimateCost(text: string, providerName?: string): number {
    if (!providerName) return 0;
    const entry = this.registry.get(providerName);
    return entry ? estimateTextCost(text, entry.kind) : 0;
  }

  getAvailableProviders(): ProviderInfo[] {
    return Array.from(this.registry.values()).map((entry) => {
      const performance = this.stats.get(entry.name);
      return {
        name: entry.name,
        kind: entry.kind,
        model: entry.model,
        available: entry.provider.isAvailable(),
        successRate: this.stats.successRate(entry.name),
        requests: performance.requests,
      };
    });
  }

  getProviderForAgent(agentName: string): string | null {
    const mapped = this.usable(agentProviderName(agentName));
    if (mapped) return mapped.name;
    for (const name of this.routing.preferenceOrder) {
      if (this.usable(name)) return name;
    }
    return null;
  }

  isProviderAvailable(name: string): boolean {
    return this.usable(name) !== null;
  }

  getPerformance(name: string): ProviderPerformance {
    return this.stats.get(name);
  }

  getProviderSummary(): string {
    const providers = this.getAvailableProviders().filter((p) => p.available);
    if (providers.length === 0) return "No LLM providers available";

    const byKind = new Map<ProviderKind, string[]>();
    for (const p of providers) {
      const list = byKind.get(p.kind) ?? [];
      list.push(`${p.name} (${p.model})`);
      byKind.set(p.kind, list);
    }

    const lines = [`${providers.length} LLM providers available:`];
    for (const [kind, instances] of byKind) {
      lines.push(`  - ${kind.toUpperCase()}: ${instances.join(", ")}`);
    }
    return lines.join("\n");
  }
}
