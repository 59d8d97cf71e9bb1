/**
 * Configuration Schemas
 *
 * Zod schemas for validating and canonicalizing engine configuration.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

import type { ProviderKind } from "./llm/provider";

// ============================================================================
// PROVIDERS
// ============================================================================

export const ProviderKindSchema = z.enum(["ollama", "anthropic", "google", "openai", "mistral"]);

export const PROVIDER_CONFIG_KEYS = ProviderKindSchema.options;

/**
 * Agent mappings accept vendor nicknames ("claude", "gemini") as well as kinds.
 */
export const ProviderAliasSchema = z.enum([
  "ollama",
  "anthropic",
  "claude",
  "google",
  "gemini",
  "openai",
  "mistral",
]);

export type ProviderAlias = z.infer<typeof ProviderAliasSchema>;

export function normalizeProviderAlias(alias: ProviderAlias): ProviderKind {
  if (alias === "claude") return "anthropic";
  if (alias === "gemini") return "google";
  return alias;
}

export const ProviderConfigSchema = z.object({
  enabled: z.boolean(),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().min(1).max(32000),
  timeoutMs: z.number().int().min(1000).max(600_000),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const AgentMappingSchema = z.object({
  provider: ProviderAliasSchema,
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).max(32000).optional(),
});

export type AgentMapping = z.infer<typeof AgentMappingSchema>;

// ============================================================================
// ROUTING, VERDICT, BIAS POLICY
// ============================================================================

export const RoutingConfigSchema = z.object({
  /** Bias risk at or above which only the safe allowlist is considered */
  biasRiskThreshold: z.number().min(0).max(1),
  /** Hosted-vendor allowlist in vendor preference order */
  safeProviders: z.array(z.string().min(1)),
  /** Global preference order: local first for cost, then vendors */
  preferenceOrder: z.array(z.string().min(1)),
  /** Max providers consulted by one ensemble call */
  maxEnsembleSize: z.number().int().min(1).max(5),
});

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;

export const VerdictConfigSchema = z.object({
  supportThreshold: z.number().min(0.5).max(1),
  contradictThreshold: z.number().min(0).max(0.5),
  ensembleBoost: z.number().min(1).max(3),
  diversityTarget: z.number().int().min(1).max(20),
  maxConfidence: z.number().min(0).max(1),
  weights: z.object({
    decisiveness: z.number().min(0).max(1),
    quality: z.number().min(0).max(1),
    diversity: z.number().min(0).max(1),
  }),
});

export type VerdictConfig = z.infer<typeof VerdictConfigSchema>;

export const BiasPolicySchema = z.object({
  sensitiveKeywords: z.array(z.string().min(1)),
  /** Regex sources matched against lower-cased text */
  highRiskPatterns: z.array(z.string().min(1)),
  avoidancePhrases: z.array(z.string().min(1)),
  confirmationTerms: z.array(z.string().min(1)),
});

export type BiasPolicy = z.infer<typeof BiasPolicySchema>;

// ============================================================================
// ENGINE CONFIG
// ============================================================================

export const VotingMethodSchema = z.enum(["weighted", "quality"]);
export type VotingMethod = z.infer<typeof VotingMethodSchema>;

export const EngineConfigSchema = z.object({
  providers: z.object({
    ollama: ProviderConfigSchema,
    anthropic: ProviderConfigSchema,
    google: ProviderConfigSchema,
    openai: ProviderConfigSchema,
    mistral: ProviderConfigSchema,
  }),
  agentMapping: z.record(z.string(), AgentMappingSchema),
  processing: z.object({
    confidenceThreshold: z.number().min(0).max(1),
    maxSourcesPerClaim: z.number().int().min(1).max(50),
    maxContentChars: z.number().int().min(100).max(20000),
    analysisConcurrency: z.number().int().min(1).max(16),
  }),
  ensemble: z.object({
    enabled: z.boolean(),
    votingMethod: VotingMethodSchema,
  }),
  parallel: z.object({
    enabled: z.boolean(),
    maxWorkers: z.number().int().min(1).max(32),
    batchTimeoutMs: z.number().int().min(1000),
  }),
  routing: RoutingConfigSchema,
  verdict: VerdictConfigSchema,
  biasPolicy: BiasPolicySchema.optional(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Optional features resolved once at load time so downstream code never
 * probes the config shape at runtime.
 */
export interface EngineCapabilities {
  ensembleEnabled: boolean;
  votingMethod: VotingMethod;
  parallelEnabled: boolean;
  maxWorkers: number;
  analysisConcurrency: number;
}

export function resolveCapabilities(config: EngineConfig): EngineCapabilities {
  return {
    ensembleEnabled: config.ensemble.enabled,
    votingMethod: config.ensemble.votingMethod,
    parallelEnabled: config.parallel.enabled,
    maxWorkers: config.parallel.enabled ? config.parallel.maxWorkers : 1,
    analysisConcurrency: config.processing.analysisConcurrency,
  };
}

// ============================================================================
// DEFAULTS
// ============================================================================

const HOSTED_TIMEOUT_MS = 30_000;
const LOCAL_TIMEOUT_MS = 60_000;

export const DEFAULT_VERDICT_CONFIG: VerdictConfig = {
  supportThreshold: 0.7,
  contradictThreshold: 0.3,
  ensembleBoost: 1.2,
  diversityTarget: 3,
  maxConfidence: 0.95,
  weights: {
    decisiveness: 0.5,
    quality: 0.3,
    diversity: 0.2,
  },
};

export const DEFAULT_ROUTING_CONFIG: RoutingConfig = {
  biasRiskThreshold: 0.3,
  safeProviders: ["claude_default", "openai_default", "gemini_default"],
  preferenceOrder: ["ollama_default", "claude_default", "gemini_default", "openai_default", "mistral_default"],
  maxEnsembleSize: 3,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  providers: {
    ollama: {
      enabled: true,
      baseUrl: "http://localhost:11434",
      model: "llama3.2:latest",
      temperature: 0.1,
      maxTokens: 500,
      timeoutMs: LOCAL_TIMEOUT_MS,
    },
    anthropic: {
      enabled: true,
      model: "claude-3-5-sonnet-20241022",
      temperature: 0.1,
      maxTokens: 500,
      timeoutMs: HOSTED_TIMEOUT_MS,
    },
    google: {
      enabled: true,
      model: "gemini-1.5-flash",
      temperature: 0.1,
      maxTokens: 500,
      timeoutMs: HOSTED_TIMEOUT_MS,
    },
    openai: {
      enabled: true,
      model: "gpt-4o-mini",
      temperature: 0.1,
      maxTokens: 500,
      timeoutMs: HOSTED_TIMEOUT_MS,
    },
    mistral: {
      enabled: true,
      model: "mistral-small-latest",
      temperature: 0.1,
      maxTokens: 500,
      timeoutMs: HOSTED_TIMEOUT_MS,
    },
  },
  agentMapping: {},
  processing: {
    confidenceThreshold: 0.7,
    maxSourcesPerClaim: 5,
    maxContentChars: 1500,
    analysisConcurrency: 1,
  },
  ensemble: {
    enabled: false,
    votingMethod: "weighted",
  },
  parallel: {
    enabled: false,
    maxWorkers: 3,
    batchTimeoutMs: 600_000,
  },
  routing: DEFAULT_ROUTING_CONFIG,
  verdict: DEFAULT_VERDICT_CONFIG,
};
