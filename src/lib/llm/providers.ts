/**
 * Provider Factory
 *
 * Turns engine configuration into provider settings and instantiates the
 * matching AI SDK language models.
 *
 * @module llm/providers
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createMistral } from "@ai-sdk/mistral";
import { createOpenAI } from "@ai-sdk/openai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { LanguageModel } from "ai";

import { normalizeProviderAlias, type EngineConfig, type ProviderConfig } from "../config-schemas";
import {
  AiSdkProvider,
  PROVIDER_KINDS,
  type AvailabilityProbe,
  type LLMProvider,
  type ProviderKind,
  type ProviderSettings,
} from "./provider";

/** Registration name of the default entry for each backend kind. */
export const DEFAULT_PROVIDER_NAMES: Record<ProviderKind, string> = {
  ollama: "ollama_default",
  anthropic: "claude_default",
  google: "gemini_default",
  openai: "openai_default",
  mistral: "mistral_default",
};

const OLLAMA_PROBE_TIMEOUT_MS = 5000;

export function agentProviderName(agentName: string): string {
  return `${agentName}_llm`;
}

function hasUsableKey(apiKey: string | undefined): apiKey is string {
  if (!apiKey) return false;
  const key = apiKey.trim();
  return key.length > 0 && !/^your_.*_here$/i.test(key);
}

function toSettings(name: string, kind: ProviderKind, config: ProviderConfig): ProviderSettings {
  return {
    name,
    kind,
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.timeoutMs,
  };
}

export interface ProviderBuildPlan {
  settings: ProviderSettings[];
  /** Entries skipped before instantiation, with the reason */
  skipped: Array<{ name: string; reason: string }>;
}

/**
 * Resolve which providers should be instantiated: one default entry per
 * enabled backend with usable credentials, plus one `{agent}_llm` entry per
 * agent mapping whose base backend made it through.
 */
export function planProviders(config: EngineConfig): ProviderBuildPlan {
  const settings: ProviderSettings[] = [];
  const skipped: ProviderBuildPlan["skipped"] = [];
  const base = new Map<ProviderKind, ProviderSettings>();

  for (const kind of PROVIDER_KINDS) {
    const name = DEFAULT_PROVIDER_NAMES[kind];
    const providerConfig = config.providers[kind];
    if (!providerConfig.enabled) {
      skipped.push({ name, reason: "disabled in configuration" });
      continue;
    }
    if (kind !== "ollama" && !hasUsableKey(providerConfig.apiKey)) {
      skipped.push({ name, reason: "no API key configured" });
      continue;
    }
    const entry = toSettings(name, kind, providerConfig);
    base.set(kind, entry);
    settings.push(entry);
  }

  for (const [agentName, mapping] of Object.entries(config.agentMapping)) {
    const kind = normalizeProviderAlias(mapping.provider);
    const baseSettings = base.get(kind);
    const name = agentProviderName(agentName);
    if (!baseSettings) {
      skipped.push({ name, reason: `base provider ${DEFAULT_PROVIDER_NAMES[kind]} is not configured` });
      continue;
    }
    settings.push({
      ...baseSettings,
      name,
      model: mapping.model ?? baseSettings.model,
      temperature: mapping.temperature ?? baseSettings.temperature,
      maxTokens: mapping.maxTokens ?? baseSettings.maxTokens,
    });
  }

  return { settings, skipped };
}

// ============================================================================
// MODEL CONSTRUCTION
// ============================================================================

function ollamaBaseUrl(settings: ProviderSettings): string {
  return (settings.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
}

export function buildLanguageModel(settings: ProviderSettings): LanguageModel {
  switch (settings.kind) {
    case "anthropic":
      return createAnthropic({ apiKey: settings.apiKey, baseURL: settings.baseUrl })(settings.model);
    case "google":
      return createGoogleGenerativeAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl })(settings.model);
    case "mistral":
      return createMistral({ apiKey: settings.apiKey, baseURL: settings.baseUrl })(settings.model);
    case "openai":
      return createOpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl })(settings.model);
    case "ollama":
      // Ollama serves an OpenAI-compatible chat endpoint under /v1
      return createOpenAICompatible({ name: "ollama", baseURL: `${ollamaBaseUrl(settings)}/v1` })(settings.model);
  }
}

function listOllamaModels(body: unknown): string[] {
  if (typeof body !== "object" || body === null || !("models" in body) || !Array.isArray(body.models)) {
    return [];
  }
  const names: string[] = [];
  for (const model of body.models) {
    if (typeof model === "object" && model !== null && "name" in model && typeof model.name === "string") {
      names.push(model.name);
    }
  }
  return names;
}

/**
 * Hosted backends are considered live once credentials are present; the
 * local backend is asked for its model list.
 */
export function buildAvailabilityProbe(settings: ProviderSettings): AvailabilityProbe {
  if (settings.kind !== "ollama") {
    return async () => hasUsableKey(settings.apiKey);
  }

  return async () => {
    const response = await fetch(`${ollamaBaseUrl(settings)}/api/tags`, {
      signal: AbortSignal.timeout(OLLAMA_PROBE_TIMEOUT_MS),
    });
    if (!response.ok) {
      console.warn(`[Provider] ${settings.name}: Ollama responded with status ${response.status}`);
      return false;
    }
    const names = listOllamaModels(await response.json());
    if (!names.includes(settings.model)) {
      console.warn(
        `[Provider] ${settings.name}: model ${settings.model} not found in Ollama. Available models: ${names.join(", ") || "(none)"}`,
      );
    }
    return true;
  };
}

export type ProviderFactory = (settings: ProviderSettings) => LLMProvider;

export const createProvider: ProviderFactory = (settings) =>
  new AiSdkProvider(settings, buildLanguageModel(settings), buildAvailabilityProbe(settings));
