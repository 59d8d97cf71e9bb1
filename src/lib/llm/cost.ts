/**
 * Provider Cost Tables
 *
 * Rough USD pricing used for per-call usage metadata and for the
 * router's pre-flight estimate. Local inference is free.
 *
 * @module llm/cost
 */

import type { ProviderKind } from "./provider";

export interface TokenRates {
  /** USD per 1k input tokens */
  input: number;
  /** USD per 1k output tokens */
  output: number;
}

/** Average tokens per English word, used when no tokenizer is at hand. */
export const TOKENS_PER_WORD = 1.3;

/** Blended per-1k-token rate by backend kind, for quick estimates. */
export const BLENDED_RATE_PER_1K: Record<ProviderKind, number> = {
  ollama: 0,
  anthropic: 0.009,
  openai: 0.002,
  google: 0.0007,
  mistral: 0.002,
};

const DEFAULT_MODEL_RATES: Record<ProviderKind, TokenRates> = {
  ollama: { input: 0, output: 0 },
  anthropic: { input: 0.003, output: 0.015 },
  openai: { input: 0.00015, output: 0.0006 },
  google: { input: 0.000075, output: 0.0003 },
  mistral: { input: 0.0002, output: 0.0006 },
};

const MODEL_RATES: Record<string, TokenRates> = {
  "claude-3-5-sonnet-20241022": { input: 0.003, output: 0.015 },
  "claude-sonnet-4-20250514": { input: 0.003, output: 0.015 },
  "claude-3-5-haiku-20241022": { input: 0.001, output: 0.005 },
  "claude-3-haiku-20240307": { input: 0.00025, output: 0.00125 },
  "gpt-4o": { input: 0.0025, output: 0.01 },
  "gpt-4o-mini": { input: 0.00015, output: 0.0006 },
  "gemini-1.5-flash": { input: 0.000075, output: 0.0003 },
  "gemini-1.5-pro": { input: 0.00125, output: 0.005 },
  "mistral-small-latest": { input: 0.0002, output: 0.0006 },
  "mistral-large-latest": { input: 0.002, output: 0.006 },
};

export function getTokenRates(kind: ProviderKind, model: string): TokenRates {
  if (kind === "ollama") return DEFAULT_MODEL_RATES.ollama;
  return MODEL_RATES[model] ?? DEFAULT_MODEL_RATES[kind];
}

export function calculateUsageCost(
  kind: ProviderKind,
  model: string,
  promptTokens: number,
  completionTokens: number,
): number {
  const rates = getTokenRates(kind, model);
  const cost = (promptTokens / 1000) * rates.input + (completionTokens / 1000) * rates.output;
  return Math.round(cost * 1_000_000) / 1_000_000;
}

export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return words * TOKENS_PER_WORD;
}

/** Linear pre-flight estimate: words × tokens/word × blended rate. */
export function estimateTextCost(text: string, kind: ProviderKind): number {
  return (estimateTokens(text) / 1000) * BLENDED_RATE_PER_1K[kind];
}
