/**
 * LLM Provider Adapter
 *
 * Uniform interface over heterogeneous text-generation backends. Every
 * backend is driven through the AI SDK `generateText`; the adapter owns the
 * translation from the uniform message list to whatever shape a backend
 * needs (hoisted system prompt, mandatory output cap).
 *
 * @module llm/provider
 */

import { generateText, type LanguageModel, type ModelMessage } from "ai";

import { classifyError } from "../error-classification";
import { calculateUsageCost } from "./cost";
import { GenerationError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export type ProviderKind = "ollama" | "anthropic" | "google" | "openai" | "mistral";

export const PROVIDER_KINDS: readonly ProviderKind[] = ["ollama", "anthropic", "google", "openai", "mistral"];

export type MessageRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: MessageRole;
  content: string;
}

export interface GenerationOptions {
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCost: number;
  processingTimeMs: number;
}

export interface ResponseMetadata {
  finishReason?: string;
  responseId?: string;
  biasRiskScore?: number;
  fallbackUsed?: boolean;
  failedProvider?: string;
  [key: string]: unknown;
}

export interface LLMResponse {
  content: string;
  provider: ProviderKind;
  providerName: string;
  model: string;
  usage: LLMUsage;
  metadata: ResponseMetadata;
}

export interface ProviderSettings {
  /** Logical registration name, e.g. "claude_default" or "oracle_llm" */
  name: string;
  kind: ProviderKind;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens?: number;
  timeoutMs: number;
}

export interface LLMProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  /** One-time credential/liveness probe. The result is cached for the process lifetime. */
  initialize(): Promise<boolean>;
  isAvailable(): boolean;
  generate(messages: readonly LLMMessage[], options?: GenerationOptions): Promise<LLMResponse>;
}

// ============================================================================
// MESSAGE TRANSLATION
// ============================================================================

/** Anthropic rejects requests without an explicit output cap. */
export const ANTHROPIC_DEFAULT_MAX_TOKENS = 1000;

const HOISTS_SYSTEM_PROMPT: ReadonlySet<ProviderKind> = new Set(["anthropic", "google"]);

export interface BackendRequest {
  system?: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
}

function toModelMessage(message: LLMMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

/**
 * Translate the uniform message list into the request shape a backend kind expects.
 */
export function buildBackendRequest(
  kind: ProviderKind,
  messages: readonly LLMMessage[],
  maxOutputTokens?: number,
): BackendRequest {
  if (!HOISTS_SYSTEM_PROMPT.has(kind)) {
    return { messages: messages.map(toModelMessage), maxOutputTokens };
  }

  const systemParts = messages.filter((m) => m.role === "system").map((m) => m.content);
  const conversation = messages.filter((m) => m.role !== "system").map(toModelMessage);
  if (conversation.length === 0) {
    conversation.push({ role: "user", content: "Please respond." });
  }

  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    messages: conversation,
    maxOutputTokens: kind === "anthropic" ? (maxOutputTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS) : maxOutputTokens,
  };
}

// ============================================================================
// AI SDK PROVIDER
// ============================================================================

export type AvailabilityProbe = () => Promise<boolean>;

export class AiSdkProvider implements LLMProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;

  private readonly settings: ProviderSettings;
  private readonly languageModel: LanguageModel;
  private readonly probe: AvailabilityProbe;
  private available: boolean | null = null;

  constructor(settings: ProviderSettings, languageModel: LanguageModel, probe: AvailabilityProbe) {
    this.settings = settings;
    this.name = settings.name;
    this.kind = settings.kind;
    this.model = settings.model;
    this.languageModel = languageModel;
    this.probe = probe;
  }

  async initialize(): Promise<boolean> {
    if (this.available !== null) return this.available;
    try {
      this.available = await this.probe();
    } catch (error) {
      console.warn(`[Provider] ${this.name}: availability probe failed: ${classifyError(error).message}`);
      this.available = false;
    }
    return this.available;
  }

  isAvailable(): boolean {
    return this.available === true;
  }

  async generate(messages: readonly LLMMessage[], options: GenerationOptions = {}): Promise<LLMResponse> {
    if (!this.isAvailable()) {
      throw new GenerationError(`${this.name} is not available`, {
        providerName: this.name,
        providerKind: this.kind,
        category: "provider_outage",
      });
    }

    const request = buildBackendRequest(this.kind, messages, options.maxOutputTokens ?? this.settings.maxTokens);
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const startTime = Date.now();

    try {
      const result = await generateText({
        model: this.languageModel,
        system: request.system,
        messages: request.messages,
        temperature: options.temperature ?? this.settings.temperature,
        maxOutputTokens: request.maxOutputTokens,
        // Fallback is owned by the router; no hidden retries here
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });

      const content = result.text.trim();
      if (!content) {
        throw new GenerationError(`${this.name} returned an empty completion`, {
          providerName: this.name,
          providerKind: this.kind,
          category: "empty_response",
        });
      }

      const promptTokens = result.usage?.inputTokens ?? 0;
      const completionTokens = result.usage?.outputTokens ?? 0;
      const model = result.response?.modelId ?? this.model;

      return {
        content,
        provider: this.kind,
        providerName: this.name,
        model,
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: result.usage?.totalTokens ?? promptTokens + completionTokens,
          estimatedCost: calculateUsageCost(this.kind, this.model, promptTokens, completionTokens),
          processingTimeMs: Date.now() - startTime,
        },
        metadata: {
          finishReason: result.finishReason,
          responseId: result.response?.id,
        },
      };
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      const classified = classifyError(error);
      throw new GenerationError(`${this.name} generation failed: ${classified.message}`, {
        providerName: this.name,
        providerKind: this.kind,
        category: classified.category,
        cause: error,
      });
    }
  }
}
