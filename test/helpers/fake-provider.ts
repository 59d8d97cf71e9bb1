import type { GenerationOptions, LLMMessage, LLMProvider, LLMResponse, ProviderKind } from "@/lib/llm/provider";

export type FakeReply = string | Error | ((messages: readonly LLMMessage[]) => string | Error);

export interface FakeProviderOptions {
  model?: string;
  available?: boolean;
  /** Resolve after this many ms */
  delayMs?: number;
}

/** In-process LLMProvider that answers from a canned reply. */
export class FakeProvider implements LLMProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  readonly calls: Array<{ messages: readonly LLMMessage[]; options?: GenerationOptions }> = [];

  private reply: FakeReply;
  private readonly delayMs: number;
  private available: boolean;

  constructor(name: string, kind: ProviderKind, reply: FakeReply, options: FakeProviderOptions = {}) {
    this.name = name;
    this.kind = kind;
    this.reply = reply;
    this.model = options.model ?? `${kind}-test-model`;
    this.available = options.available ?? true;
    this.delayMs = options.delayMs ?? 0;
  }

  setReply(reply: FakeReply): void {
    this.reply = reply;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async initialize(): Promise<boolean> {
    return this.available;
  }

  isAvailable(): boolean {
    return this.available;
  }

  async generate(messages: readonly LLMMessage[], options?: GenerationOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    const result = typeof this.reply === "function" ? this.reply(messages) : this.reply;
    if (result instanceof Error) throw result;
    return {
      content: result,
      provider: this.kind,
      providerName: this.name,
      model: this.model,
      usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30, estimatedCost: 0, processingTimeMs: 5 },
      metadata: {},
    };
  }
}
