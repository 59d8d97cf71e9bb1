/**
 * Evidence Analyzer Tests
 *
 * LLM analysis through the ProviderManager, ensemble mode, and the
 * per-source heuristic fallback.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { FakeProvider } from "@test/helpers/fake-provider";
import { APPLE_SOURCE, BERLIN_NEWS_SOURCE, BERLIN_SOURCE, makeClaim, makeSource } from "@test/helpers/fixtures";
import { EvidenceAnalyzer } from "@/lib/analyzer/evidence-analyzer";
import { formatEvidenceAnalysisExample } from "@/lib/analyzer/evidence-prompt";
import { ProviderManager } from "@/lib/llm/provider-manager";

const SUPPORTS = formatEvidenceAnalysisExample({
  assessment: "SUPPORTS",
  confidence: 0.9,
  relevantText: "The wall fell in 1989",
  reasoning: "The source states the date.",
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("EvidenceAnalyzer", () => {
  it("returns no evidence for no sources", async () => {
    const analyzer = new EvidenceAnalyzer(null);
    expect(await analyzer.analyze(makeClaim("The Berlin Wall fell in 1989."), [])).toEqual([]);
  });

  it("uses the heuristic for every source without a manager", async () => {
    const analyzer = new EvidenceAnalyzer(null);
    expect(analyzer.hasLanguageModel()).toBe(false);

    const evidence = await analyzer.analyze(makeClaim("Apple was founded in 1985."), [APPLE_SOURCE]);
    expect(evidence).toHaveLength(1);
    expect(evidence[0]?.extractionMethod).toBe("basic_analysis");
    expect(evidence[0]?.supportsClaim).toBe(false);
    expect(evidence[0]?.metadata.fallbackReason).toBe("no provider available");
  });

  it("uses the heuristic when no registered provider is available", async () => {
    const manager = new ProviderManager([new FakeProvider("ollama_default", "ollama", SUPPORTS, { available: false })]);
    const analyzer = new EvidenceAnalyzer(manager);
    expect(analyzer.hasLanguageModel()).toBe(false);

    const evidence = await analyzer.analyze(makeClaim("The Berlin Wall fell in 1989."), [BERLIN_SOURCE]);
    expect(evidence[0]?.extractionMethod).toBe("basic_analysis");
  });

  it("builds evidence from an LLM analysis", async () => {
    const claude = new FakeProvider("claude_default", "anthropic", SUPPORTS, { model: "claude-test" });
    const analyzer = new EvidenceAnalyzer(new ProviderManager([claude]));

    const [evidence] = await analyzer.analyze(makeClaim("The Berlin Wall fell in 1989."), [BERLIN_SOURCE]);
    expect(evidence).toEqual({
      source: BERLIN_SOURCE,
      supportingText: "The wall fell in 1989",
      supportsClaim: true,
      confidence: 0.9,
      extractionMethod: "llm_analysis",
      metadata: {
        provider: "claude_default",
        providerKind: "anthropic",
        model: "claude-test",
        assessment: "SUPPORTS",
        reasoning: "The source states the date.",
        biasRiskScore: 0.8,
      },
    });
    expect(claude.calls[0]?.options).toEqual({ temperature: 0.1, maxOutputTokens: 400, timeoutMs: undefined });
  });

  it("records missing fields from an incomplete answer", async () => {
    const manager = new ProviderManager([new FakeProvider("ollama_default", "ollama", "ASSESSMENT: NEUTRAL")]);
    const [evidence] = await new EvidenceAnalyzer(manager).analyze(makeClaim("Apple was founded in 1976."), [
      APPLE_SOURCE,
    ]);
    expect(evidence?.supportsClaim).toBeNull();
    expect(evidence?.confidence).toBe(0.5);
    expect(evidence?.metadata.missingFields).toEqual(["CONFIDENCE", "RELEVANT_TEXT", "REASONING"]);
  });

  it("falls back to the heuristic per source when every provider fails", async () => {
    const manager = new ProviderManager([new FakeProvider("ollama_default", "ollama", new Error("down"))]);
    const [evidence] = await new EvidenceAnalyzer(manager).analyze(makeClaim("Apple was founded in 1985."), [
      APPLE_SOURCE,
    ]);
    expect(evidence?.extractionMethod).toBe("basic_analysis");
    expect(evidence?.supportsClaim).toBe(false);
    expect(evidence?.metadata.fallbackReason).toBe("ollama_default generation failed: down");
  });

  it("keeps the input order under concurrency", async () => {
    const provider = new FakeProvider("claude_default", "anthropic", (messages) => {
      const user = messages[1]?.content ?? "";
      const confidence = user.includes("Crowds gathered") ? 0.6 : 0.9;
      return formatEvidenceAnalysisExample({ assessment: "SUPPORTS", confidence, relevantText: "x", reasoning: "y" });
    });
    const analyzer = new EvidenceAnalyzer(new ProviderManager([provider]), {
      capabilities: { analysisConcurrency: 3 },
    });
    const sources = [BERLIN_NEWS_SOURCE, BERLIN_SOURCE, makeSource({ url: "https://example.org/third" })];

    const evidence = await analyzer.analyze(makeClaim("Some neutral statement here."), sources);
    expect(evidence.map((e) => e.source.url)).toEqual(sources.map((s) => s.url));
    expect(evidence.map((e) => e.confidence)).toEqual([0.6, 0.9, 0.9]);
  });

  it("marks ensemble results and records the voting metadata", async () => {
    const manager = new ProviderManager([
      new FakeProvider("claude_default", "anthropic", SUPPORTS),
      new FakeProvider("gemini_default", "google", new Error("quota exceeded")),
      new FakeProvider("openai_default", "openai", SUPPORTS),
    ]);
    const analyzer = new EvidenceAnalyzer(manager, { capabilities: { ensembleEnabled: true } });

    const [evidence] = await analyzer.analyze(makeClaim("The Berlin Wall fell in 1989."), [BERLIN_SOURCE]);
    expect(evidence?.extractionMethod).toBe("ensemble_analysis");
    expect(evidence?.metadata.ensembleSize).toBe(2);
    expect(evidence?.metadata.votingMethod).toBe("weighted");
  });

  it("uses the heuristic without further calls when the ensemble fails", async () => {
    const claude = new FakeProvider("claude_default", "anthropic", new Error("Service overloaded"));
    const gemini = new FakeProvider("gemini_default", "google", new Error("quota exceeded"));
    const openai = new FakeProvider("openai_default", "openai", new Error("connect ETIMEDOUT"));
    const analyzer = new EvidenceAnalyzer(new ProviderManager([claude, gemini, openai]), {
      capabilities: { ensembleEnabled: true },
    });

    const [evidence] = await analyzer.analyze(makeClaim("Apple was founded in 1985."), [APPLE_SOURCE]);
    expect(evidence?.extractionMethod).toBe("basic_analysis");
    expect(evidence?.supportsClaim).toBe(false);
    expect([claude.calls.length, gemini.calls.length, openai.calls.length]).toEqual([1, 1, 1]);
    expect(String(evidence?.metadata.fallbackReason).startsWith("All ensemble providers failed:")).toBe(true);
  });

  it("uses the heuristic for sensitive content when no safe provider is registered", async () => {
    const ollama = new FakeProvider("ollama_default", "ollama", SUPPORTS);
    const [evidence] = await new EvidenceAnalyzer(new ProviderManager([ollama])).analyze(
      makeClaim("The Berlin Wall fell in 1989."),
      [BERLIN_SOURCE],
    );
    expect(evidence?.extractionMethod).toBe("basic_analysis");
    expect(ollama.calls).toHaveLength(0);
  });
});
