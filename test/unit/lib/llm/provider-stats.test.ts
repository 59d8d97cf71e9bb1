import { describe, it, expect, vi } from "vitest";
import { ProviderStats } from "@/lib/llm/provider-stats";
import { estimateTextCost, estimateTokens, calculateUsageCost } from "@/lib/llm/cost";

describe("ProviderStats", () => {
  it("assumes untried providers are healthy", () => {
    const stats = new ProviderStats();
    expect(stats.successRate("claude_default")).toBe(1);
    expect(stats.get("claude_default").requests).toBe(0);
  });

  it("tracks successes, failures and timing", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const stats = new ProviderStats();
    stats.recordSuccess("openai_default", 100, 0.001);
    stats.recordSuccess("openai_default", 300, 0.002);
    stats.recordFailure("openai_default", "boom", "timeout");

    const perf = stats.get("openai_default");
    expect(perf.requests).toBe(3);
    expect(perf.successes).toBe(2);
    expect(perf.failures).toBe(1);
    expect(perf.totalCost).toBeCloseTo(0.003);
    expect(perf.lastFailureMessage).toBe("boom");
    expect(perf.lastFailureCategory).toBe("timeout");
    expect(stats.successRate("openai_default")).toBeCloseTo(2 / 3);
    expect(perf.totalProcessingTimeMs).toBe(400);
  });

  it("returns snapshots that do not alias internal state", () => {
    const stats = new ProviderStats();
    stats.recordSuccess("a", 1, 0);
    const snapshot = stats.get("a");
    snapshot.requests = 99;
    expect(stats.get("a").requests).toBe(1);
  });
});

describe("cost", () => {
  it("estimates tokens from words", () => {
    expect(estimateTokens("one two three four five six seven eight nine ten")).toBeCloseTo(13);
    expect(estimateTokens("   ")).toBe(0);
  });

  it("estimates text cost with the blended rate", () => {
    const text = Array.from({ length: 1000 }, () => "word").join(" ");
    // 1300 tokens at 0.009 per 1k
    expect(estimateTextCost(text, "anthropic")).toBeCloseTo(0.0117, 6);
    expect(estimateTextCost(text, "ollama")).toBe(0);
  });

  it("falls back to the kind's default rates for unknown models", () => {
    expect(calculateUsageCost("anthropic", "some-new-model", 1000, 1000)).toBeCloseTo(0.018, 6);
  });
});
