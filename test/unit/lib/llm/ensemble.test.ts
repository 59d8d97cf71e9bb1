import { describe, it, expect } from "vitest";
import {
  DEFAULT_QUALITY_CONFIG,
  candidateScore,
  scoreResponseQuality,
  selectEnsembleWinner,
  type EnsembleCandidate,
} from "@/lib/llm/ensemble";
import type { LLMResponse } from "@/lib/llm/provider";

function response(providerName: string, content = "ok"): LLMResponse {
  return {
    content,
    provider: "openai",
    providerName,
    model: "test-model",
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0, estimatedCost: 0, processingTimeMs: 0 },
    metadata: {},
  };
}

function candidate(providerName: string, quality: number, successRate: number): EnsembleCandidate {
  return { response: response(providerName), quality, successRate };
}

describe("scoreResponseQuality", () => {
  it("scores by length band", () => {
    expect(scoreResponseQuality("short")).toBe(0.2);
    expect(scoreResponseQuality("a".repeat(50))).toBe(0.5);
    expect(scoreResponseQuality("a".repeat(100))).toBe(0.8);
    expect(scoreResponseQuality("a".repeat(2000))).toBe(0.8);
    expect(scoreResponseQuality("a".repeat(2001))).toBe(0.7);
  });

  it("measures the trimmed length", () => {
    expect(scoreResponseQuality(`   ${"a".repeat(15)}   `)).toBe(0.2);
  });

  it("subtracts a penalty proportional to hedge density", () => {
    // 11 words, 1 hedge: penalty 5/11 capped at 0.4
    const text = "maybe the wall fell in that year according to most sources";
    expect(scoreResponseQuality(text)).toBeCloseTo(0.5 - 0.4);
  });

  it("applies a small penalty for sparse hedging", () => {
    // 20 words, 1 hedge: density 0.05, penalty 0.25
    const words = ["perhaps", ...Array.from({ length: 19 }, () => "word")].join(" ");
    expect(words.length).toBe(102);
    expect(scoreResponseQuality(words)).toBeCloseTo(0.8 - 0.25);
  });

  it("honours a custom configuration", () => {
    const config = { ...DEFAULT_QUALITY_CONFIG, minUsefulLength: 3, goodLength: 4 };
    expect(scoreResponseQuality("abcd", config)).toBe(0.8);
  });
});

describe("selectEnsembleWinner", () => {
  it("returns null when there are no candidates", () => {
    expect(selectEnsembleWinner([], "weighted")).toBeNull();
  });

  it("weights quality by success rate", () => {
    const vote = selectEnsembleWinner(
      [candidate("a", 0.8, 0.5), candidate("b", 0.5, 1)],
      "weighted",
    );
    expect(vote?.winner.response.providerName).toBe("b");
    expect(vote?.scores).toEqual({ a: 0.4, b: 0.5 });
  });

  it("uses quality alone for the quality method", () => {
    const vote = selectEnsembleWinner(
      [candidate("a", 0.8, 0.5), candidate("b", 0.5, 1)],
      "quality",
    );
    expect(vote?.winner.response.providerName).toBe("a");
  });

  it("keeps the earlier candidate on a tie", () => {
    const vote = selectEnsembleWinner(
      [candidate("first", 0.8, 1), candidate("second", 0.8, 1)],
      "weighted",
    );
    expect(vote?.winner.response.providerName).toBe("first");
  });

  it("computes candidate scores", () => {
    expect(candidateScore(candidate("a", 0.5, 0.5), "weighted")).toBe(0.25);
    expect(candidateScore(candidate("a", 0.5, 0.5), "quality")).toBe(0.5);
  });
});
