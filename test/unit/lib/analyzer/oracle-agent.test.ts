/**
 * Oracle Agent Tests
 *
 * End-to-end verdicts over fake providers: supported and contradicted
 * claims, missing sources, full provider outage and ensemble mode.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { FakeProvider } from "@test/helpers/fake-provider";
import { APPLE_SOURCE, BERLIN_NEWS_SOURCE, BERLIN_SOURCE, makeClaim } from "@test/helpers/fixtures";
import { EvidenceAnalyzer } from "@/lib/analyzer/evidence-analyzer";
import { formatEvidenceAnalysisExample } from "@/lib/analyzer/evidence-prompt";
import { OracleAgent } from "@/lib/analyzer/oracle-agent";
import { NO_SOURCES_SUMMARY } from "@/lib/analyzer/verdict-summary";
import { ProviderManager } from "@/lib/llm/provider-manager";

function answer(assessment: "SUPPORTS" | "CONTRADICTS" | "NEUTRAL", relevantText: string): string {
  return formatEvidenceAnalysisExample({ assessment, confidence: 0.9, relevantText, reasoning: "Checked the source." });
}

function oracleWith(providers: FakeProvider[], ensembleEnabled = false): OracleAgent {
  const analyzer = new EvidenceAnalyzer(new ProviderManager(providers), { capabilities: { ensembleEnabled } });
  return new OracleAgent(analyzer);
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("OracleAgent.process", () => {
  it("supports a well-sourced true claim", async () => {
    const oracle = oracleWith([new FakeProvider("claude_default", "anthropic", answer("SUPPORTS", "The wall fell in 1989"))]);
    const claim = makeClaim("The Berlin Wall fell in 1989.", [BERLIN_SOURCE, BERLIN_NEWS_SOURCE]);

    const result = await oracle.process(claim);
    expect(result.verdict).toBe("SUPPORTED");
    expect(result.confidence).toBeCloseTo(0.90333, 4);
    expect(result.sources).toEqual([BERLIN_SOURCE, BERLIN_NEWS_SOURCE]);
    expect(result.evidenceSummary).toBe(
      "This claim is SUPPORTED by the available evidence. " +
        "Found 2 sources: 2 supporting, 0 contradicting, 0 neutral. " +
        "Key supporting evidence: The wall fell in 1989...",
    );
    expect(result.metadata).toMatchObject({
      biasRiskScore: 0.8,
      meetsConfidenceThreshold: true,
      extractionMethods: { llm_analysis: 2 },
      providersUsed: ["claude_default"],
      evidenceBreakdown: { supporting: 2, contradicting: 0, neutral: 0 },
    });
    expect(result.errorMessage).toBeUndefined();
  });

  it("returns INSUFFICIENT_EVIDENCE without calling providers when there are no sources", async () => {
    const provider = new FakeProvider("claude_default", "anthropic", answer("SUPPORTS", "x"));
    const result = await oracleWith([provider]).process(makeClaim("The Berlin Wall fell in 1989."));

    expect(result.verdict).toBe("INSUFFICIENT_EVIDENCE");
    expect(result.confidence).toBe(0);
    expect(result.evidenceSummary).toBe(NO_SOURCES_SUMMARY);
    expect(result.sources).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it("contradicts a false claim through the language model", async () => {
    const oracle = oracleWith([
      new FakeProvider("ollama_default", "ollama", answer("CONTRADICTS", "founded in April 1976")),
    ]);
    const result = await oracle.process(makeClaim("Apple was founded in 1985.", [APPLE_SOURCE]));

    expect(result.verdict).toBe("CONTRADICTED");
    expect(result.confidence).toBeCloseTo(0.5 + 0.27 + 0.2 / 3, 4);
    expect(result.evidenceSummary).toContain("Key contradicting evidence: founded in April 1976...");
  });

  it("contradicts a false claim with the heuristic alone", async () => {
    const oracle = new OracleAgent(new EvidenceAnalyzer(null));
    const result = await oracle.process(makeClaim("Apple was founded in 1985.", [APPLE_SOURCE]));

    expect(result.verdict).toBe("CONTRADICTED");
    // decisiveness 1·0.5 + heuristic confidence 0.7032·0.3 + one of three sources ·0.2
    expect(result.confidence).toBeCloseTo(0.5 + 0.7032 * 0.3 + 0.2 / 3, 4);
    expect(result.metadata?.extractionMethods).toEqual({ basic_analysis: 1 });
    expect(result.metadata?.providersUsed).toEqual([]);
  });

  it("keeps working when every provider fails", async () => {
    const oracle = oracleWith([
      new FakeProvider("claude_default", "anthropic", new Error("Service overloaded")),
      new FakeProvider("openai_default", "openai", new Error("connect ETIMEDOUT")),
    ]);
    const result = await oracle.process(makeClaim("The Berlin Wall fell in 1989.", [BERLIN_SOURCE, BERLIN_NEWS_SOURCE]));

    expect(result.verdict).toBe("SUPPORTED");
    expect(result.metadata?.extractionMethods).toEqual({ basic_analysis: 2 });
    // mean heuristic confidence of the two sources is 0.75913
    expect(result.confidence).toBeCloseTo(0.5 + 0.75913 * 0.3 + 0.2 * (2 / 3), 3);
  });

  it("uses ensemble analysis when enabled", async () => {
    const oracle = oracleWith(
      [
        new FakeProvider("claude_default", "anthropic", answer("SUPPORTS", "The wall fell in 1989")),
        new FakeProvider("openai_default", "openai", new Error("Rate limit reached")),
        new FakeProvider("gemini_default", "google", answer("SUPPORTS", "The wall fell in 1989")),
      ],
      true,
    );
    const result = await oracle.process(makeClaim("The Berlin Wall fell in 1989.", [BERLIN_SOURCE]));

    expect(result.verdict).toBe("SUPPORTED");
    expect(result.metadata?.extractionMethods).toEqual({ ensemble_analysis: 1 });
    // 0.9 · 0.9 · 1.2
    expect(result.metadata?.evidenceBreakdown?.supportingScore).toBeCloseTo(0.972);
  });

  it("turns analyzer failures into an ERROR result", async () => {
    const analyzer = new EvidenceAnalyzer(null);
    vi.spyOn(analyzer, "analyze").mockRejectedValueOnce(new Error("boom"));
    const result = await new OracleAgent(analyzer).process(makeClaim("Apple was founded in 1976.", [APPLE_SOURCE]));

    expect(result.verdict).toBe("ERROR");
    expect(result.confidence).toBe(0);
    expect(result.evidenceSummary).toBe("Error processing claim: boom");
    expect(result.errorMessage).toBe("boom");
    expect(result.sources).toEqual([]);
  });

  it("reports whether the confidence threshold is met", async () => {
    const analyzer = new EvidenceAnalyzer(null);
    const strict = new OracleAgent(analyzer, { confidenceThreshold: 0.9 });
    const result = await strict.process(makeClaim("Apple was founded in 1985.", [APPLE_SOURCE]));
    expect(result.metadata?.meetsConfidenceThreshold).toBe(false);
  });
});
