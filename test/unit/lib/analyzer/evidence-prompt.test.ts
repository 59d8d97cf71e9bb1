import { describe, it, expect } from "vitest";
import {
  EVIDENCE_ANALYSIS_SYSTEM_PROMPT,
  buildEvidenceMessages,
  formatEvidenceAnalysisExample,
  parseEvidenceAnalysis,
  truncateContent,
} from "@/lib/analyzer/evidence-prompt";

describe("buildEvidenceMessages", () => {
  it("builds the system and user messages", () => {
    const messages = buildEvidenceMessages(
      { text: "The Titanic sank in 1912." },
      { title: "RMS Titanic", content: "The ship sank in April 1912." },
    );
    expect(messages).toEqual([
      { role: "system", content: EVIDENCE_ANALYSIS_SYSTEM_PROMPT },
      {
        role: "user",
        content:
          'Claim: "The Titanic sank in 1912."\n\nSource Title: RMS Titanic\nSource Content: The ship sank in April 1912.\n\n' +
          "Analyze if this source supports, contradicts, or is neutral regarding the claim.",
      },
    ]);
  });

  it("truncates long content", () => {
    const messages = buildEvidenceMessages({ text: "x" }, { title: "t", content: "abcdefghij" }, 4);
    expect(messages[1]?.content).toContain("Source Content: abcd...\n");
  });
});

describe("truncateContent", () => {
  it("only appends an ellipsis when content was cut", () => {
    expect(truncateContent("abc", 3)).toBe("abc");
    expect(truncateContent("abcd", 3)).toBe("abc...");
  });
});

describe("parseEvidenceAnalysis", () => {
  it("reads all four fields", () => {
    const text = formatEvidenceAnalysisExample({
      assessment: "CONTRADICTS",
      confidence: 0.85,
      relevantText: "founded in April 1976",
      reasoning: "The source gives a different year.",
    });
    expect(parseEvidenceAnalysis(text)).toEqual({
      analysis: {
        assessment: "CONTRADICTS",
        supports: false,
        confidence: 0.85,
        relevantText: "founded in April 1976",
        reasoning: "The source gives a different year.",
      },
      missingFields: [],
    });
  });

  it("ignores surrounding chatter and indentation", () => {
    const text = "Here is my analysis:\n  ASSESSMENT: supports\n  CONFIDENCE: 0.7\nThanks!";
    const { analysis, missingFields } = parseEvidenceAnalysis(text);
    expect(analysis.assessment).toBe("SUPPORTS");
    expect(analysis.supports).toBe(true);
    expect(analysis.confidence).toBe(0.7);
    expect(missingFields).toEqual(["RELEVANT_TEXT", "REASONING"]);
  });

  it("defaults to an undetermined neutral reading", () => {
    const { analysis, missingFields } = parseEvidenceAnalysis("I cannot help with that.");
    expect(analysis.assessment).toBe("NEUTRAL");
    expect(analysis.supports).toBeNull();
    expect(analysis.confidence).toBe(0.5);
    expect(missingFields).toEqual(["ASSESSMENT", "CONFIDENCE", "RELEVANT_TEXT", "REASONING"]);
  });

  it("treats unknown assessments as undetermined", () => {
    expect(parseEvidenceAnalysis("ASSESSMENT: PARTIALLY").analysis.supports).toBeNull();
  });

  it("clamps confidence and rejects non-numeric values", () => {
    expect(parseEvidenceAnalysis("CONFIDENCE: 1.7").analysis.confidence).toBe(1);
    expect(parseEvidenceAnalysis("CONFIDENCE: -0.2").analysis.confidence).toBe(0);

    const unreadable = parseEvidenceAnalysis("CONFIDENCE: high");
    expect(unreadable.analysis.confidence).toBe(0.5);
    expect(unreadable.missingFields).toContain("CONFIDENCE");
  });
});
