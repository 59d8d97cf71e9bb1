/**
 * Evidence Analysis Prompt
 *
 * Prompt template for judging one source against one claim, and the
 * line-oriented parser for the four-line answer format.
 *
 * @module analyzer/evidence-prompt
 */

import type { LLMMessage } from "../llm/provider";
import type { Claim, Source, SupportState } from "./types";

export const EVIDENCE_ANALYSIS_SYSTEM_PROMPT = `You are an expert fact-checker analyzing evidence. Your task is to determine if a source supports, contradicts, or is neutral regarding a claim.

Assess objectively:
1. Does the source content directly support the claim?
2. Does it contradict the claim?
3. Is it neutral or irrelevant?
4. Extract the most relevant text that supports your assessment.

Respond in this exact format:
ASSESSMENT: [SUPPORTS/CONTRADICTS/NEUTRAL]
CONFIDENCE: [0.0-1.0]
RELEVANT_TEXT: [exact quote from source that supports your assessment]
REASONING: [brief explanation of your assessment]`;

export const DEFAULT_MAX_CONTENT_CHARS = 1500;

export function truncateContent(content: string, maxChars: number = DEFAULT_MAX_CONTENT_CHARS): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

export function buildEvidenceMessages(
  claim: Pick<Claim, "text">,
  source: Pick<Source, "title" | "content">,
  maxContentChars: number = DEFAULT_MAX_CONTENT_CHARS,
): LLMMessage[] {
  return [
    { role: "system", content: EVIDENCE_ANALYSIS_SYSTEM_PROMPT },
    {
      role: "user",
      content: `Claim: "${claim.text}"

Source Title: ${source.title}
Source Content: ${truncateContent(source.content, maxContentChars)}

Analyze if this source supports, contradicts, or is neutral regarding the claim.`,
    },
  ];
}

// ============================================================================
// PARSING
// ============================================================================

export type EvidenceAnalysisField = "ASSESSMENT" | "CONFIDENCE" | "RELEVANT_TEXT" | "REASONING";

export interface EvidenceAnalysis {
  /** Upper-cased assessment label as written by the model; NEUTRAL when absent */
  assessment: string;
  supports: SupportState;
  confidence: number;
  relevantText: string;
  reasoning: string;
}

/** Parse outcome: always an analysis, plus the fields that could not be read. */
export interface EvidenceAnalysisParse {
  analysis: EvidenceAnalysis;
  missingFields: EvidenceAnalysisField[];
}

export const DEFAULT_ANALYSIS_CONFIDENCE = 0.5;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function assessmentToSupport(assessment: string): SupportState {
  if (assessment === "SUPPORTS") return true;
  if (assessment === "CONTRADICTS") return false;
  return null;
}

function fieldValue(line: string, field: EvidenceAnalysisField): string | null {
  const prefix = `${field}:`;
  return line.startsWith(prefix) ? line.slice(prefix.length).trim() : null;
}

/**
 * Read the four labelled lines out of a model response. Unknown lines are
 * ignored; unreadable fields keep their defaults and are listed in
 * `missingFields`. Never throws.
 */
export function parseEvidenceAnalysis(text: string): EvidenceAnalysisParse {
  const analysis: EvidenceAnalysis = {
    assessment: "NEUTRAL",
    supports: null,
    confidence: DEFAULT_ANALYSIS_CONFIDENCE,
    relevantText: "",
    reasoning: "",
  };
  const seen = new Set<EvidenceAnalysisField>();

  for (const rawLine of text.trim().split("\n")) {
    const line = rawLine.trim();

    const assessment = fieldValue(line, "ASSESSMENT");
    if (assessment !== null) {
      analysis.assessment = assessment.toUpperCase();
      analysis.supports = assessmentToSupport(analysis.assessment);
      seen.add("ASSESSMENT");
      continue;
    }

    const confidence = fieldValue(line, "CONFIDENCE");
    if (confidence !== null) {
      const parsed = Number.parseFloat(confidence);
      if (Number.isFinite(parsed)) {
        analysis.confidence = clamp01(parsed);
        seen.add("CONFIDENCE");
      }
      continue;
    }

    const relevantText = fieldValue(line, "RELEVANT_TEXT");
    if (relevantText !== null) {
      analysis.relevantText = relevantText;
      seen.add("RELEVANT_TEXT");
      continue;
    }

    const reasoning = fieldValue(line, "REASONING");
    if (reasoning !== null) {
      analysis.reasoning = reasoning;
      seen.add("REASONING");
    }
  }

  const fields: EvidenceAnalysisField[] = ["ASSESSMENT", "CONFIDENCE", "RELEVANT_TEXT", "REASONING"];
  return { analysis, missingFields: fields.filter((f) => !seen.has(f)) };
}

export interface EvidenceAnalysisExample {
  assessment: "SUPPORTS" | "CONTRADICTS" | "NEUTRAL";
  confidence: number;
  relevantText: string;
  reasoning: string;
}

/** Render a response in the exact format the system prompt asks for. */
export function formatEvidenceAnalysisExample(fields: EvidenceAnalysisExample): string {
  return [
    `ASSESSMENT: ${fields.assessment}`,
    `CONFIDENCE: ${fields.confidence}`,
    `RELEVANT_TEXT: ${fields.relevantText}`,
    `REASONING: ${fields.reasoning}`,
  ].join("\n");
}
