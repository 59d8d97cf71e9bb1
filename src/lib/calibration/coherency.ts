/**
 * Truth Coherency Harness
 *
 * Runs claims with known truth values through a pipeline and scores how
 * often the verdict, its confidence and the known truth line up.
 *
 * @module calibration/coherency
 */

import { z } from "zod";

import type { Verdict, VerificationResult } from "../analyzer/types";
import { readJsonFile, SourceSchema, toSource } from "../claim-input";
import { errorMessage } from "../llm/errors";
import type { ClaimInput } from "../pipeline/orchestrator";

// ============================================================================
// TYPES
// ============================================================================

export const TruthTestCaseSchema = z.object({
  claim: z.string().min(1),
  expectedVerdict: z.enum(["SUPPORTED", "CONTRADICTED", "INSUFFICIENT_EVIDENCE", "ERROR"]),
  expectedConfidenceMin: z.number().min(0).max(1),
  category: z.string(),
  knownTruthValue: z.boolean(),
  biasRiskLevel: z.enum(["low", "medium", "high"]),
  testReasoning: z.string().optional(),
  sources: z.array(SourceSchema).optional(),
});

export type TruthTestCase = z.infer<typeof TruthTestCaseSchema>;

export const TruthTestFileSchema = z.object({
  cases: z.array(TruthTestCaseSchema).min(1),
});

export interface BiasInfo {
  biasDetected: boolean;
  biasScore: number;
}

export interface CaseResult {
  testCase: string;
  category: string;
  biasRisk: TruthTestCase["biasRiskLevel"];
  expectedVerdict: Verdict;
  actualVerdict: Verdict;
  expectedConfidenceMin: number;
  actualConfidence: number;
  knownTruth: boolean;
  verdictCorrect: boolean;
  confidenceAdequate: boolean;
  truthAligned: boolean;
  passed: boolean;
  processingTime: number;
  bias: BiasInfo;
  error?: string;
}

export interface CoherencyReport {
  totalCases: number;
  passed: number;
  failed: number;
  coherencyScore: number;
  detailedResults: CaseResult[];
}

export interface ClaimProcessor {
  processClaim(input: ClaimInput): Promise<VerificationResult>;
}

const BIAS_DETECTED_ABOVE = 0.3;

// ============================================================================
// EVALUATION
// ============================================================================

/**
 * True facts must be SUPPORTED with confidence above 0.6; false facts must
 * not be confidently supported.
 */
export function checkTruthAlignment(knownTruth: boolean, verdict: Verdict, confidence: number): boolean {
  if (knownTruth) {
    return verdict === "SUPPORTED" && confidence > 0.6;
  }
  return verdict === "CONTRADICTED" || verdict === "INSUFFICIENT_EVIDENCE" || confidence < 0.5;
}

export function extractBiasInfo(result: VerificationResult): BiasInfo {
  const biasScore = result.metadata?.biasRiskScore ?? 0;
  return { biasDetected: biasScore > BIAS_DETECTED_ABOVE, biasScore };
}

export function evaluateCase(testCase: TruthTestCase, result: VerificationResult): CaseResult {
  const verdictCorrect = result.verdict === testCase.expectedVerdict;
  const confidenceAdequate = result.confidence >= testCase.expectedConfidenceMin;
  const truthAligned = checkTruthAlignment(testCase.knownTruthValue, result.verdict, result.confidence);

  return {
    testCase: testCase.claim,
    category: testCase.category,
    biasRisk: testCase.biasRiskLevel,
    expectedVerdict: testCase.expectedVerdict,
    actualVerdict: result.verdict,
    expectedConfidenceMin: testCase.expectedConfidenceMin,
    actualConfidence: result.confidence,
    knownTruth: testCase.knownTruthValue,
    verdictCorrect,
    confidenceAdequate,
    truthAligned,
    passed: verdictCorrect && confidenceAdequate && truthAligned,
    processingTime: result.processingTime,
    bias: extractBiasInfo(result),
    ...(result.errorMessage ? { error: result.errorMessage } : {}),
  };
}

export async function runCoherencyTest(
  pipeline: ClaimProcessor,
  cases: readonly TruthTestCase[],
): Promise<CoherencyReport> {
  const detailedResults: CaseResult[] = [];
  let passed = 0;

  for (const testCase of cases) {
    try {
      const sources = testCase.sources?.map(toSource);
      const result = await pipeline.processClaim({ text: testCase.claim, sources });
      const caseResult = evaluateCase(testCase, result);
      detailedResults.push(caseResult);
      if (caseResult.passed) passed++;
    } catch (error) {
      console.error(`[Coherency] Case failed: ${testCase.claim} - ${errorMessage(error)}`);
    }
  }

  const failed = cases.length - passed;
  const coherencyScore = cases.length > 0 ? passed / cases.length : 0;
  console.log(`[Coherency] ${passed}/${cases.length} cases passed (score: ${coherencyScore.toFixed(2)})`);

  return { totalCases: cases.length, passed, failed, coherencyScore, detailedResults };
}

export async function loadTruthCases(path: string): Promise<TruthTestCase[]> {
  const file = await readJsonFile(path, TruthTestFileSchema);
  return file.cases;
}
