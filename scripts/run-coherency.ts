#!/usr/bin/env npx tsx
/**
 * Truth Coherency Run
 *
 * Usage:
 *   npx tsx scripts/run-coherency.ts <cases.json> [--config engine.json]
 *
 * Exits non-zero when any case fails.
 */

import { loadTruthCases, runCoherencyTest } from "../src/lib/calibration/coherency";
import { loadEngineConfig } from "../src/lib/config-loader";
import { errorMessage } from "../src/lib/llm/errors";
import { ClaimPipeline } from "../src/lib/pipeline/orchestrator";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  let configPath: string | undefined;
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") configPath = argv[++i];
    else if (arg !== undefined) positional.push(arg);
  }
  const [casesPath] = positional;

  if (!casesPath) {
    console.error("Usage: npx tsx scripts/run-coherency.ts <cases.json> [--config engine.json]");
    process.exit(1);
  }

  const loaded = await loadEngineConfig({ path: configPath });
  const pipeline = await ClaimPipeline.create(loaded);
  const report = await runCoherencyTest(pipeline, await loadTruthCases(casesPath));

  console.log("\n" + "=".repeat(60));
  console.log("TRUTH COHERENCY");
  console.log("=".repeat(60));
  for (const r of report.detailedResults) {
    const status = r.passed ? "PASS" : "FAIL";
    console.log(
      `${status}  ${r.testCase}  expected ${r.expectedVerdict} >= ${r.expectedConfidenceMin}, ` +
        `got ${r.actualVerdict} @ ${r.actualConfidence.toFixed(2)}`,
    );
  }
  console.log(`\nScore: ${report.passed}/${report.totalCases} (${(report.coherencyScore * 100).toFixed(0)}%)`);

  process.exit(report.failed === 0 ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
