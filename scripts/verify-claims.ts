#!/usr/bin/env npx tsx
/**
 * Claim Verification CLI
 *
 * Runs every claim in a JSON file through the verification pipeline and
 * prints the results as JSON.
 *
 * Usage:
 *   npx tsx scripts/verify-claims.ts <claims.json> [output.json] [--config engine.json]
 *
 * The claims file looks like examples/claims.example.json:
 *   { "claims": [{ "text": "...", "sources": [{ "url": "...", "title": "...", "content": "..." }] }] }
 */

import * as fs from "fs";

import { loadClaimFile } from "../src/lib/claim-input";
import { loadEngineConfig } from "../src/lib/config-loader";
import { errorMessage } from "../src/lib/llm/errors";
import { ClaimPipeline } from "../src/lib/pipeline/orchestrator";

interface CliArgs {
  claimsPath: string;
  outputPath?: string;
  configPath?: string;
}

function printUsage(): void {
  console.log("Usage: npx tsx scripts/verify-claims.ts <claims.json> [output.json] [--config engine.json]");
  console.log("");
  console.log("Arguments:");
  console.log("  claims.json   JSON file with a `claims` array (text plus optional sources)");
  console.log("  output.json   Optional: write results to file (default: stdout)");
  console.log("  --config      Optional: engine config JSON (default: ORACLE_CONFIG_PATH or built-in)");
}

function parseArgs(argv: readonly string[]): CliArgs | null {
  const positional: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return null;
    if (arg === "--config") {
      configPath = argv[++i];
      if (!configPath) return null;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [claimsPath, outputPath] = positional;
  if (!claimsPath) return null;
  return { claimsPath, outputPath, configPath };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    printUsage();
    process.exit(1);
  }

  const loaded = await loadEngineConfig({ path: args.configPath });
  for (const warning of loaded.warnings) {
    console.warn(`[Config] ${warning}`);
  }

  const claims = await loadClaimFile(args.claimsPath);
  const pipeline = await ClaimPipeline.create(loaded);
  const results = await pipeline.processBatch(claims);
  const output = JSON.stringify(results, null, 2);

  if (args.outputPath) {
    await fs.promises.writeFile(args.outputPath, output, "utf-8");
    console.log(`\nResults saved to: ${args.outputPath}`);
  } else {
    console.log(output);
  }

  const verdicts = results.map((r) => r.verdict).join(", ");
  console.log(`\nVerified ${results.length} claims: ${verdicts}`);
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
