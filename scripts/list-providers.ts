#!/usr/bin/env npx tsx
/**
 * Lists the LLM providers that answered their availability probe, the
 * provider each agent would use, and a cost estimate for a sample prompt.
 *
 * Usage:
 *   npx tsx scripts/list-providers.ts [--config engine.json] [--agent name ...]
 */

import { loadEngineConfig } from "../src/lib/config-loader";
import { errorMessage } from "../src/lib/llm/errors";
import { ProviderManager } from "../src/lib/llm/provider-manager";

const SAMPLE_PROMPT =
  'Claim: "The Berlin Wall fell in 1989."\n\nAnalyze if this source supports, contradicts, or is neutral regarding the claim.';

const DEFAULT_AGENTS = ["oracle", "herald", "illuminator", "logician"];

function parseArgs(argv: readonly string[]): { configPath?: string; agents: string[] } {
  let configPath: string | undefined;
  const agents: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--config") configPath = argv[++i];
    else if (argv[i] === "--agent") {
      const agent = argv[++i];
      if (agent) agents.push(agent);
    }
  }
  return { configPath, agents: agents.length > 0 ? agents : DEFAULT_AGENTS };
}

async function main(): Promise<void> {
  const { configPath, agents } = parseArgs(process.argv.slice(2));
  const loaded = await loadEngineConfig({ path: configPath });
  for (const warning of loaded.warnings) {
    console.warn(`[Config] ${warning}`);
  }

  const manager = await ProviderManager.fromConfig(loaded.config);

  console.log("\n" + "=".repeat(60));
  console.log(manager.getProviderSummary());
  console.log("=".repeat(60));

  console.log("\nAgent assignment:");
  for (const agent of agents) {
    console.log(`  ${agent.padEnd(12)} -> ${manager.getProviderForAgent(agent) ?? "(none)"}`);
  }

  const providers = manager.getAvailableProviders();
  if (providers.length > 0) {
    console.log("\nEstimated cost of a sample analysis prompt:");
    for (const p of providers) {
      console.log(`  ${p.name.padEnd(20)} $${manager.estimateCost(SAMPLE_PROMPT, p.name).toFixed(6)}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
