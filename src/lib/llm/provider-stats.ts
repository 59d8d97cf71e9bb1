/**
 * Provider Performance Tracker
 *
 * Per-provider call counters used by ensemble voting and the provider
 * summary. Owned by one ProviderManager instance; every update completes
 * synchronously so concurrent analyses never observe a half-written entry.
 *
 * @module llm/provider-stats
 */

import type { ErrorCategory } from "../error-classification";

export type ProviderPerformance = {
  requests: number;
  successes: number;
  failures: number;
  totalProcessingTimeMs: number;
  totalCost: number;
  lastFailureTime: number | null;
  lastFailureMessage: string | null;
  lastFailureCategory: ErrorCategory | null;
  lastSuccessTime: number | null;
};

function makeDefaultPerformance(): ProviderPerformance {
  return {
    requests: 0,
    successes: 0,
    failures: 0,
    totalProcessingTimeMs: 0,
    totalCost: 0,
    lastFailureTime: null,
    lastFailureMessage: null,
    lastFailureCategory: null,
    lastSuccessTime: null,
  };
}

export class ProviderStats {
  private readonly entries = new Map<string, ProviderPerformance>();

  private entry(name: string): ProviderPerformance {
    let current = this.entries.get(name);
    if (!current) {
      current = makeDefaultPerformance();
      this.entries.set(name, current);
    }
    return current;
  }

  recordSuccess(name: string, processingTimeMs: number, cost: number): void {
    const p = this.entry(name);
    p.requests++;
    p.successes++;
    p.totalProcessingTimeMs += processingTimeMs;
    p.totalCost += cost;
    p.lastSuccessTime = Date.now();
  }

  recordFailure(name: string, message: string, category: ErrorCategory): void {
    const p = this.entry(name);
    p.requests++;
    p.failures++;
    p.lastFailureTime = Date.now();
    p.lastFailureMessage = message;
    p.lastFailureCategory = category;
    console.warn(`[ProviderStats] ${name}: failure #${p.failures} (${category}): ${message}`);
  }

  /** Observed success rate; an untried provider is assumed healthy. */
  successRate(name: string): number {
    const p = this.entries.get(name);
    if (!p || p.requests === 0) return 1;
    return p.successes / p.requests;
  }

  /** Read-only snapshot. */
  get(name: string): ProviderPerformance {
    return { ...(this.entries.get(name) ?? makeDefaultPerformance()) };
  }
}
