/**
 * Provider error taxonomy.
 *
 * @module llm/errors
 */

import type { ErrorCategory } from "../error-classification";
import type { ProviderKind } from "./provider";

/** Provider lacks credentials/config or failed its startup probe. */
export class ProviderUnavailableError extends Error {
  readonly providerName: string;

  constructor(providerName: string, reason: string) {
    super(`Provider ${providerName} unavailable: ${reason}`);
    this.name = "ProviderUnavailableError";
    this.providerName = providerName;
  }
}

/** A provider call failed at request time (network, auth, backend, timeout). */
export class GenerationError extends Error {
  readonly providerName: string;
  readonly providerKind: ProviderKind | null;
  readonly category: ErrorCategory;

  constructor(
    message: string,
    options: {
      providerName: string;
      providerKind?: ProviderKind | null;
      category?: ErrorCategory;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "GenerationError";
    this.providerName = options.providerName;
    this.providerKind = options.providerKind ?? null;
    this.category = options.category ?? "unknown";
  }
}

/** No registered provider could serve the request. */
export class NoProviderAvailableError extends Error {
  constructor(message = "No available LLM provider found") {
    super(message);
    this.name = "NoProviderAvailableError";
  }
}

/** Unexpected failure while computing a verdict. */
export class SynthesisError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SynthesisError";
  }
}

export type ProviderCallError = GenerationError | NoProviderAvailableError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
