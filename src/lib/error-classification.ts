/**
 * Error Classification
 *
 * Classifies provider call failures for reporting and for the failure
 * category kept in provider stats.
 *
 * @module error-classification
 */

export type ErrorCategory = "provider_outage" | "rate_limit" | "timeout" | "empty_response" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
};

/** Patterns indicating LLM provider rate limiting or overload */
const LLM_RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
  /quota/i,
];

const LLM_AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

const CONNECTION_PATTERNS = [/ECONNREFUSED/i, /ENOTFOUND/i, /fetch failed/i, /network/i];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return null;
}

/** Classify an error raised by a provider call. Timeouts are checked first. */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", message: msg };
  }

  if (LLM_AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg };
  }

  if (LLM_RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", message: msg };
  }

  // AI SDK API errors carry the HTTP status on the error object
  const statusCode = readStatusCode(error);
  if (statusCode !== null) {
    if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
      return { category: "rate_limit", message: msg };
    }
    if (statusCode === 401 || statusCode === 403 || statusCode >= 500) {
      return { category: "provider_outage", message: msg };
    }
  }

  if (CONNECTION_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg };
  }

  return { category: "unknown", message: msg };
}
