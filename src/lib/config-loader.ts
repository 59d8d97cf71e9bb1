/**
 * Configuration Loader
 *
 * Resolves the engine configuration: defaults → optional JSON file →
 * environment overrides, validated with zod. Each override is validated
 * tentatively and skipped (with a warning) if it would make the config
 * invalid.
 *
 * @module config-loader
 * @version 1.0.0
 */

import * as fs from "fs";

import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  PROVIDER_CONFIG_KEYS,
  resolveCapabilities,
  type EngineCapabilities,
  type EngineConfig,
} from "./config-schemas";

export { DEFAULT_ENGINE_CONFIG } from "./config-schemas";
export type { EngineConfig, EngineCapabilities } from "./config-schemas";

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export interface LoadEngineConfigOptions {
  /** JSON file merged over the defaults; falls back to ORACLE_CONFIG_PATH */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedEngineConfig {
  config: EngineConfig;
  capabilities: EngineCapabilities;
  /** Env vars that changed the config */
  overrides: string[];
  warnings: string[];
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvMapping = { fieldPath: string; parser: (v: string) => unknown };

const parseBoolean = (v: string): boolean => v.trim().toLowerCase() === "true";

const ENGINE_ENV_MAP: Record<string, EnvMapping> = {
  OPENAI_API_KEY: { fieldPath: "providers.openai.apiKey", parser: (v) => v.trim() },
  ANTHROPIC_API_KEY: { fieldPath: "providers.anthropic.apiKey", parser: (v) => v.trim() },
  GOOGLE_GENERATIVE_AI_API_KEY: { fieldPath: "providers.google.apiKey", parser: (v) => v.trim() },
  MISTRAL_API_KEY: { fieldPath: "providers.mistral.apiKey", parser: (v) => v.trim() },
  OLLAMA_BASE_URL: { fieldPath: "providers.ollama.baseUrl", parser: (v) => v.trim() },
  OLLAMA_ENABLED: { fieldPath: "providers.ollama.enabled", parser: parseBoolean },
  ORACLE_ENSEMBLE: { fieldPath: "ensemble.enabled", parser: parseBoolean },
  ORACLE_PARALLEL: { fieldPath: "parallel.enabled", parser: parseBoolean },
  ORACLE_MAX_WORKERS: { fieldPath: "parallel.maxWorkers", parser: (v) => Number.parseInt(v, 10) },
};

const PLACEHOLDER_KEY = /^your_.*_here$/i;

export function isPlaceholderKey(value: string | undefined): boolean {
  return value !== undefined && (value.trim() === "" || PLACEHOLDER_KEY.test(value.trim()));
}

// ============================================================================
// MERGING
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Recursive merge of plain objects; arrays and scalars from `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

function setNestedValue(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const leaf = parts.pop();
  if (leaf === undefined) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = value;
}

function formatIssues(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): string[] {
  return error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`);
}

async function readConfigFile(path: string): Promise<unknown> {
  const raw = await fs.promises.readFile(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Config file ${path} is not valid JSON`, [msg]);
  }
}

function applyEnvOverrides(
  working: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
  warnings: string[],
): { result: Record<string, unknown>; applied: string[] } {
  let result = structuredClone(working);
  const applied: string[] = [];

  for (const [envVar, mapping] of Object.entries(ENGINE_ENV_MAP)) {
    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const tentative = structuredClone(result);
    setNestedValue(tentative, mapping.fieldPath, mapping.parser(envValue));

    const validation = EngineConfigSchema.safeParse(tentative);
    if (!validation.success) {
      const issue = formatIssues(validation.error)[0] ?? "invalid value";
      console.warn(`[Config-Loader] Skipping invalid override ${envVar}: ${issue}`);
      warnings.push(`Skipped ${envVar} (invalid: ${issue})`);
      continue;
    }

    result = tentative;
    applied.push(envVar);
  }

  return { result, applied };
}

/** Placeholder API keys behave as if no key was configured. */
function dropPlaceholderKeys(config: EngineConfig, warnings: string[]): EngineConfig {
  const providers = { ...config.providers };
  for (const kind of PROVIDER_CONFIG_KEYS) {
    const providerConfig = providers[kind];
    if (providerConfig.apiKey !== undefined && isPlaceholderKey(providerConfig.apiKey)) {
      const { apiKey: _placeholder, ...rest } = providerConfig;
      providers[kind] = rest;
      if (kind !== "ollama") {
        warnings.push(`Placeholder API key for ${kind} ignored`);
      }
    }
  }
  return { ...config, providers };
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function loadEngineConfig(options: LoadEngineConfigOptions = {}): Promise<LoadedEngineConfig> {
  const env = options.env ?? process.env;
  const warnings: string[] = [];

  let merged: unknown = structuredClone(DEFAULT_ENGINE_CONFIG);
  const path = options.path ?? env.ORACLE_CONFIG_PATH;
  if (path) {
    merged = deepMerge(merged, await readConfigFile(path));
  }

  const fileValidation = EngineConfigSchema.safeParse(merged);
  if (!fileValidation.success) {
    throw new ConfigValidationError("Invalid engine configuration", formatIssues(fileValidation.error));
  }

  const { result: withOverrides, applied: overrides } = applyEnvOverrides({ ...fileValidation.data }, env, warnings);

  const finalValidation = EngineConfigSchema.safeParse(withOverrides);
  if (!finalValidation.success) {
    throw new ConfigValidationError("Invalid engine configuration", formatIssues(finalValidation.error));
  }

  const config = dropPlaceholderKeys(finalValidation.data, warnings);
  if (overrides.length > 0) {
    console.log(`[Config-Loader] Applied env overrides: ${overrides.join(", ")}`);
  }

  return { config, capabilities: resolveCapabilities(config), overrides, warnings };
}
