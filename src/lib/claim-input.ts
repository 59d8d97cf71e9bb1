/**
 * Claim Input Files
 *
 * Zod schemas for the JSON files the CLI scripts and the coherency harness
 * read: claims with optional pre-fetched sources.
 *
 * @module claim-input
 */

import * as fs from "fs";
import { z } from "zod";

import type { Source } from "./analyzer/types";
import type { ClaimInput } from "./pipeline/orchestrator";

export const SourceSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  content: z.string(),
  sourceType: z.enum(["wikipedia", "news", "fact_check", "web"]).default("web"),
  credibilityScore: z.number().min(0).max(1).default(0.5),
  relevanceScore: z.number().min(0).max(1).default(0),
  publicationDate: z.coerce.date().optional(),
});

export const ClaimInputSchema = z.object({
  text: z.string().min(1),
  id: z.string().min(1).optional(),
  sources: z.array(SourceSchema).default([]),
});

export const ClaimFileSchema = z.object({
  claims: z.array(ClaimInputSchema).min(1),
});

export type ClaimFile = z.infer<typeof ClaimFileSchema>;

export class ClaimFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClaimFileError";
  }
}

export function toSource(parsed: z.infer<typeof SourceSchema>): Source {
  const { publicationDate, ...rest } = parsed;
  return publicationDate ? { ...rest, publicationDate } : rest;
}

/** Read and validate a JSON file against `schema`. */
export async function readJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(path, "utf-8");
  } catch (error) {
    throw new ClaimFileError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ClaimFileError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ClaimFileError(`${path} failed validation: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export async function loadClaimFile(path: string): Promise<ClaimInput[]> {
  const file = await readJsonFile(path, ClaimFileSchema);
  return file.claims.map((claim) => ({
    text: claim.text,
    ...(claim.id ? { id: claim.id } : {}),
    sources: claim.sources.map(toSource),
  }));
}
