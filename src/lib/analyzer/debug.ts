/**
 * Debug logging for claim verification runs.
 *
 * Mirrors every message to the console and, when enabled, appends it to a
 * log file.
 *
 * Environment:
 * - ORACLE_DEBUG_LOG_FILE=true enables the file sink
 * - ORACLE_DEBUG_LOG_PATH overrides the file location (default ./debug-oracle.log)
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

export interface DebugLogSettings {
  fileEnabled: boolean;
  filePath: string;
}

export function resolveDebugLogSettings(env: NodeJS.ProcessEnv = process.env): DebugLogSettings {
  return {
    fileEnabled: (env.ORACLE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true",
    filePath: env.ORACLE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-oracle.log"),
  };
}

let fileWriteWarned = false;

/** Serialize a payload for the log line, capped at a fixed size. */
export function formatDebugPayload(data: unknown): string {
  let payload: string;
  try {
    payload = typeof data === "string" ? data : (JSON.stringify(data, null, 2) ?? String(data));
  } catch {
    payload = "[unserializable]";
  }
  if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
    payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
  }
  return payload;
}

export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;
  if (data !== undefined) {
    logLine += ` | ${formatDebugPayload(data)}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, if enabled, to the debug file.
 */
export function debugLog(message: string, data?: unknown, settings: DebugLogSettings = resolveDebugLogSettings()): void {
  const logLine = formatDebugLine(message, data);

  if (settings.fileEnabled) {
    // Async append so long batches never block on disk
    fs.promises.appendFile(settings.filePath, `${logLine}\n`).catch((error: unknown) => {
      if (fileWriteWarned) return;
      fileWriteWarned = true;
      const msg = error instanceof Error ? error.message : String(error);
      console.warn(`[Debug] Cannot write ${settings.filePath}: ${msg}`);
    });
  }

  console.log(logLine);
}
