/**
 * Parallel Claim Processing
 *
 * Runs claim tasks through a p-limit pool with an overall deadline. Tasks
 * still queued at the deadline never start; tasks in flight are abandoned
 * and reported as timed out.
 *
 * @module pipeline/parallel-claims
 */

import pLimit from "p-limit";

// ============================================================================
// TYPES
// ============================================================================

export interface ParallelClaimConfig {
  maxConcurrency: number;
  /** Deadline for the whole batch; unset means no deadline */
  timeoutMs?: number;
  onProgress?: (completed: number, total: number) => void;
}

export interface ClaimTask<T> {
  id: string;
  execute: () => Promise<T>;
}

export type TaskOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: unknown }
  | { status: "timed_out" };

// ============================================================================
// PARALLEL EXECUTION
// ============================================================================

/**
 * Execute tasks with a concurrency limit. Every task id gets an outcome.
 */
export async function executeClaimsInParallel<T>(
  tasks: readonly ClaimTask<T>[],
  config: ParallelClaimConfig,
): Promise<Map<string, TaskOutcome<T>>> {
  const { maxConcurrency, timeoutMs, onProgress } = config;
  const limit = pLimit(Math.max(1, maxConcurrency));
  const results = new Map<string, TaskOutcome<T>>();
  let deadlinePassed = false;

  const promises = tasks.map((task) =>
    limit(async () => {
      try {
        const value = await task.execute();
        if (!deadlinePassed) results.set(task.id, { status: "fulfilled", value });
      } catch (error) {
        if (!deadlinePassed) results.set(task.id, { status: "rejected", reason: error });
        console.error(`[Pipeline] Task ${task.id} failed:`, error);
      }
      if (!deadlinePassed && onProgress) {
        onProgress(results.size, tasks.length);
      }
    }),
  );

  const all = Promise.allSettled(promises).then(() => "done" as const);

  if (timeoutMs === undefined) {
    await all;
  } else {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    try {
      const winner = await Promise.race([all, deadline]);
      if (winner === "timeout") {
        deadlinePassed = true;
        limit.clearQueue();
        console.warn(`[Pipeline] Batch deadline of ${timeoutMs}ms reached; ${tasks.length - results.size} tasks unfinished`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  for (const task of tasks) {
    if (!results.has(task.id)) results.set(task.id, { status: "timed_out" });
  }
  return results;
}
