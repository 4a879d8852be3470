import { logger } from "../logger";
import { createRun, finishRun } from "../db/operations";
import { describeError } from "../errors";
import type { TaskQueue } from "./index";
import type { CompanyRegistryEntry } from "../types";

export interface DispatchResult {
  runId: number;
  enqueued: number;
  skipped: number;
  markedDirty: number;
  errors: string[];
}

/** One fetch task per active (company, ats) registry entry. */
export function dispatchFetchTasks(
  registry: CompanyRegistryEntry[],
  queue: TaskQueue,
  options: { limit?: number; runType?: string } = {},
): DispatchResult {
  const runId = createRun(options.runType ?? "dispatch");
  const active = registry.filter((entry) => entry.active);
  const selected =
    options.limit !== undefined ? active.slice(0, options.limit) : active;

  const result: DispatchResult = {
    runId,
    enqueued: 0,
    skipped: 0,
    markedDirty: 0,
    errors: [],
  };

  for (const entry of selected) {
    try {
      const outcome = queue.enqueue({
        kind: "fetch",
        ats: entry.ats,
        company: entry.slug,
      });
      if (outcome === "enqueued") result.enqueued += 1;
      else if (outcome === "marked-dirty") result.markedDirty += 1;
      else result.skipped += 1;
    } catch (error) {
      const message = `${entry.ats}/${entry.slug}: ${describeError(error)}`;
      logger.error(`Dispatch failed for ${message}`);
      result.errors.push(message);
    }
  }

  finishRun(runId, result.errors.length > 0 ? "partial" : "success", {
    tasksEnqueued: result.enqueued + result.markedDirty,
    tasksSkipped: result.skipped,
    errors: result.errors,
  });

  logger.info(
    `Dispatch #${runId}: ${result.enqueued} enqueued, ${result.markedDirty} re-queued behind in-flight, ${result.skipped} already pending (${selected.length}/${registry.length} registry entries)`,
  );

  return result;
}
