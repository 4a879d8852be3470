import { logger } from "../logger";
import { describeError } from "../errors";
import {
  getJobByKey,
  recordExtractionFailure,
  saveExtraction,
} from "../db/operations";
import {
  SYSTEM_PROMPT,
  buildExtractionPrompt,
  parseExtractionResponse,
  type ExtractionClient,
} from "../ai";
import {
  describeIssues,
  extractionItemSchema,
  toExtractedFields,
} from "../ai/schema";
import { LOWEST_BAND, type TaskQueue } from "../queue";
import type { TermMappingsConfig } from "../config";
import type { Ats, Job, Task } from "../types";
import { fixedIntervals } from "./retry";

export const EXTRACT_RETRY_INTERVALS_MS = [10_000, 30_000, 60_000] as const;

export interface ExtractWorkerDeps {
  queue: TaskQueue;
  client: ExtractionClient;
  termMappings: Pick<TermMappingsConfig, "techStack" | "skills">;
  batchSize: number;
  maxAttempts: number;
  retryIntervalsMs?: readonly number[];
  /** Told about every company whose jobs changed status. */
  onCompanyTouched?: (ats: Ats, company: string) => void;
  now?: () => Date;
}

export interface ExtractBatchOutcome {
  claimed: number;
  parsed: number;
  retried: number;
  failed: number;
  skipped: number;
}

interface BatchItem {
  task: Task;
  job: Job;
}

function claimBatch(owner: string, deps: ExtractWorkerDeps): Task[] {
  // Isolated tasks failed inside a batch before; they always run alone.
  const isolated = deps.queue.claim("extract", 1, owner, { isolated: true });
  if (isolated.length > 0) return isolated;
  return deps.queue.claim("extract", deps.batchSize, owner, { isolated: false });
}

function resolveItems(
  tasks: Task[],
  owner: string,
  deps: ExtractWorkerDeps,
  outcome: ExtractBatchOutcome,
): BatchItem[] {
  const items: BatchItem[] = [];
  for (const task of tasks) {
    const jobId = task.jobIds?.[0];
    const job = jobId ? getJobByKey(task.ats, task.company, jobId) : null;
    if (!job) {
      logger.warn(`Extract: ${task.dedupKey} has no stored posting, dropping task`);
      deps.queue.ack(task, owner);
      outcome.skipped += 1;
      continue;
    }
    items.push({ task, job });
  }
  return items;
}

/**
 * One failed item: back to the queue as an isolated task with a fixed delay,
 * or, at the attempt cap, marked failed and parked in the lowest band.
 */
function failItem(
  item: BatchItem,
  reason: string,
  owner: string,
  deps: ExtractWorkerDeps,
  outcome: ExtractBatchOutcome,
): void {
  const { task, job } = item;
  const attempt = task.attempts + 1;
  const key = { ats: job.ats, company: job.company, jobId: job.externalJobId };
  const exhausted = attempt >= deps.maxAttempts;

  recordExtractionFailure(key, reason, exhausted);

  if (exhausted) {
    deps.queue.demote(task, owner, { error: reason, toBand: LOWEST_BAND });
    logger.warn(
      `Extract: ${task.dedupKey} failed ${attempt} time(s), marked failed: ${reason}`,
    );
    outcome.failed += 1;
    deps.onCompanyTouched?.(job.ats, job.company);
    return;
  }

  const delayMs = fixedIntervals(
    deps.retryIntervalsMs ?? EXTRACT_RETRY_INTERVALS_MS,
  )(attempt, reason);
  deps.queue.retry(task, owner, { delayMs, error: reason, isolate: true });
  outcome.retried += 1;
}

function saveItem(
  item: BatchItem,
  result: unknown,
  owner: string,
  deps: ExtractWorkerDeps,
  outcome: ExtractBatchOutcome,
): void {
  const validated = extractionItemSchema.safeParse(result);
  if (!validated.success) {
    failItem(item, `Invalid extraction: ${describeIssues(validated.error)}`, owner, deps, outcome);
    return;
  }

  const { job, task } = item;
  const fields = toExtractedFields(validated.data, deps.termMappings, job.location);
  const parsedAt = (deps.now?.() ?? new Date()).toISOString();
  const saved = saveExtraction(
    { ats: job.ats, company: job.company, jobId: job.externalJobId },
    fields,
    parsedAt,
  );

  deps.queue.ack(task, owner);
  if (saved) {
    outcome.parsed += 1;
    deps.onCompanyTouched?.(job.ats, job.company);
  } else {
    outcome.skipped += 1;
  }
}

/**
 * Claims and processes one batch. Returns null when there was nothing to
 * claim.
 */
export async function runExtractionBatch(
  owner: string,
  deps: ExtractWorkerDeps,
): Promise<ExtractBatchOutcome | null> {
  const tasks = claimBatch(owner, deps);
  if (tasks.length === 0) return null;

  const outcome: ExtractBatchOutcome = {
    claimed: tasks.length,
    parsed: 0,
    retried: 0,
    failed: 0,
    skipped: 0,
  };

  const items = resolveItems(tasks, owner, deps, outcome);
  if (items.length === 0) return outcome;

  const jobIds = items.map((item) => item.job.externalJobId);
  let results: unknown[];

  try {
    const response = await deps.client.complete(
      SYSTEM_PROMPT,
      buildExtractionPrompt(
        items.map(({ job }) => ({
          jobId: job.externalJobId,
          title: job.title,
          rawDescription: job.rawDescription,
        })),
      ),
    );
    results = parseExtractionResponse(response, jobIds);
  } catch (error) {
    // Whole batch unusable: every item retries on its own.
    const reason = describeError(error);
    logger.warn(
      `Extract: batch of ${items.length} rejected (${reason}), splitting into single-item tasks`,
    );
    for (const item of items) failItem(item, reason, owner, deps, outcome);
    return outcome;
  }

  items.forEach((item, index) => {
    try {
      saveItem(item, results[index], owner, deps, outcome);
    } catch (error) {
      failItem(item, `Save failed: ${describeError(error)}`, owner, deps, outcome);
    }
  });

  logger.info(
    `Extract: batch of ${items.length}: ${outcome.parsed} parsed, ${outcome.retried} retrying, ${outcome.failed} failed`,
  );

  return outcome;
}
