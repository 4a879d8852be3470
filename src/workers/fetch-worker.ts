import { logger } from "../logger";
import {
  describeError,
  isRetryableFetchError,
  NotFoundError,
  RateLimitedError,
} from "../errors";
import { upsertFetchedPosting } from "../db/operations";
import { createHttpClient, type HttpClient } from "../connectors/base";
import type { AdapterRegistry } from "../connectors";
import type { Identity, IdentityRotator } from "../proxy";
import type { TaskQueue } from "../queue";
import type { SourceConfig } from "../config";
import type { RawPosting, Task } from "../types";
import {
  exponentialBackoff,
  retryLogLine,
  withRetry,
  type RetryPolicy,
} from "./retry";

export interface FetchWorkerDeps {
  queue: TaskQueue;
  adapters: AdapterRegistry;
  rotator: IdentityRotator;
  sources: SourceConfig["sources"];
  maxAttempts: number;
  backoffBase: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Builds the per-attempt client; defaults to the undici client. */
  httpFor?: (identity: Identity, timeoutMs: number) => HttpClient;
}

export type FetchOutcomeStatus = "completed" | "not-found" | "demoted" | "lease-lost";

export interface FetchOutcome {
  status: FetchOutcomeStatus;
  postings: number;
  extractEnqueued: number;
}

export function fetchRetryPolicy(
  maxAttempts: number,
  backoffBase: number,
  random?: () => number,
): RetryPolicy {
  return {
    maxAttempts,
    delayMs: exponentialBackoff(backoffBase, {
      random,
      serverDelayMs: (error) =>
        error instanceof RateLimitedError ? error.retryAfterMs : null,
    }),
    isRetryable: isRetryableFetchError,
  };
}

async function collectPostings(
  task: Task,
  deps: FetchWorkerDeps,
): Promise<RawPosting[]> {
  const adapter = deps.adapters[task.ats];
  const timeoutMs = deps.sources[task.ats].timeoutMs;
  const httpFor =
    deps.httpFor ??
    ((identity: Identity, timeout: number) =>
      createHttpClient({ identity, timeoutMs: timeout }));
  const policy = fetchRetryPolicy(deps.maxAttempts, deps.backoffBase, deps.random);

  return withRetry(
    policy,
    async () => {
      // Fresh identity per attempt; a failed listing restarts from page one.
      const identity = deps.rotator.nextIdentity();
      const http = httpFor(identity, timeoutMs);
      try {
        const postings: RawPosting[] = [];
        for await (const posting of adapter.listPostings(task.company, http)) {
          postings.push(posting);
        }
        deps.rotator.reportSuccess(identity.proxy);
        return postings;
      } catch (error) {
        if (isRetryableFetchError(error)) {
          deps.rotator.reportFailure(identity.proxy);
        }
        throw error;
      }
    },
    {
      sleep: deps.sleep,
      onRetry: (attempt, error, delayMs) =>
        logger.warn(
          `${task.ats}/${task.company}: ${retryLogLine(attempt, policy.maxAttempts, error, delayMs)}`,
        ),
    },
  );
}

function persistPostings(
  task: Task,
  postings: RawPosting[],
  queue: TaskQueue,
): number {
  let enqueued = 0;
  for (const posting of postings) {
    const result = upsertFetchedPosting(posting);
    if (!result.needsExtraction) continue;

    const outcome = queue.enqueue({
      kind: "extract",
      ats: task.ats,
      company: task.company,
      jobIds: [posting.externalJobId],
    });
    if (outcome !== "skipped") enqueued += 1;
  }
  return enqueued;
}

/**
 * Fetches one (company, ats) listing. NotFound acks with zero postings;
 * anything that survives retry demotes the task a band.
 */
export async function processFetchTask(
  task: Task,
  owner: string,
  deps: FetchWorkerDeps,
): Promise<FetchOutcome> {
  const where = `${task.ats}/${task.company}`;
  let postings: RawPosting[];

  try {
    postings = await collectPostings(task, deps);
  } catch (error) {
    if (error instanceof NotFoundError) {
      logger.info(`${where}: no board on this platform (404), zero postings`);
      const acked = deps.queue.ack(task, owner);
      return {
        status: acked ? "not-found" : "lease-lost",
        postings: 0,
        extractEnqueued: 0,
      };
    }

    logger.error(`${where}: fetch failed: ${describeError(error)}`);
    const band = deps.queue.demote(task, owner, { error: describeError(error) });
    return {
      status: band === null ? "lease-lost" : "demoted",
      postings: 0,
      extractEnqueued: 0,
    };
  }

  let extractEnqueued: number;
  try {
    extractEnqueued = persistPostings(task, postings, deps.queue);
  } catch (error) {
    logger.error(`${where}: storing postings failed: ${describeError(error)}`);
    const band = deps.queue.demote(task, owner, { error: describeError(error) });
    return {
      status: band === null ? "lease-lost" : "demoted",
      postings: postings.length,
      extractEnqueued: 0,
    };
  }

  const acked = deps.queue.ack(task, owner);

  logger.info(
    `${where}: ${postings.length} postings stored, ${extractEnqueued} queued for extraction`,
  );

  return {
    status: acked ? "completed" : "lease-lost",
    postings: postings.length,
    extractEnqueued,
  };
}
