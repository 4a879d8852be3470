import { logger } from "./logger";
import { createAdapters, type AdapterRegistry } from "./connectors";
import { IdentityRotator } from "./proxy";
import { TaskQueue } from "./queue";
import { dispatchFetchTasks, type DispatchResult } from "./queue/dispatcher";
import { createExtractionClient, type ExtractionClient } from "./ai";
import { ProfileRecomputer, recomputeCompanyProfile } from "./profiles";
import { processFetchTask } from "./workers/fetch-worker";
import { runExtractionBatch } from "./workers/extract-worker";
import { WorkerPool } from "./workers/pool";
import type { AppConfig } from "./config";
import type { Ats } from "./types";

export interface PoolOptions {
  concurrency?: number;
  burst?: boolean;
  /** Extraction only: in burst mode, keep polling while fetch tasks remain. */
  waitForFetch?: boolean;
}

export interface Pipeline {
  config: AppConfig;
  queue: TaskQueue;
  rotator: IdentityRotator;
  adapters: AdapterRegistry;
  client: ExtractionClient;
  profiles: ProfileRecomputer;
  dispatch(limit?: number, runType?: string): DispatchResult;
  recomputeProfile(ats: Ats, company: string): void;
  createFetchPool(options?: PoolOptions): WorkerPool;
  createExtractPool(options?: PoolOptions): WorkerPool;
}

/** Wires queue, rotator, adapters, LLM client and profile recompute from config. */
export function createPipeline(
  config: AppConfig,
  overrides: { client?: ExtractionClient; queue?: TaskQueue } = {},
): Pipeline {
  const { env } = config;

  const queue = overrides.queue ?? new TaskQueue({ leaseMs: env.leaseMs });
  const rotator = new IdentityRotator({
    proxies: env.proxies,
    credentials:
      env.proxyUser && env.proxyPass
        ? { username: env.proxyUser, password: env.proxyPass }
        : null,
    userAgents: config.userAgents.userAgents,
    poolSize: env.proxyPoolSize,
    failureThreshold: env.proxyFailureThreshold,
    cooldownMs: env.proxyCooldownMs,
  });
  const adapters = createAdapters(config.sources.sources);
  const client = overrides.client ?? createExtractionClient(env);

  const recomputeProfile = (ats: Ats, company: string): void => {
    recomputeCompanyProfile(ats, company, {
      rules: config.hiringSignals.rules,
      topN: env.profileTopN,
    });
  };
  const profiles = new ProfileRecomputer({
    debounceMs: env.profileDebounceMs,
    recompute: recomputeProfile,
  });

  return {
    config,
    queue,
    rotator,
    adapters,
    client,
    profiles,
    recomputeProfile,

    dispatch: (limit, runType) =>
      dispatchFetchTasks(config.companies.companies, queue, { limit, runType }),

    createFetchPool: (options = {}) =>
      new WorkerPool({
        name: "fetch",
        concurrency: options.concurrency ?? env.fetchWorkers,
        pollIntervalMs: env.pollIntervalMs,
        burst: options.burst,
        isDrained: () => queue.outstanding(["fetch"]) === 0,
        step: async (owner) => {
          const [task] = queue.claim("fetch", 1, owner);
          if (!task) return false;
          await processFetchTask(task, owner, {
            queue,
            adapters,
            rotator,
            sources: config.sources.sources,
            maxAttempts: env.fetchMaxAttempts,
            backoffBase: env.fetchBackoffBase,
          });
          return true;
        },
      }),

    createExtractPool: (options = {}) =>
      new WorkerPool({
        name: "extract",
        concurrency: options.concurrency ?? env.extractWorkers,
        pollIntervalMs: env.pollIntervalMs,
        burst: options.burst,
        // Fetch work still in flight will feed more extraction tasks.
        isDrained: () =>
          queue.outstanding(
            options.waitForFetch === false ? ["extract"] : ["fetch", "extract"],
          ) === 0,
        step: async (owner) => {
          const outcome = await runExtractionBatch(owner, {
            queue,
            client,
            termMappings: config.termMappings,
            batchSize: env.extractBatchSize,
            maxAttempts: env.extractMaxAttempts,
            onCompanyTouched: (ats, company) => profiles.schedule(ats, company),
          });
          return outcome !== null;
        },
      }),
  };
}

export async function runPools(
  pools: WorkerPool[],
  profiles: ProfileRecomputer,
): Promise<void> {
  await Promise.all(pools.map((pool) => pool.start()));
  const flushed = profiles.flush();
  if (flushed > 0) logger.info(`Recomputed ${flushed} pending company profile(s)`);
}
