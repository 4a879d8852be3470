import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { createPipeline, runPools } from "../pipeline";
import { closeProxyAgents } from "../connectors";
import { hasFlag, intFlag } from "./args";
import type { WorkerPool } from "../workers/pool";

// npm run work -- [--fetch N] [--extract N] [--burst]
// Naming only one of --fetch/--extract runs just that pool.
const args = process.argv.slice(2);

let fetchWorkers: number | undefined;
let extractWorkers: number | undefined;
try {
  fetchWorkers = intFlag(args, "--fetch");
  extractWorkers = intFlag(args, "--extract");
} catch (error) {
  logger.error(`${error instanceof Error ? error.message : error}`);
  logger.error("Usage: npm run work -- [--fetch N] [--extract N] [--burst]");
  process.exit(1);
}

const burst = hasFlag(args, "--burst");
const onlyOne = (fetchWorkers === undefined) !== (extractWorkers === undefined);

const config = loadConfig();
initializeDatabase();

const pipeline = createPipeline(config);
const pools: WorkerPool[] = [];

if (!onlyOne || fetchWorkers !== undefined) {
  if (fetchWorkers !== 0) {
    pools.push(pipeline.createFetchPool({ concurrency: fetchWorkers, burst }));
  }
}
if (!onlyOne || extractWorkers !== undefined) {
  if (extractWorkers !== 0) {
    pools.push(
      pipeline.createExtractPool({
        concurrency: extractWorkers,
        burst,
        waitForFetch: pools.length > 0,
      }),
    );
  }
}

if (pools.length === 0) {
  logger.warn("No worker pools selected");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received, finishing in-flight tasks...`);
    for (const pool of pools) {
      pool.stop().catch((error: unknown) => logger.error("Pool stop failed:", error));
    }
  });
}

await runPools(pools, pipeline.profiles);
await closeProxyAgents();

logger.info("Workers finished");
process.exit(0);
