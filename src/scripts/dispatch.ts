import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { createPipeline } from "../pipeline";
import { intFlag } from "./args";

const args = process.argv.slice(2);

let limit: number | undefined;
try {
  limit = intFlag(args, "--limit");
} catch (error) {
  logger.error(`${error instanceof Error ? error.message : error}`);
  logger.error("Usage: npm run dispatch -- [--limit N]");
  process.exit(1);
}

const config = loadConfig();
initializeDatabase();

const result = createPipeline(config).dispatch(limit, "manual");

logger.info(`  Run ID:    ${result.runId}`);
logger.info(`  Enqueued:  ${result.enqueued}`);
logger.info(`  Re-queued: ${result.markedDirty}`);
logger.info(`  Skipped:   ${result.skipped}`);
logger.info(`  Errors:    ${result.errors.length}`);

process.exit(result.errors.length > 0 && result.enqueued === 0 ? 1 : 0);
