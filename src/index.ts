import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { initializeDatabase, checkDatabaseIntegrity, db } from "./db";
import { loadConfig, type AppConfig } from "./config";
import { createPipeline } from "./pipeline";
import { startScheduler, stopScheduler } from "./scheduler";
import { createApp } from "./server";
import { closeProxyAgents } from "./connectors";

logger.info("═══════════════════════════════════════════════════");
logger.info("  ATS Ingestion Pipeline");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

try {
  initializeDatabase();
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity();
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error("Restore from backup or delete the database file to recreate.");
  process.exit(1);
}

const pipeline = createPipeline(config);
const app = createApp({ queue: pipeline.queue, environment: config.env.nodeEnv });
const port = config.env.port;

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Pipeline started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
});

startScheduler(pipeline);

const pools = [pipeline.createFetchPool(), pipeline.createExtractPool()];
const running = Promise.all(pools.map((pool) => pool.start()));

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, finishing in-flight tasks...`);

  stopScheduler();
  await Promise.all(pools.map((pool) => pool.stop()));
  await running;
  pipeline.profiles.flush();
  await closeProxyAgents();
  server.close();
  db.close();

  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}
