import { logger } from "../logger";
import { initializeDatabase, getDatabaseStats } from "../db";
import { getConfig } from "../config";
import { getLastRun } from "../db/operations";
import { TaskQueue } from "../queue";

const config = getConfig();
initializeDatabase();

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const stats = getDatabaseStats();
logger.info(`📊 Jobs: ${stats.jobs ?? 0}`);
logger.info(`🏢 Company profiles: ${stats.company_profiles ?? 0}`);
logger.info(`📬 Queued tasks: ${stats.task_queue ?? 0}`);

const BAND_NAMES = ["normal", "retry-lower", "retry-lowest"];
const queueStats = new TaskQueue({ leaseMs: config.env.leaseMs }).stats();

if (queueStats.length === 0) {
  logger.info("\n🔄 Queue is empty");
} else {
  logger.info("\n🔄 Queue:");
  for (const s of queueStats) {
    logger.info(
      `   ${s.kind.padEnd(7)} ${BAND_NAMES[s.band].padEnd(12)} ${s.status.padEnd(7)} depth ${String(s.depth).padStart(6)}  oldest ${(s.oldestAgeMs / 60_000).toFixed(1)} min`,
    );
  }
}

const lastRun = getLastRun();
if (lastRun) {
  logger.info(`\n🕐 Last run:`);
  logger.info(`   Type: ${lastRun.run_type}`);
  logger.info(`   Started: ${lastRun.started_at}`);
  logger.info(`   Finished: ${lastRun.finished_at ?? "still running"}`);
  logger.info(`   Status: ${lastRun.status}`);
  logger.info(
    `   Enqueued: ${lastRun.tasks_enqueued}, Skipped: ${lastRun.tasks_skipped}`,
  );
} else {
  logger.info("\n🕐 No runs recorded yet");
}

logger.info(`\n⚙️  Environment: ${config.env.nodeEnv}`);
