import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { SCHEMA_VERSION } from "./schema";
import { runMigrations } from "./migrations";
import { loadEnvConfig } from "../config";
import { logger } from "../logger";

const DB_PATH = loadEnvConfig().dbPath;
const IN_MEMORY = DB_PATH === ":memory:";

if (!IN_MEMORY && !existsSync(dirname(DB_PATH))) {
  mkdirSync(dirname(DB_PATH), { recursive: true });
  logger.info(`Created data directory: ${dirname(DB_PATH)}`);
}

const db = new Database(DB_PATH);

// WAL lets fetch/extract processes read while another one writes.
if (!IN_MEMORY) {
  db.pragma("journal_mode = WAL");
}
db.pragma("foreign_keys = ON");
db.pragma("busy_timeout = 5000");

const EXPECTED_TABLES = [
  "jobs",
  "job_terms",
  "company_profiles",
  "task_queue",
  "run_log",
];

export function initializeDatabase(): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tableNames = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");

    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(): { ok: boolean; result: string } {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(
        `Database integrity check FAILED: ${result?.integrity_check}`,
      );
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of [...EXPECTED_TABLES, "_migrations"]) {
    try {
      const result = db
        .prepare<[], { count: number }>(
          `SELECT COUNT(*) as count FROM ${table}`,
        )
        .get();
      stats[table] = result?.count ?? 0;
    } catch (error) {
      logger.debug(`Stats unavailable for ${table}: ${error}`);
      stats[table] = -1;
    }
  }

  return stats;
}

export function quickHealthCheck(): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch (error) {
    logger.error(`Database health check failed: ${error}`);
    return false;
  }
}

export { db, DB_PATH, SCHEMA_VERSION };
