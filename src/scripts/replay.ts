import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { loadEnvConfig } from "../config";
import { TaskQueue } from "../queue";
import { bandFlag, kindFlag } from "./args";
import type { PriorityBand, TaskKind } from "../types";

// Parse CLI args
const args = process.argv.slice(2);

let kind: TaskKind | undefined;
let band: PriorityBand | undefined;
try {
  kind = kindFlag(args);
  band = bandFlag(args);
} catch (error) {
  logger.error(`${error instanceof Error ? error.message : error}`);
  logger.error("Usage: npm run replay -- [--kind fetch|extract] [--band 1|2]");
  process.exit(1);
}

initializeDatabase();

const queue = new TaskQueue({ leaseMs: loadEnvConfig().leaseMs });
const moved = queue.replay({ kind, band });

logger.info(
  `Replay: ${moved} task(s) moved back to band 0 (kind: ${kind ?? "all"}, band: ${band ?? "1-2"})`,
);
process.exit(0);
