import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { loadEnvConfig } from "../config";
import { listJobKeys } from "../db/operations";
import { TaskQueue } from "../queue";
import { atsFlag, flagValue } from "./args";
import type { Ats } from "../types";

// Queue extraction again, e.g. after a prompt change.
const args = process.argv.slice(2);

let ats: Ats | undefined;
try {
  ats = atsFlag(args);
} catch (error) {
  logger.error(`${error instanceof Error ? error.message : error}`);
  logger.error("Usage: npm run reextract -- [--ats <ats>] [--company <slug>]");
  process.exit(1);
}
const company = flagValue(args, "--company") ?? undefined;

initializeDatabase();

const queue = new TaskQueue({ leaseMs: loadEnvConfig().leaseMs });
const keys = listJobKeys({ ats, company });

let enqueued = 0;
let skipped = 0;
for (const key of keys) {
  const outcome = queue.enqueue({
    kind: "extract",
    ats: key.ats,
    company: key.company,
    jobIds: [key.jobId],
  });
  if (outcome === "skipped") skipped += 1;
  else enqueued += 1;
}

logger.info(
  `Re-extract: ${enqueued} posting(s) queued, ${skipped} already pending (${keys.length} matched)`,
);
process.exit(0);
