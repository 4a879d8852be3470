import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { findJobsByTerm } from "../db/operations";
import { termFlag } from "./args";

// Jobs whose normalized tech stack or skills contain a term.
const args = process.argv.slice(2);

let query: ReturnType<typeof termFlag>;
try {
  query = termFlag(args);
} catch (error) {
  logger.error(`${error instanceof Error ? error.message : error}`);
  logger.error("Usage: npm run find-jobs -- (--tech <term> | --skill <term>)");
  process.exit(1);
}

initializeDatabase();

const matches = findJobsByTerm(query.kind, query.term);
for (const match of matches) {
  logger.info(`  ${match.ats}/${match.company}/${match.jobId}`);
}
logger.info(`Find: ${matches.length} job(s) with ${query.kind} "${query.term}"`);
process.exit(0);
