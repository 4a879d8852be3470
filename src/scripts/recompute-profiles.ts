import { logger } from "../logger";
import { initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { listCompanies } from "../db/operations";
import { recomputeCompanyProfile } from "../profiles";
import { describeError } from "../errors";

const config = loadConfig();
initializeDatabase();

const companies = listCompanies();
let failed = 0;

for (const { ats, company } of companies) {
  try {
    const profile = recomputeCompanyProfile(ats, company, {
      rules: config.hiringSignals.rules,
      topN: config.env.profileTopN,
    });
    logger.info(
      `${ats}/${company}: ${profile.jobsParsed}/${profile.totalJobs} parsed` +
        (profile.hiringSignals.length > 0
          ? `, signals: ${profile.hiringSignals.join(", ")}`
          : ""),
    );
  } catch (error) {
    failed += 1;
    logger.error(`${ats}/${company}: recompute failed: ${describeError(error)}`);
  }
}

logger.info(`Recomputed ${companies.length - failed}/${companies.length} company profile(s)`);
process.exit(failed > 0 ? 1 : 0);
