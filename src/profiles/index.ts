import { logger } from "../logger";
import { listJobsForCompany, upsertCompanyProfile } from "../db/operations";
import type { HiringSignalRule } from "../config";
import type { Ats, CompanyProfile, Job, TermCount } from "../types";

const UNKNOWN = "Unknown";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProfileOptions {
  rules: HiringSignalRule[];
  topN: number;
  now?: Date;
}

/** Count desc, then key asc. */
function byCountThenName(a: [string, number], b: [string, number]): number {
  return b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);
}

function countBy(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

function toOrderedRecord(counts: Map<string, number>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const [key, count] of [...counts.entries()].sort(byCountThenName)) {
    record[key] = count;
  }
  return record;
}

export function rankTerms(lists: string[][], topN: number): TermCount[] {
  return [...countBy(lists.flat()).entries()]
    .sort(byCountThenName)
    .slice(0, topN)
    .map(([term, count]) => ({ term, count }));
}

interface SignalInputs {
  jobs: Job[];
  parsed: Job[];
  departments: Record<string, number>;
  seniority: Record<string, number>;
  now: Date;
}

function sumMatching(counts: Record<string, number>, values: string[]): number {
  const wanted = new Set(values.map((v) => v.toLowerCase()));
  return Object.entries(counts)
    .filter(([key]) => wanted.has(key.toLowerCase()))
    .reduce((sum, [, count]) => sum + count, 0);
}

function ruleMatches(rule: HiringSignalRule, inputs: SignalInputs): boolean {
  switch (rule.metric) {
    case "totalJobs":
      return inputs.jobs.length >= rule.min;
    case "department":
      return sumMatching(inputs.departments, rule.values) >= rule.min;
    case "seniority":
      return sumMatching(inputs.seniority, rule.values) >= rule.min;
    case "techStack": {
      const wanted = new Set(rule.values.map((v) => v.toLowerCase()));
      const matching = inputs.parsed.filter((job) =>
        job.techStack.some((term) => wanted.has(term)),
      );
      return matching.length >= rule.min;
    }
    case "recentShare": {
      const total = inputs.jobs.length;
      if (total === 0 || total < (rule.minJobs ?? 1)) return false;
      const cutoff = inputs.now.getTime() - rule.windowDays * DAY_MS;
      const recent = inputs.jobs.filter(
        (job) => Date.parse(job.firstSeenAt) >= cutoff,
      ).length;
      return recent / total >= rule.min;
    }
  }
}

export function evaluateHiringSignals(
  rules: HiringSignalRule[],
  inputs: SignalInputs,
): string[] {
  return rules.filter((rule) => ruleMatches(rule, inputs)).map((r) => r.signal);
}

/**
 * Pure aggregate over every job of one company. Breakdowns and rankings only
 * count parsed jobs; `totalJobs` counts all of them.
 */
export function computeCompanyProfile(
  ats: Ats,
  company: string,
  jobs: Job[],
  options: ProfileOptions,
): CompanyProfile {
  const now = options.now ?? new Date();
  const parsed = jobs.filter((job) => job.extractionStatus === "parsed");

  const departments = toOrderedRecord(
    countBy(parsed.map((job) => job.department ?? UNKNOWN)),
  );
  const seniorityBreakdown = toOrderedRecord(
    countBy(parsed.map((job) => job.seniority ?? UNKNOWN)),
  );

  return {
    ats,
    company,
    totalJobs: jobs.length,
    jobsParsed: parsed.length,
    parseRate: jobs.length > 0 ? parsed.length / jobs.length : 0,
    departments,
    seniorityBreakdown,
    topTechStack: rankTerms(parsed.map((job) => job.techStack), options.topN),
    topSkills: rankTerms(parsed.map((job) => job.skills), options.topN),
    topPainPoints: rankTerms(parsed.map((job) => job.painPoints), options.topN),
    hiringSignals: evaluateHiringSignals(options.rules, {
      jobs,
      parsed,
      departments,
      seniority: seniorityBreakdown,
      now,
    }),
    analyzedAt: now.toISOString(),
  };
}

/** Rebuilds the stored profile from scratch and replaces it. */
export function recomputeCompanyProfile(
  ats: Ats,
  company: string,
  options: ProfileOptions,
): CompanyProfile {
  const profile = computeCompanyProfile(
    ats,
    company,
    listJobsForCompany(ats, company),
    options,
  );
  upsertCompanyProfile(profile);
  logger.debug(
    `Profile ${ats}/${company}: ${profile.jobsParsed}/${profile.totalJobs} parsed, signals [${profile.hiringSignals.join(", ")}]`,
  );
  return profile;
}

interface PendingRecompute {
  ats: Ats;
  company: string;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Coalesces recompute requests per (ats, company): the first request opens a
 * window of `debounceMs`, later ones inside it are absorbed.
 */
export class ProfileRecomputer {
  private readonly pending = new Map<string, PendingRecompute>();

  constructor(
    private readonly options: {
      debounceMs: number;
      recompute: (ats: Ats, company: string) => void;
    },
  ) {}

  get size(): number {
    return this.pending.size;
  }

  schedule(ats: Ats, company: string): void {
    const key = `${ats}:${company}`;
    if (this.pending.has(key)) return;

    const timer = setTimeout(() => this.run(key), this.options.debounceMs);
    timer.unref();
    this.pending.set(key, { ats, company, timer });
  }

  /** Runs everything still waiting, immediately. */
  flush(): number {
    const keys = [...this.pending.keys()];
    for (const key of keys) this.run(key);
    return keys.length;
  }

  private run(key: string): void {
    const entry = this.pending.get(key);
    if (!entry) return;

    clearTimeout(entry.timer);
    this.pending.delete(key);

    try {
      this.options.recompute(entry.ats, entry.company);
    } catch (error) {
      logger.error(`Profile recompute failed for ${key}:`, error);
    }
  }
}
