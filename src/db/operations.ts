import { db } from "./index";
import { logger } from "../logger";
import { PersistenceConflictError } from "../errors";
import {
  isAts,
  type Ats,
  type CompanyProfile,
  type ExtractedFields,
  type ExtractionStatus,
  type Job,
  type RawPosting,
  type RemotePolicy,
  type TermCount,
} from "../types";

// Row shapes

interface JobRow {
  id: number;
  ats: string;
  company: string;
  job_id: string;
  title: string;
  url: string | null;
  location: string | null;
  raw_description: string | null;
  raw_payload: string;
  department: string | null;
  seniority: string | null;
  tech_stack: string;
  skills: string;
  pain_points: string;
  remote_policy: string | null;
  salary_min: number | null;
  salary_max: number | null;
  experience_years: number | null;
  job_summary: string | null;
  extraction_status: string;
  extraction_attempts: number;
  extraction_error: string | null;
  first_seen_at: string;
  scraped_at: string;
  parsed_at: string | null;
}

interface CompanyProfileRow {
  ats: string;
  company: string;
  total_jobs: number;
  jobs_parsed: number;
  parse_rate: number;
  departments: string;
  seniority_breakdown: string;
  top_tech_stack: string;
  top_skills: string;
  top_pain_points: string;
  hiring_signals: string;
  analyzed_at: string;
}

const REMOTE_POLICIES: readonly RemotePolicy[] = [
  "remote",
  "hybrid",
  "onsite",
  "unspecified",
];

const EXTRACTION_STATUSES: readonly ExtractionStatus[] = [
  "pending",
  "parsed",
  "failed",
];

function toAts(value: string): Ats {
  if (!isAts(value)) {
    throw new PersistenceConflictError(`Unknown ATS stored in row: ${value}`);
  }
  return value;
}

function toRemotePolicy(value: string | null): RemotePolicy {
  return REMOTE_POLICIES.find((p) => p === value) ?? "unspecified";
}

function toExtractionStatus(value: string): ExtractionStatus {
  return EXTRACTION_STATUSES.find((s) => s === value) ?? "pending";
}

function parseJson(text: string, fallback: unknown): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.warn(`Unreadable JSON column value (${error}) — using default`);
    return fallback;
  }
}

function parseStringArray(text: string): string[] {
  const parsed = parseJson(text, []);
  return Array.isArray(parsed)
    ? parsed.filter((v): v is string => typeof v === "string")
    : [];
}

function parseCountMap(text: string): Record<string, number> {
  const parsed = parseJson(text, {});
  const counts: Record<string, number> = {};
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "number") counts[key] = value;
    }
  }
  return counts;
}

function parseTermCounts(text: string): TermCount[] {
  const parsed = parseJson(text, []);
  if (!Array.isArray(parsed)) return [];

  const counts: TermCount[] = [];
  for (const item of parsed) {
    if (
      item &&
      typeof item === "object" &&
      "term" in item &&
      "count" in item &&
      typeof item.term === "string" &&
      typeof item.count === "number"
    ) {
      counts.push({ term: item.term, count: item.count });
    }
  }
  return counts;
}

function rowToJob(row: JobRow): Job {
  return {
    id: row.id,
    ats: toAts(row.ats),
    company: row.company,
    externalJobId: row.job_id,
    title: row.title,
    url: row.url,
    location: row.location,
    rawDescription: row.raw_description,
    rawPayload: row.raw_payload,
    fetchedAt: row.scraped_at,
    department: row.department,
    seniority: row.seniority,
    techStack: parseStringArray(row.tech_stack),
    skills: parseStringArray(row.skills),
    painPoints: parseStringArray(row.pain_points),
    remotePolicy: toRemotePolicy(row.remote_policy),
    salaryMin: row.salary_min,
    salaryMax: row.salary_max,
    experienceYears: row.experience_years,
    jobSummary: row.job_summary,
    extractionStatus: toExtractionStatus(row.extraction_status),
    extractionAttempts: row.extraction_attempts,
    extractionError: row.extraction_error,
    firstSeenAt: row.first_seen_at,
    scrapedAt: row.scraped_at,
    parsedAt: row.parsed_at,
  };
}

// Jobs: fetch side

export interface FetchUpsertResult {
  rowId: number;
  created: boolean;
  descriptionChanged: boolean;
  /** Unparsed, previously failed, or the description moved under a parsed row. */
  needsExtraction: boolean;
}

const UPSERT_FETCH_SQL = `INSERT INTO jobs (
     ats, company, job_id, title, url, location,
     raw_description, raw_payload, first_seen_at, scraped_at
   ) VALUES (
     @ats, @company, @jobId, @title, @url, @location,
     @rawDescription, @rawPayload, @fetchedAt, @fetchedAt
   )
   ON CONFLICT(ats, company, job_id) DO UPDATE SET
     title = excluded.title,
     url = excluded.url,
     location = excluded.location,
     raw_description = excluded.raw_description,
     raw_payload = excluded.raw_payload,
     scraped_at = excluded.scraped_at
   RETURNING id`;

export const upsertFetchedPosting = db.transaction(
  (posting: RawPosting): FetchUpsertResult => {
    const existing = db
      .prepare<
        [string, string, string],
        { id: number; raw_description: string | null; extraction_status: string }
      >(
        `SELECT id, raw_description, extraction_status
         FROM jobs WHERE ats = ? AND company = ? AND job_id = ?`,
      )
      .get(posting.ats, posting.company, posting.externalJobId);

    const returned: unknown = db.prepare(UPSERT_FETCH_SQL).get({
      ats: posting.ats,
      company: posting.company,
      jobId: posting.externalJobId,
      title: posting.title,
      url: posting.url,
      location: posting.location,
      rawDescription: posting.rawDescription,
      rawPayload: posting.rawPayload,
      fetchedAt: posting.fetchedAt,
    });

    const rowId =
      returned && typeof returned === "object" && "id" in returned
        ? Number(returned.id)
        : (existing?.id ?? -1);

    const created = !existing;
    const descriptionChanged =
      !!existing && existing.raw_description !== posting.rawDescription;

    return {
      rowId,
      created,
      descriptionChanged,
      needsExtraction:
        !existing ||
        existing.extraction_status !== "parsed" ||
        descriptionChanged,
    };
  },
);

export function getJobByKey(
  ats: Ats,
  company: string,
  jobId: string,
): Job | null {
  const row = db
    .prepare<[string, string, string], JobRow>(
      `SELECT * FROM jobs WHERE ats = ? AND company = ? AND job_id = ?`,
    )
    .get(ats, company, jobId);
  return row ? rowToJob(row) : null;
}

export function listJobsForCompany(ats: Ats, company: string): Job[] {
  return db
    .prepare<[string, string], JobRow>(
      `SELECT * FROM jobs WHERE ats = ? AND company = ? ORDER BY job_id ASC`,
    )
    .all(ats, company)
    .map(rowToJob);
}

export function listJobKeys(
  filter: { ats?: Ats; company?: string; status?: ExtractionStatus } = {},
): Array<{ ats: Ats; company: string; jobId: string }> {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filter.ats) {
    conditions.push("ats = ?");
    params.push(filter.ats);
  }
  if (filter.company) {
    conditions.push("company = ?");
    params.push(filter.company);
  }
  if (filter.status) {
    conditions.push("extraction_status = ?");
    params.push(filter.status);
  }

  const where =
    conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

  return db
    .prepare<string[], { ats: string; company: string; job_id: string }>(
      `SELECT ats, company, job_id FROM jobs ${where} ORDER BY id ASC`,
    )
    .all(...params)
    .map((row) => ({
      ats: toAts(row.ats),
      company: row.company,
      jobId: row.job_id,
    }));
}

export function listCompanies(): Array<{ ats: Ats; company: string }> {
  return db
    .prepare<[], { ats: string; company: string }>(
      `SELECT DISTINCT ats, company FROM jobs ORDER BY ats, company`,
    )
    .all()
    .map((row) => ({ ats: toAts(row.ats), company: row.company }));
}

// Jobs: extraction side

/**
 * Writes extraction fields only. Returns false when the posting no longer
 * exists (deleted out of band).
 */
export const saveExtraction = db.transaction(
  (
    key: { ats: Ats; company: string; jobId: string },
    fields: ExtractedFields,
    parsedAt: string,
  ): boolean => {
    const row = db
      .prepare<[string, string, string], { id: number }>(
        `SELECT id FROM jobs WHERE ats = ? AND company = ? AND job_id = ?`,
      )
      .get(key.ats, key.company, key.jobId);
    if (!row) return false;

    db.prepare(
      `UPDATE jobs SET
        department = @department,
        seniority = @seniority,
        tech_stack = @techStack,
        skills = @skills,
        pain_points = @painPoints,
        remote_policy = @remotePolicy,
        salary_min = @salaryMin,
        salary_max = @salaryMax,
        experience_years = @experienceYears,
        job_summary = @jobSummary,
        extraction_status = 'parsed',
        extraction_error = NULL,
        parsed_at = @parsedAt
      WHERE id = @id`,
    ).run({
      id: row.id,
      department: fields.department,
      seniority: fields.seniority,
      techStack: JSON.stringify(fields.techStack),
      skills: JSON.stringify(fields.skills),
      painPoints: JSON.stringify(fields.painPoints),
      remotePolicy: fields.remotePolicy,
      salaryMin: fields.salaryMin,
      salaryMax: fields.salaryMax,
      experienceYears: fields.experienceYears,
      jobSummary: fields.jobSummary,
      parsedAt,
    });

    db.prepare(`DELETE FROM job_terms WHERE job_row_id = ?`).run(row.id);
    const insertTerm = db.prepare(
      `INSERT OR IGNORE INTO job_terms (job_row_id, kind, term) VALUES (?, ?, ?)`,
    );
    for (const term of fields.techStack) {
      insertTerm.run(row.id, "tech_stack", term);
    }
    for (const term of fields.skills) {
      insertTerm.run(row.id, "skills", term);
    }

    return true;
  },
);

export function recordExtractionFailure(
  key: { ats: Ats; company: string; jobId: string },
  error: string,
  exhausted: boolean,
): void {
  db.prepare(
    `UPDATE jobs SET
      extraction_attempts = extraction_attempts + 1,
      extraction_error = ?,
      extraction_status = CASE WHEN ? = 1 THEN 'failed' ELSE extraction_status END
    WHERE ats = ? AND company = ? AND job_id = ?`,
  ).run(error, exhausted ? 1 : 0, key.ats, key.company, key.jobId);
}

export function findJobsByTerm(
  kind: "tech_stack" | "skills",
  term: string,
): Array<{ ats: Ats; company: string; jobId: string }> {
  return db
    .prepare<[string, string], { ats: string; company: string; job_id: string }>(
      `SELECT j.ats, j.company, j.job_id
       FROM job_terms t JOIN jobs j ON j.id = t.job_row_id
       WHERE t.kind = ? AND t.term = ?
       ORDER BY j.id ASC`,
    )
    .all(kind, term.toLowerCase())
    .map((row) => ({
      ats: toAts(row.ats),
      company: row.company,
      jobId: row.job_id,
    }));
}

// Company profiles

export function upsertCompanyProfile(profile: CompanyProfile): void {
  db.prepare(
    `INSERT INTO company_profiles (
      ats, company, total_jobs, jobs_parsed, parse_rate,
      departments, seniority_breakdown, top_tech_stack,
      top_skills, top_pain_points, hiring_signals, analyzed_at
    ) VALUES (
      @ats, @company, @totalJobs, @jobsParsed, @parseRate,
      @departments, @seniorityBreakdown, @topTechStack,
      @topSkills, @topPainPoints, @hiringSignals, @analyzedAt
    )
    ON CONFLICT(ats, company) DO UPDATE SET
      total_jobs = excluded.total_jobs,
      jobs_parsed = excluded.jobs_parsed,
      parse_rate = excluded.parse_rate,
      departments = excluded.departments,
      seniority_breakdown = excluded.seniority_breakdown,
      top_tech_stack = excluded.top_tech_stack,
      top_skills = excluded.top_skills,
      top_pain_points = excluded.top_pain_points,
      hiring_signals = excluded.hiring_signals,
      analyzed_at = excluded.analyzed_at`,
  ).run({
    ats: profile.ats,
    company: profile.company,
    totalJobs: profile.totalJobs,
    jobsParsed: profile.jobsParsed,
    parseRate: profile.parseRate,
    departments: JSON.stringify(profile.departments),
    seniorityBreakdown: JSON.stringify(profile.seniorityBreakdown),
    topTechStack: JSON.stringify(profile.topTechStack),
    topSkills: JSON.stringify(profile.topSkills),
    topPainPoints: JSON.stringify(profile.topPainPoints),
    hiringSignals: JSON.stringify(profile.hiringSignals),
    analyzedAt: profile.analyzedAt,
  });
}

export function getCompanyProfile(
  ats: Ats,
  company: string,
): CompanyProfile | null {
  const row = db
    .prepare<[string, string], CompanyProfileRow>(
      `SELECT * FROM company_profiles WHERE ats = ? AND company = ?`,
    )
    .get(ats, company);
  if (!row) return null;

  return {
    ats: toAts(row.ats),
    company: row.company,
    totalJobs: row.total_jobs,
    jobsParsed: row.jobs_parsed,
    parseRate: row.parse_rate,
    departments: parseCountMap(row.departments),
    seniorityBreakdown: parseCountMap(row.seniority_breakdown),
    topTechStack: parseTermCounts(row.top_tech_stack),
    topSkills: parseTermCounts(row.top_skills),
    topPainPoints: parseTermCounts(row.top_pain_points),
    hiringSignals: parseStringArray(row.hiring_signals),
    analyzedAt: row.analyzed_at,
  };
}

// Run Log

export function createRun(runType: string): number {
  const result = db
    .prepare(`INSERT INTO run_log (run_type) VALUES (?)`)
    .run(runType);
  return Number(result.lastInsertRowid);
}

export function finishRun(
  runId: number,
  status: string,
  stats: { tasksEnqueued: number; tasksSkipped: number; errors: string[] },
): void {
  db.prepare(
    `UPDATE run_log SET
      finished_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now'),
      status = ?,
      tasks_enqueued = ?,
      tasks_skipped = ?,
      errors = ?
    WHERE id = ?`,
  ).run(
    status,
    stats.tasksEnqueued,
    stats.tasksSkipped,
    stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
    runId,
  );
}

export interface RunLogRow {
  id: number;
  run_type: string;
  started_at: string;
  finished_at: string | null;
  status: string;
  tasks_enqueued: number;
  tasks_skipped: number;
  errors: string | null;
}

export function getLastRun(): RunLogRow | null {
  return (
    db
      .prepare<[], RunLogRow>(
        `SELECT * FROM run_log ORDER BY id DESC LIMIT 1`,
      )
      .get() ?? null
  );
}
