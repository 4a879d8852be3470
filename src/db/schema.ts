export const SCHEMA_VERSION = 1;

export const CREATE_TABLES_SQL = `
  -- 1. run_log
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    started_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    finished_at TEXT,
    status TEXT DEFAULT 'running',
    tasks_enqueued INTEGER DEFAULT 0,
    tasks_skipped INTEGER DEFAULT 0,
    errors TEXT
  );

  -- 2. jobs: one row per (ats, company, job_id); fetch and extraction fields
  -- are written by separate upserts.
  CREATE TABLE IF NOT EXISTS jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ats TEXT NOT NULL,
    company TEXT NOT NULL,
    job_id TEXT NOT NULL,
    title TEXT NOT NULL,
    url TEXT,
    location TEXT,
    raw_description TEXT,
    raw_payload TEXT NOT NULL,

    department TEXT,
    seniority TEXT,
    tech_stack TEXT NOT NULL DEFAULT '[]',
    skills TEXT NOT NULL DEFAULT '[]',
    pain_points TEXT NOT NULL DEFAULT '[]',
    remote_policy TEXT,
    salary_min INTEGER,
    salary_max INTEGER,
    experience_years INTEGER,
    job_summary TEXT,

    extraction_status TEXT NOT NULL DEFAULT 'pending',
    extraction_attempts INTEGER NOT NULL DEFAULT 0,
    extraction_error TEXT,
    first_seen_at TEXT NOT NULL,
    scraped_at TEXT NOT NULL,
    parsed_at TEXT,

    UNIQUE(ats, company, job_id),
    CHECK (salary_min IS NULL OR salary_max IS NULL OR salary_min <= salary_max)
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_company ON jobs(company);
  CREATE INDEX IF NOT EXISTS idx_jobs_department ON jobs(department);
  CREATE INDEX IF NOT EXISTS idx_jobs_seniority ON jobs(seniority);
  CREATE INDEX IF NOT EXISTS idx_jobs_remote ON jobs(remote_policy);
  CREATE INDEX IF NOT EXISTS idx_jobs_extraction_status ON jobs(extraction_status);

  -- 3. job_terms: indexed lookup for tech_stack / skills array membership
  CREATE TABLE IF NOT EXISTS job_terms (
    job_row_id INTEGER NOT NULL,
    kind TEXT NOT NULL,
    term TEXT NOT NULL,
    PRIMARY KEY (job_row_id, kind, term),
    FOREIGN KEY (job_row_id) REFERENCES jobs(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_job_terms_lookup ON job_terms(kind, term);

  -- 4. company_profiles: rebuilt wholesale from jobs
  CREATE TABLE IF NOT EXISTS company_profiles (
    ats TEXT NOT NULL,
    company TEXT NOT NULL,
    total_jobs INTEGER NOT NULL DEFAULT 0,
    jobs_parsed INTEGER NOT NULL DEFAULT 0,
    parse_rate REAL NOT NULL DEFAULT 0,
    departments TEXT NOT NULL DEFAULT '{}',
    seniority_breakdown TEXT NOT NULL DEFAULT '{}',
    top_tech_stack TEXT NOT NULL DEFAULT '[]',
    top_skills TEXT NOT NULL DEFAULT '[]',
    top_pain_points TEXT NOT NULL DEFAULT '[]',
    hiring_signals TEXT NOT NULL DEFAULT '[]',
    analyzed_at TEXT NOT NULL,
    PRIMARY KEY (ats, company)
  );

  CREATE INDEX IF NOT EXISTS idx_profiles_company ON company_profiles(company);

  -- 5. task_queue: durable lease-based work queue (epoch ms timestamps)
  CREATE TABLE IF NOT EXISTS task_queue (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    kind TEXT NOT NULL,
    ats TEXT NOT NULL,
    company TEXT NOT NULL,
    job_ids TEXT,
    dedup_key TEXT NOT NULL UNIQUE,
    band INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'pending',
    attempts INTEGER NOT NULL DEFAULT 0,
    isolated INTEGER NOT NULL DEFAULT 0,
    dirty INTEGER NOT NULL DEFAULT 0,
    available_at INTEGER NOT NULL,
    leased_until INTEGER,
    lease_owner TEXT,
    last_error TEXT,
    enqueued_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_task_queue_claim
    ON task_queue(kind, isolated, band, available_at);
`;
