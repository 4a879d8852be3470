export const ATS_PLATFORMS = [
  "greenhouse",
  "lever",
  "ashby",
  "smartrecruiters",
] as const;

export type Ats = (typeof ATS_PLATFORMS)[number];

export type RemotePolicy = "remote" | "hybrid" | "onsite" | "unspecified";

export type ExtractionStatus = "pending" | "parsed" | "failed";

export type TaskKind = "fetch" | "extract";

/** 0 = normal, 1 = retry-lower, 2 = retry-lowest */
export type PriorityBand = 0 | 1 | 2;

export type TaskStatus = "pending" | "leased";

export function isAts(value: string): value is Ats {
  return (ATS_PLATFORMS as readonly string[]).includes(value);
}

export interface RawPosting {
  ats: Ats;
  company: string;
  externalJobId: string;
  title: string;
  url: string | null;
  location: string | null;
  rawDescription: string | null;
  fetchedAt: string;
  rawPayload: string; // Original posting JSON from the platform
}

export interface ExtractedFields {
  department: string | null;
  seniority: string | null;
  techStack: string[];
  skills: string[];
  painPoints: string[];
  remotePolicy: RemotePolicy;
  salaryMin: number | null;
  salaryMax: number | null;
  experienceYears: number | null;
  jobSummary: string | null;
}

export interface Job extends RawPosting, ExtractedFields {
  id: number;
  firstSeenAt: string;
  scrapedAt: string;
  parsedAt: string | null;
  extractionStatus: ExtractionStatus;
  extractionAttempts: number;
  extractionError: string | null;
}

export interface TermCount {
  term: string;
  count: number;
}

export interface CompanyProfile {
  ats: Ats;
  company: string;
  totalJobs: number;
  jobsParsed: number;
  parseRate: number;
  departments: Record<string, number>;
  seniorityBreakdown: Record<string, number>;
  topTechStack: TermCount[];
  topSkills: TermCount[];
  topPainPoints: TermCount[];
  hiringSignals: string[];
  analyzedAt: string;
}

/** Queue payload shape. */
export interface TaskPayload {
  kind: TaskKind;
  ats: Ats;
  company: string;
  jobIds?: string[];
}

export interface Task extends TaskPayload {
  id: number;
  dedupKey: string;
  band: PriorityBand;
  status: TaskStatus;
  attempts: number;
  isolated: boolean;
  availableAt: number;
  leasedUntil: number | null;
  leaseOwner: string | null;
  lastError: string | null;
  enqueuedAt: number;
}

export interface CompanyRegistryEntry {
  name: string;
  ats: Ats;
  slug: string;
  active: boolean;
}
