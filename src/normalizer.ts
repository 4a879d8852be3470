import type { RemotePolicy } from "./types";

// Work mode keywords, checked against the lower-cased text.
const MODE_KEYWORDS: Record<Exclude<RemotePolicy, "unspecified">, string[]> = {
  hybrid: ["hybrid", "partially remote", "part remote"],
  onsite: ["onsite", "on-site", "on site", "in-office", "in office", "office-based", "in person", "in-person"],
  remote: ["remote", "distributed", "work from home", "work-from-home", "wfh", "anywhere", "telecommute"],
};

const EMPTY_LABELS = new Set(["", "unknown", "null", "none", "n/a", "na"]);

// Work mode classification
export function classifyRemotePolicy(...texts: Array<string | null | undefined>): RemotePolicy {
  const combined = texts
    .filter((t): t is string => !!t)
    .join(" ")
    .toLowerCase();
  if (!combined.trim()) return "unspecified";

  const has = (mode: keyof typeof MODE_KEYWORDS) =>
    MODE_KEYWORDS[mode].some((kw) => combined.includes(kw));

  const hasHybrid = has("hybrid");
  const hasOnsite = has("onsite");
  const hasRemote = has("remote");

  // Remote plus an office requirement reads as hybrid.
  if (hasHybrid) return "hybrid";
  if (hasRemote && hasOnsite) return "hybrid";
  if (hasRemote) return "remote";
  if (hasOnsite) return "onsite";

  return "unspecified";
}

/**
 * The model's `remote_policy` value decides; the posting's location is only
 * consulted when the model had nothing to say.
 */
export function normalizeRemotePolicy(
  value: string | null,
  location: string | null = null,
): RemotePolicy {
  const fromValue = classifyRemotePolicy(value);
  return fromValue !== "unspecified" ? fromValue : classifyRemotePolicy(location);
}

// Salary handling

const SALARY_PATTERN = /(\d+(?:\.\d+)?)\s*([km])?\b/i;

/**
 * Accepts numbers or strings such as "$150k", "150,000", "1.2M". Negative or
 * unreadable figures give null.
 */
export function parseSalary(value: unknown): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) return null;
    return Math.round(value);
  }
  if (typeof value !== "string") return null;

  const cleaned = value.replace(/[$€£,\s]/g, "").toLowerCase();
  if (!cleaned || cleaned.startsWith("-")) return null;

  const match = SALARY_PATTERN.exec(cleaned);
  if (!match) return null;

  const amount = Number.parseFloat(match[1]);
  const unit = match[2]?.toLowerCase();
  const multiplier = unit === "k" ? 1_000 : unit === "m" ? 1_000_000 : 1;
  return Math.round(amount * multiplier);
}

export function normalizeSalaryRange(
  min: unknown,
  max: unknown,
): { salaryMin: number | null; salaryMax: number | null } {
  const salaryMin = parseSalary(min);
  const salaryMax = parseSalary(max);

  if (salaryMin !== null && salaryMax !== null && salaryMin > salaryMax) {
    return { salaryMin: salaryMax, salaryMax: salaryMin };
  }
  return { salaryMin, salaryMax };
}

export function parseExperienceYears(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : null;
  }
  if (typeof value !== "string") return null;

  const match = /\d+/.exec(value);
  return match ? Number.parseInt(match[0], 10) : null;
}

// Labels and term lists

export function normalizeLabel(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.replace(/\s+/g, " ").trim();
  return EMPTY_LABELS.has(trimmed.toLowerCase()) ? null : trimmed;
}

/** Lower-cased, mapped to the canonical spelling, deduplicated and sorted. */
export function normalizeTerms(
  terms: string[],
  mappings: Record<string, string>,
): string[] {
  const normalized = new Set<string>();
  for (const term of terms) {
    const cleaned = term.replace(/\s+/g, " ").trim().toLowerCase();
    if (!cleaned) continue;
    normalized.add(Object.hasOwn(mappings, cleaned) ? mappings[cleaned] : cleaned);
  }
  return [...normalized].sort();
}

/** Trimmed; first spelling wins among case-insensitive duplicates. */
export function normalizePainPoints(points: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const point of points) {
    const trimmed = point.replace(/\s+/g, " ").trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}
