import { z } from "zod";
import {
  normalizeLabel,
  normalizePainPoints,
  normalizeRemotePolicy,
  normalizeSalaryRange,
  normalizeTerms,
  parseExperienceYears,
} from "../normalizer";
import type { ExtractedFields } from "../types";
import type { TermMappingsConfig } from "../config";

// Every key is required; `null` is how the model says "not mentioned".
const label = z.string().nullable();

const termList = z
  .array(z.union([z.string(), z.number()]).transform(String))
  .nullable()
  .transform((v) => v ?? []);

const numeric = z.union([z.number(), z.string(), z.null()]);

export const extractionItemSchema = z.object({
  job_id: z.union([z.string(), z.number()]).transform(String).optional(),
  department: label,
  seniority: label,
  tech_stack: termList,
  skills: termList,
  pain_points: termList,
  job_summary: label,
  remote_policy: label,
  salary_min: numeric,
  salary_max: numeric,
  experience_years: numeric,
});

export type ExtractionItem = z.infer<typeof extractionItemSchema>;

export function toExtractedFields(
  item: ExtractionItem,
  mappings: Pick<TermMappingsConfig, "techStack" | "skills">,
  location: string | null = null,
): ExtractedFields {
  const { salaryMin, salaryMax } = normalizeSalaryRange(
    item.salary_min,
    item.salary_max,
  );

  return {
    department: normalizeLabel(item.department),
    seniority: normalizeLabel(item.seniority),
    techStack: normalizeTerms(item.tech_stack, mappings.techStack),
    skills: normalizeTerms(item.skills, mappings.skills),
    painPoints: normalizePainPoints(item.pain_points),
    remotePolicy: normalizeRemotePolicy(item.remote_policy, location),
    salaryMin,
    salaryMax,
    experienceYears: parseExperienceYears(item.experience_years),
    jobSummary: normalizeLabel(item.job_summary),
  };
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "item"}: ${issue.message}`)
    .join("; ");
}
