import { z } from "zod";
import { logger } from "../logger";
import {
  externalIdSchema,
  fillTemplate,
  optionalString,
  parseItems,
  parsePage,
  titleSchema,
  type AtsAdapter,
  type HttpClient,
} from "./base";
import { htmlToText } from "./html";
import type { RawPosting } from "../types";
import type { SourceDefinition } from "../config";

const ashbyJobSchema = z.object({
  id: externalIdSchema,
  title: titleSchema,
  location: optionalString,
  jobUrl: optionalString,
  descriptionPlain: optionalString,
  descriptionHtml: optionalString,
});

type AshbyJob = z.infer<typeof ashbyJobSchema>;

const ashbyResponseSchema = z.object({
  jobs: z.array(z.unknown()),
});

export function createAshbyAdapter(source: SourceDefinition): AtsAdapter {
  return {
    ats: "ashby",
    listPostings: (company, http) => listAshbyJobs(source, company, http),
  };
}

async function* listAshbyJobs(
  source: SourceDefinition,
  company: string,
  http: HttpClient,
): AsyncGenerator<RawPosting> {
  const where = `Ashby/${company}`;
  const url = fillTemplate(source.endpointTemplate, { company });

  const body = parsePage(ashbyResponseSchema, await http.getJson(url), where);
  const jobs = parseItems(ashbyJobSchema, body.jobs, where);
  logger.debug(`${where}: found ${jobs.length} jobs`);

  const fetchedAt = new Date().toISOString();
  for (const { data, raw } of jobs) {
    yield parseAshbyJob(data, raw, company, fetchedAt);
  }
}

function parseAshbyJob(
  job: AshbyJob,
  raw: unknown,
  company: string,
  fetchedAt: string,
): RawPosting {
  const description =
    job.descriptionPlain?.trim() || htmlToText(job.descriptionHtml);

  return {
    ats: "ashby",
    company,
    externalJobId: job.id,
    title: job.title,
    url: job.jobUrl ?? `https://jobs.ashbyhq.com/${company}/${job.id}`,
    location: job.location?.trim() || null,
    rawDescription: description || null,
    fetchedAt,
    rawPayload: JSON.stringify(raw),
  };
}
