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

const greenhouseJobSchema = z.object({
  id: externalIdSchema,
  title: titleSchema,
  absolute_url: optionalString,
  location: z.object({ name: optionalString }).nullish().catch(null),
  content: optionalString,
});

type GreenhouseJob = z.infer<typeof greenhouseJobSchema>;

const greenhouseResponseSchema = z.object({
  jobs: z.array(z.unknown()),
});

export function createGreenhouseAdapter(source: SourceDefinition): AtsAdapter {
  return {
    ats: "greenhouse",
    listPostings: (company, http) => listGreenhouseJobs(source, company, http),
  };
}

async function* listGreenhouseJobs(
  source: SourceDefinition,
  company: string,
  http: HttpClient,
): AsyncGenerator<RawPosting> {
  const where = `Greenhouse/${company}`;
  const url = fillTemplate(source.endpointTemplate, { company });

  // Single page: the board endpoint returns every open job at once.
  const body = parsePage(greenhouseResponseSchema, await http.getJson(url), where);
  const jobs = parseItems(greenhouseJobSchema, body.jobs, where);
  logger.debug(`${where}: found ${jobs.length} jobs`);

  const fetchedAt = new Date().toISOString();
  for (const { data, raw } of jobs) {
    yield parseGreenhouseJob(data, raw, company, fetchedAt);
  }
}

function parseGreenhouseJob(
  job: GreenhouseJob,
  raw: unknown,
  company: string,
  fetchedAt: string,
): RawPosting {
  return {
    ats: "greenhouse",
    company,
    externalJobId: job.id,
    title: job.title,
    url:
      job.absolute_url ??
      `https://boards.greenhouse.io/${company}/jobs/${job.id}`,
    location: job.location?.name?.trim() || null,
    rawDescription: htmlToText(job.content),
    fetchedAt,
    rawPayload: JSON.stringify(raw),
  };
}
