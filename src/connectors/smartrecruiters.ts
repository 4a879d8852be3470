import { z } from "zod";
import { logger } from "../logger";
import {
  describeError,
  HttpStatusError,
  MalformedError,
  NotFoundError,
} from "../errors";
import {
  externalIdSchema,
  fillTemplate,
  joinNonEmpty,
  optionalString,
  parseItems,
  parsePage,
  titleSchema,
  withQuery,
  type AtsAdapter,
  type HttpClient,
} from "./base";
import { htmlToText } from "./html";
import type { RawPosting } from "../types";
import type { SourceDefinition } from "../config";

const DEFAULT_PAGE_SIZE = 100;

// Order in which detail sections are stitched into the description.
const SECTION_KEYS = [
  "jobDescription",
  "qualifications",
  "additionalInformation",
  "companyDescription",
] as const;

const smartRecruitersPostingSchema = z.object({
  id: externalIdSchema,
  name: titleSchema,
  location: z
    .object({
      city: optionalString,
      region: optionalString,
      country: optionalString,
    })
    .nullish()
    .catch(null),
});

type SmartRecruitersPosting = z.infer<typeof smartRecruitersPostingSchema>;

const smartRecruitersPageSchema = z.object({
  content: z.array(z.unknown()),
  totalFound: z.number().nullish().catch(null),
});

const sectionSchema = z
  .object({ title: optionalString, text: optionalString })
  .nullish()
  .catch(null);

const smartRecruitersDetailSchema = z.object({
  postingUrl: optionalString,
  jobAd: z
    .object({
      sections: z
        .object({
          jobDescription: sectionSchema,
          qualifications: sectionSchema,
          additionalInformation: sectionSchema,
          companyDescription: sectionSchema,
        })
        .nullish()
        .catch(null),
    })
    .nullish()
    .catch(null),
});

type SmartRecruitersDetail = z.infer<typeof smartRecruitersDetailSchema>;

export function createSmartRecruitersAdapter(
  source: SourceDefinition,
): AtsAdapter {
  return {
    ats: "smartrecruiters",
    listPostings: (company, http) =>
      listSmartRecruitersPostings(source, company, http),
  };
}

async function* listSmartRecruitersPostings(
  source: SourceDefinition,
  company: string,
  http: HttpClient,
): AsyncGenerator<RawPosting> {
  const where = `SmartRecruiters/${company}`;
  const baseUrl = fillTemplate(source.endpointTemplate, { company });
  const limit = source.pageSize ?? DEFAULT_PAGE_SIZE;
  let offset = 0;
  let total = 0;

  while (true) {
    const url = withQuery(baseUrl, { offset, limit });
    const page = parsePage(
      smartRecruitersPageSchema,
      await http.getJson(url),
      where,
    );
    const postings = parseItems(smartRecruitersPostingSchema, page.content, where);

    for (const { data, raw } of postings) {
      // The listing carries no description; each posting needs a detail call.
      const detail = await fetchDetail(http, `${baseUrl}/${encodeURIComponent(data.id)}`, where);
      yield parseSmartRecruitersPosting(
        data,
        detail,
        raw,
        company,
        new Date().toISOString(),
      );
    }
    total += postings.length;

    if (page.content.length === 0) break;
    offset += page.content.length;
    const done =
      page.totalFound !== null && page.totalFound !== undefined
        ? offset >= page.totalFound
        : page.content.length < limit;
    if (done) break;
  }

  logger.debug(`${where}: found ${total} postings`);
}

async function fetchDetail(
  http: HttpClient,
  url: string,
  where: string,
): Promise<SmartRecruitersDetail | null> {
  try {
    return parsePage(smartRecruitersDetailSchema, await http.getJson(url), where);
  } catch (error) {
    if (error instanceof NotFoundError) {
      logger.warn(`${where}: posting detail gone (${url}), description left empty`);
      return null;
    }
    // One bad posting must not cost the rest of the listing.
    if (error instanceof MalformedError || error instanceof HttpStatusError) {
      logger.warn(
        `${where}: posting detail unusable (${describeError(error)}), description left empty`,
      );
      return null;
    }
    throw error;
  }
}

export function formatSections(detail: SmartRecruitersDetail | null): string | null {
  const sections = detail?.jobAd?.sections;
  if (!sections) return null;

  const parts: string[] = [];
  for (const key of SECTION_KEYS) {
    const section = sections[key];
    const text = htmlToText(section?.text);
    if (!section || !text) continue;
    if (section.title?.trim()) parts.push(`## ${section.title.trim()}`);
    parts.push(text);
  }
  return parts.length > 0 ? parts.join("\n\n") : null;
}

function parseSmartRecruitersPosting(
  posting: SmartRecruitersPosting,
  detail: SmartRecruitersDetail | null,
  raw: unknown,
  company: string,
  fetchedAt: string,
): RawPosting {
  const location = joinNonEmpty(
    [posting.location?.city, posting.location?.region, posting.location?.country],
    ", ",
  );

  return {
    ats: "smartrecruiters",
    company,
    externalJobId: posting.id,
    title: posting.name,
    url:
      detail?.postingUrl ??
      `https://jobs.smartrecruiters.com/${company}/${posting.id}`,
    location,
    rawDescription: formatSections(detail),
    fetchedAt,
    rawPayload: JSON.stringify(raw),
  };
}
