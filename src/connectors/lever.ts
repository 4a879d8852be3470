import { z } from "zod";
import { logger } from "../logger";
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

const leverPostingSchema = z.object({
  id: externalIdSchema,
  text: titleSchema,
  hostedUrl: optionalString,
  categories: z
    .object({ location: optionalString, team: optionalString })
    .nullish()
    .catch(null),
  descriptionPlain: optionalString,
  description: optionalString, // HTML
  additionalPlain: optionalString,
});

type LeverPosting = z.infer<typeof leverPostingSchema>;

const leverPageSchema = z.array(z.unknown());

export function createLeverAdapter(source: SourceDefinition): AtsAdapter {
  return {
    ats: "lever",
    listPostings: (company, http) => listLeverPostings(source, company, http),
  };
}

async function* listLeverPostings(
  source: SourceDefinition,
  company: string,
  http: HttpClient,
): AsyncGenerator<RawPosting> {
  const where = `Lever/${company}`;
  const baseUrl = fillTemplate(source.endpointTemplate, { company });
  const limit = source.pageSize ?? DEFAULT_PAGE_SIZE;
  let skip = 0;
  let total = 0;

  while (true) {
    const url = withQuery(baseUrl, { skip, limit });
    const page = parsePage(leverPageSchema, await http.getJson(url), where);
    const postings = parseItems(leverPostingSchema, page, where);

    const fetchedAt = new Date().toISOString();
    for (const { data, raw } of postings) {
      yield parseLeverPosting(data, raw, company, fetchedAt);
    }
    total += postings.length;

    // A short page is the last one.
    if (page.length < limit) break;
    skip += limit;
  }

  logger.debug(`${where}: found ${total} postings`);
}

function parseLeverPosting(
  posting: LeverPosting,
  raw: unknown,
  company: string,
  fetchedAt: string,
): RawPosting {
  const body = posting.descriptionPlain ?? htmlToText(posting.description);

  return {
    ats: "lever",
    company,
    externalJobId: posting.id,
    title: posting.text,
    url:
      posting.hostedUrl ?? `https://jobs.lever.co/${company}/${posting.id}`,
    location: posting.categories?.location?.trim() || null,
    rawDescription: joinNonEmpty([body, posting.additionalPlain], "\n\n"),
    fetchedAt,
    rawPayload: JSON.stringify(raw),
  };
}
