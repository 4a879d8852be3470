import { ExtractionContractViolation } from "../errors";

export interface ExtractionInput {
  jobId: string;
  title: string;
  rawDescription: string | null;
}

const SYSTEM_PROMPT = `You are a job posting analyzer. You receive a JSON array of job postings and extract structured data from each one.

You MUST return ONLY a JSON object of the form {"results": [...]} where "results" has exactly one object per input posting, in the same order, each with these exact fields:
{
  "job_id": "<the job_id of the input posting>",
  "department": "Engineering|Sales|Marketing|Finance|HR|Design|Product|Operations|Legal|Customer Success|Other",
  "seniority": "Intern|Junior|Mid|Senior|Lead|Staff|Principal|Manager|Director|VP|C-Level",
  "tech_stack": ["technologies", "frameworks", "tools"],
  "skills": ["key", "skills", "required"],
  "pain_points": ["problems", "this", "role", "solves"],
  "job_summary": "One sentence describing the primary function of this role",
  "remote_policy": "Remote|Hybrid|Onsite|Unknown",
  "salary_min": null,
  "salary_max": null,
  "experience_years": null
}

Rules:
- tech_stack: only specific technologies (Python, Kubernetes, AWS, etc.)
- skills: soft skills and domain expertise
- job_summary: focus on the PRIMARY function, not a generic description
- Extract salary if mentioned, as integers (e.g. 150000)
- Use null for missing values, never omit a field
- Never skip, merge or reorder postings
- Return ONLY the JSON object, no markdown, no explanation outside JSON`;

const MAX_JD_LENGTH = 8000;

export function truncateDescription(text: string): string {
  if (text.length <= MAX_JD_LENGTH) return text;
  return text.substring(0, MAX_JD_LENGTH);
}

export function buildExtractionPrompt(postings: ExtractionInput[]): string {
  const payload = postings.map((p) => ({
    job_id: p.jobId,
    title: p.title,
    raw_description: truncateDescription(p.rawDescription ?? ""),
  }));

  return [
    `Extract structured data for each of these ${postings.length} job posting(s).`,
    `Return exactly ${postings.length} result(s) in the same order.`,
    ``,
    JSON.stringify(payload, null, 2),
  ].join("\n");
}

function stripWrapping(raw: string): string {
  let jsonStr = raw.trim();

  // Strip <think> blocks (some models output reasoning before JSON)
  jsonStr = jsonStr.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

  // Strip markdown code fences if present
  const fenced = jsonStr.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  return jsonStr;
}

function echoedJobId(item: unknown): string | null {
  if (!item || typeof item !== "object" || !("job_id" in item)) return null;
  const value = item.job_id;
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return null;
}

/**
 * Batch-level checks only: valid JSON, one result per posting, echoed job
 * ids in input order. Item fields are validated separately.
 */
export function parseExtractionResponse(
  raw: string,
  expectedJobIds: string[],
): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripWrapping(raw));
  } catch (error) {
    throw new ExtractionContractViolation(`Response is not valid JSON: ${error}`);
  }

  let results: unknown[];
  if (Array.isArray(parsed)) {
    results = parsed;
  } else if (
    parsed &&
    typeof parsed === "object" &&
    "results" in parsed &&
    Array.isArray(parsed.results)
  ) {
    results = parsed.results;
  } else {
    throw new ExtractionContractViolation(
      "Response is neither an array nor an object with a results array",
    );
  }

  if (results.length !== expectedJobIds.length) {
    throw new ExtractionContractViolation(
      `Expected ${expectedJobIds.length} result(s), got ${results.length}`,
    );
  }

  results.forEach((item, index) => {
    const echoed = echoedJobId(item);
    if (echoed !== null && echoed !== expectedJobIds[index]) {
      throw new ExtractionContractViolation(
        `Result ${index} answers job ${echoed}, expected ${expectedJobIds[index]}`,
      );
    }
  });

  return results;
}

export { SYSTEM_PROMPT };
