import { describe, expect, it } from "vitest";
import { buildExtractionPrompt, parseExtractionResponse } from "./prompt";
import { extractionItemSchema, toExtractedFields } from "./schema";
import { ExtractionContractViolation } from "../errors";

describe("buildExtractionPrompt", () => {
  it("embeds each posting with its description capped at 8000 characters", () => {
    const prompt = buildExtractionPrompt([
      { jobId: "j1", title: "Backend Engineer", rawDescription: "x".repeat(9000) },
      { jobId: "j2", title: "Designer", rawDescription: null },
    ]);

    expect(prompt.split("\n")[0]).toBe(
      "Extract structured data for each of these 2 job posting(s).",
    );
    const payload: unknown = JSON.parse(prompt.slice(prompt.indexOf("[")));
    expect(payload).toEqual([
      { job_id: "j1", title: "Backend Engineer", raw_description: "x".repeat(8000) },
      { job_id: "j2", title: "Designer", raw_description: "" },
    ]);
  });
});

describe("parseExtractionResponse", () => {
  it("strips reasoning blocks and code fences", () => {
    const raw = '<think>hmm</think>\n```json\n{"results":[{"job_id":"a"}]}\n```';
    expect(parseExtractionResponse(raw, ["a"])).toEqual([{ job_id: "a" }]);
  });

  it("accepts a bare array and numeric job ids", () => {
    expect(parseExtractionResponse('[{"job_id": 7}]', ["7"])).toEqual([{ job_id: 7 }]);
  });

  it("rejects a result count that does not match the batch", () => {
    expect(() => parseExtractionResponse('{"results":[{}]}', ["a", "b"])).toThrow(
      new ExtractionContractViolation("Expected 2 result(s), got 1"),
    );
  });

  it("rejects results answering a different job", () => {
    expect(() =>
      parseExtractionResponse('[{"job_id":"b"},{"job_id":"a"}]', ["a", "b"]),
    ).toThrow(ExtractionContractViolation);
  });

  it("rejects non-JSON and other shapes", () => {
    expect(() => parseExtractionResponse("Sorry, I can't help", ["a"])).toThrow(
      ExtractionContractViolation,
    );
    expect(() => parseExtractionResponse('{"data":[]}', ["a"])).toThrow(
      ExtractionContractViolation,
    );
  });
});

describe("extraction items", () => {
  const complete = {
    job_id: "j1",
    department: "Engineering",
    seniority: "Senior",
    tech_stack: ["Node.js", "PostgreSQL"],
    skills: ["Mentoring"],
    pain_points: ["Scale billing"],
    job_summary: "Builds the billing platform.",
    remote_policy: "Unknown",
    salary_min: "$200k",
    salary_max: 150_000,
    experience_years: "5+",
  };

  it("normalizes a complete item", () => {
    const item = extractionItemSchema.parse(complete);
    const fields = toExtractedFields(
      item,
      { techStack: { "node.js": "nodejs" }, skills: {} },
      "Remote - US",
    );

    expect(fields).toEqual({
      department: "Engineering",
      seniority: "Senior",
      techStack: ["nodejs", "postgresql"],
      skills: ["mentoring"],
      painPoints: ["Scale billing"],
      remotePolicy: "remote",
      salaryMin: 150_000,
      salaryMax: 200_000,
      experienceYears: 5,
      jobSummary: "Builds the billing platform.",
    });
  });

  it("treats null lists as empty and requires every key", () => {
    const parsed = extractionItemSchema.parse({ ...complete, skills: null });
    expect(parsed.skills).toEqual([]);

    const missing = { ...complete, skills: undefined };
    expect(extractionItemSchema.safeParse(missing).success).toBe(false);
  });
});
