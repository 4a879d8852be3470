import { beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { db, initializeDatabase } from "../db";
import { getJobByKey, listJobKeys, upsertFetchedPosting } from "../db/operations";
import { TaskQueue, DEMOTE_DELAY_MS } from "../queue";
import { ExtractionCallError } from "../errors";
import type { ExtractionClient } from "../ai";
import { runExtractionBatch, type ExtractWorkerDeps } from "./extract-worker";

const OWNER = "test-host:1:extract-0";
const START = 1_000_000;
let clock = START;
const queue = new TaskQueue({ leaseMs: 60_000, now: () => clock });

const promptSchema = z.array(z.object({ job_id: z.string() }));

function promptJobIds(userPrompt: string): string[] {
  const payload: unknown = JSON.parse(userPrompt.slice(userPrompt.indexOf("[")));
  return promptSchema.parse(payload).map((p) => p.job_id);
}

/** Answers each prompt with whatever `respond` returns; Errors are thrown. */
function fakeClient(respond: (jobIds: string[]) => unknown) {
  const batches: string[][] = [];
  const client: ExtractionClient = {
    async complete(_systemPrompt, userPrompt) {
      const jobIds = promptJobIds(userPrompt);
      batches.push(jobIds);
      const response = respond(jobIds);
      if (response instanceof Error) throw response;
      return JSON.stringify(response);
    },
  };
  return { client, batches };
}

function result(jobId: string) {
  return {
    job_id: jobId,
    department: "Engineering",
    seniority: "Senior",
    tech_stack: ["Node.js"],
    skills: ["Mentoring"],
    pain_points: ["Scale billing"],
    job_summary: "Builds the billing platform.",
    remote_policy: "Remote",
    salary_min: "$200k",
    salary_max: 150_000,
    experience_years: 5,
  };
}

function seed(count: number): string[] {
  const ids = Array.from({ length: count }, (_, i) => `job-${String(i).padStart(2, "0")}`);
  for (const id of ids) {
    upsertFetchedPosting({
      ats: "lever",
      company: "acme",
      externalJobId: id,
      title: `Engineer ${id}`,
      url: null,
      location: "Berlin",
      rawDescription: "Build APIs",
      fetchedAt: "2026-01-01T00:00:00.000Z",
      rawPayload: "{}",
    });
    queue.enqueue({ kind: "extract", ats: "lever", company: "acme", jobIds: [id] });
  }
  return ids;
}

function makeDeps(
  client: ExtractionClient,
  overrides: Partial<ExtractWorkerDeps> = {},
): ExtractWorkerDeps {
  return {
    queue,
    client,
    termMappings: { techStack: { "node.js": "nodejs" }, skills: {} },
    batchSize: 20,
    maxAttempts: 3,
    now: () => new Date("2026-02-01T00:00:00.000Z"),
    ...overrides,
  };
}

beforeAll(() => {
  initializeDatabase();
});

beforeEach(() => {
  db.exec(`DELETE FROM job_terms; DELETE FROM jobs; DELETE FROM task_queue;`);
  clock = START;
});

describe("runExtractionBatch", () => {
  it("returns null when nothing is waiting", async () => {
    const { client } = fakeClient(() => ({ results: [] }));
    expect(await runExtractionBatch(OWNER, makeDeps(client))).toBeNull();
  });

  it("saves normalized fields and completes the tasks", async () => {
    const ids = seed(2);
    const { client, batches } = fakeClient((jobIds) => ({ results: jobIds.map(result) }));
    const onCompanyTouched = vi.fn();

    const outcome = await runExtractionBatch(OWNER, makeDeps(client, { onCompanyTouched }));

    expect(outcome).toEqual({ claimed: 2, parsed: 2, retried: 0, failed: 0, skipped: 0 });
    expect(batches).toEqual([ids]);
    expect(getJobByKey("lever", "acme", "job-00")).toMatchObject({
      extractionStatus: "parsed",
      department: "Engineering",
      techStack: ["nodejs"],
      skills: ["mentoring"],
      remotePolicy: "remote",
      salaryMin: 150_000,
      salaryMax: 200_000,
      experienceYears: 5,
      parsedAt: "2026-02-01T00:00:00.000Z",
    });
    expect(queue.get("extract:lever:acme:job-00")).toBeNull();
    expect(onCompanyTouched).toHaveBeenCalledTimes(2);
    expect(onCompanyTouched).toHaveBeenCalledWith("lever", "acme");
  });

  it("splits a batch whose result count is off into isolated single tasks", async () => {
    const ids = seed(20);
    const { client, batches } = fakeClient((jobIds) => ({
      results: jobIds.slice(0, 19).map(result),
    }));

    const outcome = await runExtractionBatch(OWNER, makeDeps(client));

    expect(outcome).toEqual({ claimed: 20, parsed: 0, retried: 20, failed: 0, skipped: 0 });
    expect(listJobKeys({ status: "parsed" })).toEqual([]);
    for (const id of ids) {
      expect(queue.get(`extract:lever:acme:${id}`)).toMatchObject({
        isolated: true,
        attempts: 1,
        availableAt: START + 10_000,
        lastError: "Expected 20 result(s), got 19",
      });
    }
    expect(getJobByKey("lever", "acme", "job-00")).toMatchObject({
      extractionStatus: "pending",
      extractionAttempts: 1,
    });

    clock = START + 10_000;
    const next = await runExtractionBatch(OWNER, makeDeps(client));
    expect(next?.claimed).toBe(1);
    expect(batches[1]).toEqual(["job-00"]);
  });

  it("isolates only the item that failed validation", async () => {
    seed(2);
    const { client } = fakeClient((jobIds) => ({
      results: jobIds.map((id, i) => (i === 1 ? { ...result(id), skills: undefined } : result(id))),
    }));

    const outcome = await runExtractionBatch(OWNER, makeDeps(client));

    expect(outcome).toEqual({ claimed: 2, parsed: 1, retried: 1, failed: 0, skipped: 0 });
    expect(getJobByKey("lever", "acme", "job-00")?.extractionStatus).toBe("parsed");
    expect(getJobByKey("lever", "acme", "job-01")).toMatchObject({
      extractionStatus: "pending",
      extractionError: "Invalid extraction: skills: Required",
    });
    expect(queue.get("extract:lever:acme:job-01")).toMatchObject({
      isolated: true,
      attempts: 1,
    });
  });

  it("marks the job failed and parks the task once attempts run out", async () => {
    seed(1);
    const { client } = fakeClient(() => new ExtractionCallError("LLM API returned 500", 500));
    const onCompanyTouched = vi.fn();
    const deps = makeDeps(client, { onCompanyTouched });

    expect(await runExtractionBatch(OWNER, deps)).toMatchObject({ retried: 1 });
    expect(queue.get("extract:lever:acme:job-00")?.availableAt).toBe(START + 10_000);

    clock = START + 10_000;
    expect(await runExtractionBatch(OWNER, deps)).toMatchObject({ retried: 1 });
    expect(queue.get("extract:lever:acme:job-00")?.availableAt).toBe(clock + 30_000);

    clock += 30_000;
    expect(await runExtractionBatch(OWNER, deps)).toMatchObject({ failed: 1, retried: 0 });

    expect(getJobByKey("lever", "acme", "job-00")).toMatchObject({
      extractionStatus: "failed",
      extractionAttempts: 3,
      extractionError: "LLM API returned 500",
    });
    expect(queue.get("extract:lever:acme:job-00")).toMatchObject({
      band: 2,
      attempts: 3,
      availableAt: clock + DEMOTE_DELAY_MS[2],
    });
    expect(onCompanyTouched).toHaveBeenCalledTimes(1);
    expect(await runExtractionBatch(OWNER, deps)).toBeNull();
  });

  it("drops tasks whose posting is gone without calling the model", async () => {
    queue.enqueue({ kind: "extract", ats: "lever", company: "acme", jobIds: ["ghost"] });
    const { client, batches } = fakeClient(() => ({ results: [] }));

    const outcome = await runExtractionBatch(OWNER, makeDeps(client));

    expect(outcome).toEqual({ claimed: 1, parsed: 0, retried: 0, failed: 0, skipped: 1 });
    expect(batches).toEqual([]);
    expect(queue.get("extract:lever:acme:ghost")).toBeNull();
  });
});
