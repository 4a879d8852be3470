import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { db, initializeDatabase } from "../db";
import type { TaskPayload } from "../types";
import { TaskQueue, dedupKeyFor, DEMOTE_DELAY_MS } from "./index";

const START = 1_000_000;
let clock = START;
const queue = new TaskQueue({ leaseMs: 60_000, now: () => clock });

const fetchAcme = { kind: "fetch", ats: "lever", company: "acme" } as const;

beforeAll(() => {
  initializeDatabase();
});

beforeEach(() => {
  db.exec("DELETE FROM task_queue");
  clock = START;
});

describe("dedupKeyFor", () => {
  it("keys fetch tasks by platform and company, extract tasks by job too", () => {
    expect(dedupKeyFor(fetchAcme)).toBe("fetch:lever:acme");
    expect(
      dedupKeyFor({ kind: "extract", ats: "lever", company: "acme", jobIds: ["j1"] }),
    ).toBe("extract:lever:acme:j1");
  });
});

describe("TaskQueue", () => {
  it("ignores a second enqueue of a pending task", () => {
    expect(queue.enqueue(fetchAcme)).toBe("enqueued");
    expect(queue.enqueue(fetchAcme)).toBe("skipped");
    expect(queue.stats()).toEqual([
      { kind: "fetch", band: 0, status: "pending", depth: 1, oldestAgeMs: 0 },
    ]);
  });

  it("leases a task to one owner until the lease expires", () => {
    queue.enqueue(fetchAcme);

    const [task] = queue.claim("fetch", 1, "worker-1");
    expect(task.leaseOwner).toBe("worker-1");
    expect(task.leasedUntil).toBe(START + 60_000);
    expect(queue.claim("fetch", 1, "worker-2")).toEqual([]);

    clock = START + 60_001;
    const [reclaimed] = queue.claim("fetch", 1, "worker-2");
    expect(reclaimed.id).toBe(task.id);

    expect(queue.ack(task, "worker-1")).toBe(false);
    expect(queue.ack(reclaimed, "worker-2")).toBe(true);
    expect(queue.get("fetch:lever:acme")).toBeNull();
  });

  it("re-runs a task that was re-enqueued while leased", () => {
    queue.enqueue(fetchAcme);
    const [task] = queue.claim("fetch", 1, "worker-1");

    expect(queue.enqueue(fetchAcme)).toBe("marked-dirty");
    expect(queue.ack(task, "worker-1")).toBe(true);

    expect(queue.get("fetch:lever:acme")).toMatchObject({
      status: "pending",
      attempts: 0,
      leaseOwner: null,
    });
    expect(queue.claim("fetch", 1, "worker-1")).toHaveLength(1);
  });

  it("claims by band first, then availability", () => {
    queue.enqueue({ kind: "fetch", ats: "lever", company: "b" }, { band: 1 });
    queue.enqueue({ kind: "fetch", ats: "lever", company: "a" });

    const tasks = queue.claim("fetch", 2, "worker-1");
    expect(tasks.map((t) => t.company)).toEqual(["a", "b"]);
  });

  it("drops a row naming an unknown ATS instead of leasing it", () => {
    db.prepare(
      `INSERT INTO task_queue (kind, ats, company, dedup_key, available_at, enqueued_at, updated_at)
       VALUES ('fetch', 'workday', 'acme', 'fetch:workday:acme', ?, ?, ?)`,
    ).run(START, START, START);
    queue.enqueue({ kind: "fetch", ats: "lever", company: "b" });

    const tasks = queue.claim("fetch", 2, "worker-1");

    expect(tasks.map((t) => t.company)).toEqual(["b"]);
    const remaining = db
      .prepare<[], { ats: string }>(`SELECT ats FROM task_queue ORDER BY id`)
      .all();
    expect(remaining).toEqual([{ ats: "lever" }]);
  });

  it("hides delayed tasks until they are due", () => {
    queue.enqueue(fetchAcme, { delayMs: 5000 });
    expect(queue.claim("fetch", 1, "worker-1")).toEqual([]);

    clock += 5000;
    expect(queue.claim("fetch", 1, "worker-1")).toHaveLength(1);
  });

  it("retries as an isolated task with a delay and a bumped attempt count", () => {
    const payload: TaskPayload = {
      kind: "extract",
      ats: "lever",
      company: "acme",
      jobIds: ["j1"],
    };
    queue.enqueue(payload);
    const [task] = queue.claim("extract", 5, "worker-1", { isolated: false });

    expect(
      queue.retry(task, "worker-1", { delayMs: 10_000, error: "boom", isolate: true }),
    ).toBe(true);

    clock += 10_000;
    expect(queue.claim("extract", 5, "worker-1", { isolated: false })).toEqual([]);

    const [isolated] = queue.claim("extract", 5, "worker-1", { isolated: true });
    expect(isolated).toMatchObject({
      attempts: 1,
      isolated: true,
      lastError: "boom",
      jobIds: ["j1"],
    });
  });

  it("demotes one band at a time and stops at the lowest", () => {
    queue.enqueue(fetchAcme);

    let [task] = queue.claim("fetch", 1, "worker-1");
    expect(queue.demote(task, "worker-1", { error: "down" })).toBe(1);
    expect(queue.get("fetch:lever:acme")).toMatchObject({
      band: 1,
      attempts: 1,
      availableAt: START + DEMOTE_DELAY_MS[1],
      lastError: "down",
    });

    clock += DEMOTE_DELAY_MS[1];
    [task] = queue.claim("fetch", 1, "worker-1");
    expect(queue.demote(task, "worker-1", { error: "down" })).toBe(2);

    clock += DEMOTE_DELAY_MS[2];
    [task] = queue.claim("fetch", 1, "worker-1");
    expect(queue.demote(task, "worker-1", { error: "down" })).toBe(2);
  });

  it("refuses transitions from an owner that lost the lease", () => {
    queue.enqueue(fetchAcme);
    const [task] = queue.claim("fetch", 1, "worker-1");

    expect(queue.demote(task, "worker-2", { error: "x" })).toBeNull();
    expect(queue.retry(task, "worker-2", { delayMs: 0, error: "x" })).toBe(false);
  });

  it("replays demoted work back to band 0", () => {
    queue.enqueue(fetchAcme);
    const [task] = queue.claim("fetch", 1, "worker-1");
    queue.demote(task, "worker-1", { error: "down" });

    expect(queue.replay({ kind: "extract" })).toBe(0);
    expect(queue.replay({ kind: "fetch" })).toBe(1);
    expect(queue.get("fetch:lever:acme")).toMatchObject({
      band: 0,
      attempts: 0,
      availableAt: START,
      lastError: null,
    });
  });

  it("reports depth and oldest age per kind, band and status", () => {
    queue.enqueue(fetchAcme);
    queue.enqueue({ kind: "fetch", ats: "ashby", company: "beta" });
    queue.enqueue({ kind: "extract", ats: "lever", company: "acme", jobIds: ["j1"] });
    clock += 5000;

    expect(queue.stats()).toEqual([
      { kind: "extract", band: 0, status: "pending", depth: 1, oldestAgeMs: 5000 },
      { kind: "fetch", band: 0, status: "pending", depth: 2, oldestAgeMs: 5000 },
    ]);
    expect(queue.outstanding(["fetch"])).toBe(2);
    expect(queue.outstanding(["fetch", "extract"])).toBe(3);
  });
});
