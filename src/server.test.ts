import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { db, initializeDatabase } from "./db";
import { TaskQueue } from "./queue";
import { createApp } from "./server";

const queue = new TaskQueue();
const app = createApp({ queue, environment: "test" });

beforeAll(() => {
  initializeDatabase();
});

beforeEach(() => {
  db.exec(`DELETE FROM task_queue; DELETE FROM run_log;`);
});

describe("GET /health", () => {
  it("reports a healthy database", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "healthy",
      database: { ok: true },
    });
  });
});

describe("GET /status", () => {
  it("reports queue depth per kind and band, and parked work", async () => {
    queue.enqueue({ kind: "fetch", ats: "lever", company: "acme" });
    queue.enqueue({ kind: "fetch", ats: "ashby", company: "beta" }, { band: 2 });

    const res = await app.request("/status");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      environment: "test",
      queue: [
        { kind: "fetch", band: 0, status: "pending", depth: 1 },
        { kind: "fetch", band: 2, status: "pending", depth: 1 },
      ],
      parked: 1,
      lastRun: null,
    });
  });
});
