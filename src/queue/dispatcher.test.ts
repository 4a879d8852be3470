import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { db, initializeDatabase } from "../db";
import { getLastRun } from "../db/operations";
import type { CompanyRegistryEntry } from "../types";
import { TaskQueue } from "./index";
import { dispatchFetchTasks } from "./dispatcher";

const registry: CompanyRegistryEntry[] = [
  { name: "Acme", ats: "lever", slug: "acme", active: true },
  { name: "Beta", ats: "greenhouse", slug: "beta", active: false },
  { name: "Gamma", ats: "ashby", slug: "gamma", active: true },
];

const queue = new TaskQueue();

beforeAll(() => {
  initializeDatabase();
});

beforeEach(() => {
  db.exec(`DELETE FROM task_queue; DELETE FROM run_log;`);
});

describe("dispatchFetchTasks", () => {
  it("enqueues one fetch task per active entry and logs the run", () => {
    const result = dispatchFetchTasks(registry, queue);

    expect(result).toMatchObject({ enqueued: 2, skipped: 0, markedDirty: 0, errors: [] });
    expect(queue.get("fetch:lever:acme")).not.toBeNull();
    expect(queue.get("fetch:greenhouse:beta")).toBeNull();
    expect(queue.get("fetch:ashby:gamma")).not.toBeNull();
    expect(getLastRun()).toMatchObject({
      id: result.runId,
      run_type: "dispatch",
      status: "success",
      tasks_enqueued: 2,
      tasks_skipped: 0,
    });
  });

  it("skips pending tasks and re-queues in-flight ones", () => {
    dispatchFetchTasks(registry, queue);
    queue.claim("fetch", 1, "worker-1");

    const second = dispatchFetchTasks(registry, queue);

    expect(second).toMatchObject({ enqueued: 0, skipped: 1, markedDirty: 1 });
  });

  it("stops at the limit", () => {
    const result = dispatchFetchTasks(registry, queue, { limit: 1, runType: "manual" });

    expect(result.enqueued).toBe(1);
    expect(queue.get("fetch:lever:acme")).not.toBeNull();
    expect(getLastRun()?.run_type).toBe("manual");
  });
});
