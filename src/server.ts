import { Hono } from "hono";
import { getDatabaseStats, quickHealthCheck } from "./db";
import { getLastRun } from "./db/operations";
import type { TaskQueue } from "./queue";

export interface ServerDeps {
  queue: TaskQueue;
  environment: string;
}

/** Operator surface: liveness plus queue depth and age. */
export function createApp(deps: ServerDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck();

    return c.json(
      {
        status: dbOk ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        database: { ok: dbOk },
      },
      dbOk ? 200 : 503,
    );
  });

  app.get("/status", (c) => {
    const queue = deps.queue.stats();

    return c.json({
      timestamp: new Date().toISOString(),
      environment: deps.environment,
      queue,
      parked: queue
        .filter((s) => s.band === 2)
        .reduce((sum, s) => sum + s.depth, 0),
      database: getDatabaseStats(),
      lastRun: getLastRun(),
    });
  });

  return app;
}
