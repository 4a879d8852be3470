import type BetterSqlite3 from "better-sqlite3";
import { db as defaultDb } from "../db";
import { logger } from "../logger";
import {
  isAts,
  type PriorityBand,
  type Task,
  type TaskKind,
  type TaskPayload,
  type TaskStatus,
} from "../types";

type Database = BetterSqlite3.Database;

export const LOWEST_BAND: PriorityBand = 2;

/** How long a task waits after being demoted into a band. */
export const DEMOTE_DELAY_MS: Record<PriorityBand, number> = {
  0: 0,
  1: 5 * 60_000,
  2: 60 * 60_000,
};

interface TaskRow {
  id: number;
  kind: string;
  ats: string;
  company: string;
  job_ids: string | null;
  dedup_key: string;
  band: number;
  status: string;
  attempts: number;
  isolated: number;
  dirty: number;
  available_at: number;
  leased_until: number | null;
  lease_owner: string | null;
  last_error: string | null;
  enqueued_at: number;
}

export interface EnqueueOptions {
  band?: PriorityBand;
  delayMs?: number;
  isolated?: boolean;
}

export type EnqueueOutcome = "enqueued" | "skipped" | "marked-dirty";

export interface ClaimOptions {
  /** true: isolated tasks only, false: batchable only, omitted: either. */
  isolated?: boolean;
}

export interface QueueStat {
  kind: TaskKind;
  band: PriorityBand;
  status: TaskStatus;
  depth: number;
  oldestAgeMs: number;
}

export interface TaskQueueOptions {
  db?: Database;
  leaseMs?: number;
  now?: () => number;
}

export function dedupKeyFor(payload: TaskPayload): string {
  const base = `${payload.kind}:${payload.ats}:${payload.company}`;
  return payload.jobIds && payload.jobIds.length > 0
    ? `${base}:${payload.jobIds.join(",")}`
    : base;
}

function toBand(value: number): PriorityBand {
  if (value <= 0) return 0;
  if (value === 1) return 1;
  return 2;
}

function toKind(value: string): TaskKind {
  return value === "extract" ? "extract" : "fetch";
}

function parseJobIds(text: string | null): string[] | undefined {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string => typeof v === "string")
      : undefined;
  } catch (error) {
    logger.warn(`Queue: unreadable job_ids column (${error})`);
    return undefined;
  }
}

function rowToTask(row: TaskRow): Task | null {
  if (!isAts(row.ats)) {
    logger.warn(`Queue: task ${row.id} has unknown ATS "${row.ats}"`);
    return null;
  }
  return {
    id: row.id,
    kind: toKind(row.kind),
    ats: row.ats,
    company: row.company,
    jobIds: parseJobIds(row.job_ids),
    dedupKey: row.dedup_key,
    band: toBand(row.band),
    status: row.status === "leased" ? "leased" : "pending",
    attempts: row.attempts,
    isolated: row.isolated === 1,
    availableAt: row.available_at,
    leasedUntil: row.leased_until,
    leaseOwner: row.lease_owner,
    lastError: row.last_error,
    enqueuedAt: row.enqueued_at,
  };
}

/**
 * Durable at-least-once work queue on the `task_queue` table. Tasks are
 * leased, not popped: a worker that dies mid-task leaves a lease that
 * expires and the task becomes claimable again.
 */
export class TaskQueue {
  private readonly db: Database;
  private readonly leaseMs: number;
  private readonly now: () => number;

  constructor(options: TaskQueueOptions = {}) {
    this.db = options.db ?? defaultDb;
    this.leaseMs = options.leaseMs ?? 600_000;
    this.now = options.now ?? Date.now;
  }

  enqueue(payload: TaskPayload, options: EnqueueOptions = {}): EnqueueOutcome {
    const dedupKey = dedupKeyFor(payload);
    const now = this.now();

    const run = this.db.transaction((): EnqueueOutcome => {
      const existing = this.db
        .prepare<[string], { id: number; status: string }>(
          `SELECT id, status FROM task_queue WHERE dedup_key = ?`,
        )
        .get(dedupKey);

      if (existing) {
        if (existing.status !== "leased") return "skipped";
        // In flight: re-run once the current holder acks.
        this.db
          .prepare(`UPDATE task_queue SET dirty = 1, updated_at = ? WHERE id = ?`)
          .run(now, existing.id);
        return "marked-dirty";
      }

      this.db
        .prepare(
          `INSERT INTO task_queue (
            kind, ats, company, job_ids, dedup_key, band, status,
            attempts, isolated, dirty, available_at, enqueued_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, 'pending', 0, ?, 0, ?, ?, ?)`,
        )
        .run(
          payload.kind,
          payload.ats,
          payload.company,
          payload.jobIds ? JSON.stringify(payload.jobIds) : null,
          dedupKey,
          options.band ?? 0,
          options.isolated ? 1 : 0,
          now + (options.delayMs ?? 0),
          now,
          now,
        );
      return "enqueued";
    });

    return run.immediate();
  }

  /**
   * Leases up to `limit` visible tasks, highest band first. Runs under
   * BEGIN IMMEDIATE so concurrent processes never lease the same row.
   */
  claim(
    kind: TaskKind,
    limit: number,
    owner: string,
    options: ClaimOptions = {},
  ): Task[] {
    const now = this.now();
    const leasedUntil = now + this.leaseMs;

    const isolatedClause =
      options.isolated === undefined
        ? ""
        : `AND isolated = ${options.isolated ? 1 : 0}`;

    const run = this.db.transaction((): Task[] => {
      const rows = this.db
        .prepare<[string, number, number, number], TaskRow>(
          `SELECT * FROM task_queue
           WHERE kind = ? ${isolatedClause}
             AND (
               (status = 'pending' AND available_at <= ?)
               OR (status = 'leased' AND leased_until <= ?)
             )
           ORDER BY band ASC, available_at ASC, id ASC
           LIMIT ?`,
        )
        .all(kind, now, now, limit);

      const lease = this.db.prepare(
        `UPDATE task_queue
         SET status = 'leased', lease_owner = ?, leased_until = ?, updated_at = ?
         WHERE id = ?`,
      );

      const discard = this.db.prepare(`DELETE FROM task_queue WHERE id = ?`);

      const tasks: Task[] = [];
      for (const row of rows) {
        if (!isAts(row.ats)) {
          logger.error(
            `Queue: dropping task ${row.id} (${row.dedup_key}), unknown ATS "${row.ats}"`,
          );
          discard.run(row.id);
          continue;
        }
        if (row.status === "leased") {
          logger.warn(
            `Queue: lease on task ${row.id} (${row.dedup_key}) held by ${row.lease_owner} expired, reclaiming`,
          );
        }
        lease.run(owner, leasedUntil, now, row.id);
        const task = rowToTask({
          ...row,
          status: "leased",
          lease_owner: owner,
          leased_until: leasedUntil,
        });
        if (task) tasks.push(task);
      }
      return tasks;
    });

    return run.immediate();
  }

  /**
   * Completes a task. A task re-enqueued while leased goes back to pending
   * instead of being deleted. Returns false when the lease was lost.
   */
  ack(task: Task, owner: string): boolean {
    const now = this.now();

    const run = this.db.transaction((): boolean => {
      const row = this.db
        .prepare<[number], { lease_owner: string | null; dirty: number }>(
          `SELECT lease_owner, dirty FROM task_queue WHERE id = ?`,
        )
        .get(task.id);

      if (!row || row.lease_owner !== owner) {
        logger.warn(`Queue: ack for task ${task.id} by ${owner} ignored, lease lost`);
        return false;
      }

      if (row.dirty === 1) {
        this.db
          .prepare(
            `UPDATE task_queue SET
              status = 'pending', dirty = 0, band = 0, attempts = 0,
              isolated = 0, available_at = ?, leased_until = NULL,
              lease_owner = NULL, last_error = NULL, updated_at = ?
            WHERE id = ?`,
          )
          .run(now, now, task.id);
      } else {
        this.db.prepare(`DELETE FROM task_queue WHERE id = ?`).run(task.id);
      }
      return true;
    });

    return run.immediate();
  }

  /** Back to pending after `delayMs` with the attempt counter bumped. */
  retry(
    task: Task,
    owner: string,
    options: { delayMs: number; error: string; isolate?: boolean },
  ): boolean {
    const now = this.now();
    const result = this.db
      .prepare(
        `UPDATE task_queue SET
          status = 'pending', attempts = attempts + 1,
          isolated = CASE WHEN ? = 1 THEN 1 ELSE isolated END,
          dirty = 0, available_at = ?, leased_until = NULL,
          lease_owner = NULL, last_error = ?, updated_at = ?
        WHERE id = ? AND lease_owner = ?`,
      )
      .run(
        options.isolate ? 1 : 0,
        now + options.delayMs,
        options.error,
        now,
        task.id,
        owner,
      );
    return result.changes > 0;
  }

  /** One band lower (or straight to `toBand`), capped at the lowest band. */
  demote(
    task: Task,
    owner: string,
    options: { error: string; toBand?: PriorityBand },
  ): PriorityBand | null {
    const now = this.now();
    const band = toBand(
      Math.min(Math.max(options.toBand ?? task.band + 1, task.band), LOWEST_BAND),
    );

    const result = this.db
      .prepare(
        `UPDATE task_queue SET
          status = 'pending', band = ?, attempts = attempts + 1, dirty = 0,
          available_at = ?, leased_until = NULL, lease_owner = NULL,
          last_error = ?, updated_at = ?
        WHERE id = ? AND lease_owner = ?`,
      )
      .run(band, now + DEMOTE_DELAY_MS[band], options.error, now, task.id, owner);

    if (result.changes === 0) return null;
    logger.warn(
      `Queue: task ${task.dedupKey} demoted to band ${band}: ${options.error}`,
    );
    return band;
  }

  /** Moves demoted pending work back to band 0, ready now. */
  replay(filter: { kind?: TaskKind; band?: PriorityBand } = {}): number {
    const now = this.now();
    const conditions = ["status = 'pending'"];
    const params: Array<string | number> = [now, now];

    if (filter.band !== undefined) {
      conditions.push("band = ?");
      params.push(filter.band);
    } else {
      conditions.push("band > 0");
    }
    if (filter.kind) {
      conditions.push("kind = ?");
      params.push(filter.kind);
    }

    const result = this.db
      .prepare(
        `UPDATE task_queue SET
          band = 0, attempts = 0, isolated = 0, available_at = ?,
          last_error = NULL, updated_at = ?
        WHERE ${conditions.join(" AND ")}`,
      )
      .run(...params);

    return result.changes;
  }

  stats(): QueueStat[] {
    const now = this.now();
    return this.db
      .prepare<
        [],
        { kind: string; band: number; status: string; depth: number; oldest: number }
      >(
        `SELECT kind, band, status, COUNT(*) AS depth, MIN(enqueued_at) AS oldest
         FROM task_queue
         GROUP BY kind, band, status
         ORDER BY kind, band, status`,
      )
      .all()
      .map((row): QueueStat => ({
        kind: toKind(row.kind),
        band: toBand(row.band),
        status: row.status === "leased" ? "leased" : "pending",
        depth: row.depth,
        oldestAgeMs: Math.max(0, now - row.oldest),
      }));
  }

  /** Tasks of these kinds in bands up to `maxBand`, leased or pending. */
  outstanding(kinds: readonly TaskKind[], maxBand: PriorityBand = 1): number {
    if (kinds.length === 0) return 0;
    const placeholders = kinds.map(() => "?").join(", ");
    const row = this.db
      .prepare<Array<string | number>, { count: number }>(
        `SELECT COUNT(*) AS count FROM task_queue
         WHERE kind IN (${placeholders}) AND band <= ?`,
      )
      .get(...kinds, maxBand);
    return row?.count ?? 0;
  }

  get(dedupKey: string): Task | null {
    const row = this.db
      .prepare<[string], TaskRow>(`SELECT * FROM task_queue WHERE dedup_key = ?`)
      .get(dedupKey);
    return row ? rowToTask(row) : null;
  }
}
