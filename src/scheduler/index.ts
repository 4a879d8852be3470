import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../logger";
import { describeError } from "../errors";
import type { Pipeline } from "../pipeline";

let _dispatchRunning = false;
const _tasks: ScheduledTask[] = [];

function runDispatchGuarded(pipeline: Pipeline, runType: string): void {
  if (_dispatchRunning) {
    logger.warn(`[LOCK] Dispatch already running, skipping ${runType} run`);
    return;
  }
  _dispatchRunning = true;
  try {
    pipeline.dispatch(undefined, runType);
  } catch (error) {
    logger.error(`[CRON] ${runType} dispatch failed: ${describeError(error)}`);
  } finally {
    _dispatchRunning = false;
  }
}

export function startScheduler(pipeline: Pipeline): void {
  const { env } = pipeline.config;

  if (!cron.validate(env.dispatchCron)) {
    throw new Error(`Invalid DISPATCH_CRON expression: "${env.dispatchCron}"`);
  }

  logger.info("Starting scheduler...");

  _tasks.push(
    cron.schedule(
      env.dispatchCron,
      () => {
        logger.info("[CRON] Scheduled dispatch of fetch tasks...");
        runDispatchGuarded(pipeline, "scheduled");
      },
      { timezone: env.timezone },
    ),
  );

  if (env.dispatchOnStart) {
    logger.info("[CRON] DISPATCH_ON_START set, dispatching now");
    runDispatchGuarded(pipeline, "startup");
  }

  logger.info(`Scheduler started: dispatch on "${env.dispatchCron}" (${env.timezone})`);
}

export function stopScheduler(): void {
  for (const task of _tasks.splice(0)) task.stop();
}
