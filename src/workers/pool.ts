import { hostname } from "os";
import { logger } from "../logger";
import { sleep as defaultSleep } from "../connectors/base";

export interface WorkerPoolOptions {
  name: string;
  concurrency: number;
  pollIntervalMs: number;
  /** Exit once idle and `isDrained` agrees, instead of polling forever. */
  burst?: boolean;
  /** Claims and processes one unit of work; false when nothing was claimable. */
  step: (owner: string) => Promise<boolean>;
  isDrained?: () => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * N independent async loops over the shared queue. Errors from a step are
 * logged and the loop keeps going.
 */
export class WorkerPool {
  private stopping = false;
  private loops: Promise<void>[] = [];

  constructor(private readonly options: WorkerPoolOptions) {}

  get isRunning(): boolean {
    return this.loops.length > 0;
  }

  /** Resolves when every loop has exited. */
  start(): Promise<void> {
    if (this.loops.length > 0) {
      return Promise.all(this.loops).then(() => undefined);
    }

    this.stopping = false;
    const { name, concurrency } = this.options;
    logger.info(`[${name}] starting ${concurrency} worker loop(s)${this.options.burst ? " (burst)" : ""}`);

    this.loops = Array.from({ length: concurrency }, (_, i) => this.loop(i + 1));
    return Promise.all(this.loops).then(() => {
      this.loops = [];
      logger.info(`[${name}] all worker loops stopped`);
    });
  }

  /** Lets in-flight steps finish, then waits for the loops to exit. */
  async stop(): Promise<void> {
    this.stopping = true;
    await Promise.all(this.loops);
  }

  private async loop(index: number): Promise<void> {
    const { name, step, pollIntervalMs } = this.options;
    const sleep = this.options.sleep ?? defaultSleep;
    const owner = `${hostname()}:${process.pid}:${name}-${index}`;

    while (!this.stopping) {
      let worked = false;
      try {
        worked = await step(owner);
      } catch (error) {
        logger.error(`[${name}-${index}] step failed:`, error);
      }
      if (worked) continue;

      if (this.options.burst && (this.options.isDrained?.() ?? true)) break;
      await sleep(pollIntervalMs);
    }
  }
}
