import { describeError, ExhaustedRetriesError } from "../errors";
import { sleep as defaultSleep } from "../connectors/base";

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the error that ended `attempt` (1-based). */
  delayMs: (attempt: number, error: unknown) => number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/** `base^attempt` seconds, deterministic part only. */
export function backoffSeconds(base: number, attempt: number): number {
  return Math.pow(base, attempt);
}

/**
 * `base^attempt` seconds plus up to a second of jitter. A server-supplied
 * wait (Retry-After) wins when it is longer.
 */
export function exponentialBackoff(
  base: number,
  options: {
    random?: () => number;
    serverDelayMs?: (error: unknown) => number | null;
  } = {},
): RetryPolicy["delayMs"] {
  const random = options.random ?? Math.random;
  return (attempt, error) => {
    const computed = (backoffSeconds(base, attempt) + random()) * 1000;
    const server = options.serverDelayMs?.(error) ?? null;
    return server !== null && server > computed ? server : computed;
  };
}

/** Fixed waits per attempt; the last interval repeats. */
export function fixedIntervals(intervalsMs: readonly number[]): RetryPolicy["delayMs"] {
  return (attempt) => {
    if (intervalsMs.length === 0) return 0;
    const index = Math.min(Math.max(attempt, 1), intervalsMs.length) - 1;
    return intervalsMs[index];
  };
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. No sleep after the final attempt.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (!policy.isRetryable(error)) throw error;
      if (attempt === policy.maxAttempts) break;

      const delayMs = policy.delayMs(attempt, error);
      hooks.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }

  throw new ExhaustedRetriesError(policy.maxAttempts, lastError);
}

export function retryLogLine(
  attempt: number,
  maxAttempts: number,
  error: unknown,
  delayMs: number,
): string {
  return `${describeError(error)} (attempt ${attempt}/${maxAttempts}), retrying in ${(delayMs / 1000).toFixed(1)}s`;
}
