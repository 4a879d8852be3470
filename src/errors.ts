export type PipelineErrorKind =
  | "NotFound"
  | "RateLimited"
  | "TransientNetwork"
  | "Malformed"
  | "HttpStatus"
  | "ExtractionContractViolation"
  | "ExtractionCall"
  | "ExhaustedRetries"
  | "PersistenceConflict";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** The company has no board on this platform. Benign: zero postings. */
export class NotFoundError extends PipelineError {
  readonly kind = "NotFound";
  constructor(readonly url: string) {
    super(`No board found at ${url}`);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends PipelineError {
  readonly kind = "RateLimited";
  constructor(
    readonly url: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(`Rate limited (429) on ${url}`);
    this.name = "RateLimitedError";
  }
}

export class TransientNetworkError extends PipelineError {
  readonly kind = "TransientNetwork";
  constructor(
    message: string,
    readonly statusCode: number | null = null,
  ) {
    super(message);
    this.name = "TransientNetworkError";
  }
}

/** Unexpected JSON shape from a platform. */
export class MalformedError extends PipelineError {
  readonly kind = "Malformed";
  constructor(message: string) {
    super(message);
    this.name = "MalformedError";
  }
}

/** Any other non-2xx answer (401, 403, 410...). Not retried. */
export class HttpStatusError extends PipelineError {
  readonly kind = "HttpStatus";
  constructor(
    readonly url: string,
    readonly statusCode: number,
  ) {
    super(`HTTP ${statusCode} on ${url}`);
    this.name = "HttpStatusError";
  }
}

/** LLM output does not match the batch it was asked to describe. */
export class ExtractionContractViolation extends PipelineError {
  readonly kind = "ExtractionContractViolation";
  constructor(message: string) {
    super(message);
    this.name = "ExtractionContractViolation";
  }
}

/** The LLM request itself failed (HTTP error, auth, timeout, empty body). */
export class ExtractionCallError extends PipelineError {
  readonly kind = "ExtractionCall";
  constructor(
    message: string,
    readonly statusCode: number | null = null,
  ) {
    super(message);
    this.name = "ExtractionCallError";
  }
}

export class ExhaustedRetriesError extends PipelineError {
  readonly kind = "ExhaustedRetries";
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${describeError(lastError)}`,
    );
    this.name = "ExhaustedRetriesError";
  }
}

export class PersistenceConflictError extends PipelineError {
  readonly kind = "PersistenceConflict";
  constructor(message: string) {
    super(message);
    this.name = "PersistenceConflictError";
  }
}

export function isRetryableFetchError(
  error: unknown,
): error is RateLimitedError | TransientNetworkError {
  return (
    error instanceof RateLimitedError || error instanceof TransientNetworkError
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
