/**
 * Error taxonomy for the memory pipeline.
 *
 * Only InvalidInputError and DimensionMismatchError cross a component
 * boundary as rejections. UnavailableError and BackgroundTaskError are
 * absorbed by the stage that hit them and surface only in logs and stats.
 */

export type MemoryErrorCode =
  | "INVALID_INPUT"
  | "UNAVAILABLE"
  | "DIMENSION_MISMATCH"
  | "BACKGROUND_TASK_FAILURE";

export type Collaborator = "index" | "embedding" | "reranker" | "llm";

export type BackgroundTask = "compression" | "profile_merge";

/**
 * Base error class
 */
export class MemoryError extends Error {
  readonly code: MemoryErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: { code: MemoryErrorCode; status: number; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MemoryError";
    this.code = options.code;
    this.status = options.status;
    this.details = options.details;
  }
}

/**
 * Malformed or empty required fields
 */
export class InvalidInputError extends MemoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "INVALID_INPUT", status: 400, details });
    this.name = "InvalidInputError";
  }
}

/**
 * An external collaborator is unreachable or timed out
 */
export class UnavailableError extends MemoryError {
  readonly service: Collaborator;

  constructor(service: Collaborator, message: string, cause?: unknown) {
    super(message, { code: "UNAVAILABLE", status: 503, details: { service }, cause });
    this.name = "UnavailableError";
    this.service = service;
  }
}

/**
 * Embedding length disagrees with the configured dimension
 */
export class DimensionMismatchError extends MemoryError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`embedding dimension mismatch: expected ${expected}, got ${actual}`, {
      code: "DIMENSION_MISMATCH",
      status: 422,
      details: { expected, actual },
    });
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class BackgroundTaskError extends MemoryError {
  readonly task: BackgroundTask;
  readonly tenant: string;

  constructor(task: BackgroundTask, tenant: string, cause: unknown) {
    super(`${task} failed for tenant ${tenant}: ${describeError(cause)}`, {
      code: "BACKGROUND_TASK_FAILURE",
      status: 500,
      details: { task, tenant },
      cause,
    });
    this.name = "BackgroundTaskError";
    this.task = task;
    this.tenant = tenant;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

const TIMEOUT_HINT_RE = /timeout|timed out|deadline exceeded|aborted/i;

export function isTimeoutError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if ("name" in err && (err.name === "TimeoutError" || err.name === "AbortError")) return true;
  return TIMEOUT_HINT_RE.test(describeError(err));
}
