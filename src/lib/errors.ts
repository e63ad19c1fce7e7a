/**
 * Error taxonomy for check-in ingestion
 *
 * Every error carries a stable code and the HTTP status the API answers with.
 * `retriable` marks errors the CAS helper may retry internally.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "RATE_LIMITED"
  | "STORE_UNAVAILABLE"
  | "CONFLICT"
  | "MONITOR_NOT_FOUND"
  | "DEADLINE_EXCEEDED";

export abstract class CheckInServiceError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;
  readonly retriable: boolean = false;
}

export class ValidationError extends CheckInServiceError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class RateLimitedError extends CheckInServiceError {
  readonly code = "RATE_LIMITED";
  readonly statusCode = 429;

  constructor(
    readonly monitorKey: string,
    readonly retryAfterMs: number,
  ) {
    super(`Rate limit exceeded for ${monitorKey}`);
    this.name = "RateLimitedError";
  }
}

export class StoreUnavailableError extends CheckInServiceError {
  readonly code = "STORE_UNAVAILABLE";
  readonly statusCode = 503;
  override readonly retriable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class ConflictError extends CheckInServiceError {
  readonly code = "CONFLICT";
  readonly statusCode = 409;
  override readonly retriable = true;

  constructor(
    readonly monitorKey: string,
    readonly expectedVersion: number,
    readonly actualVersion: number | null,
  ) {
    super(
      `Version conflict on ${monitorKey}: expected ${expectedVersion}, found ${actualVersion ?? "none"}`,
    );
    this.name = "ConflictError";
  }
}

export class MonitorNotFoundError extends CheckInServiceError {
  readonly code = "MONITOR_NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly monitorKey: string) {
    super(`Monitor ${monitorKey} does not exist and no monitor_config was sent`);
    this.name = "MonitorNotFoundError";
  }
}

export class DeadlineExceededError extends CheckInServiceError {
  readonly code = "DEADLINE_EXCEEDED";
  readonly statusCode = 504;

  constructor(message = "Deadline exceeded") {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

export function isRetriable(error: unknown): boolean {
  return error instanceof CheckInServiceError && error.retriable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
