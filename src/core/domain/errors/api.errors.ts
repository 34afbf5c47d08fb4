export type ApiErrorKind =
  | "rate_limited"
  | "server_unavailable"
  | "quota_exhausted"
  | "not_found"
  | "validation_failed"
  | "authentication"
  | "api_error";

/** Remaining capacity reported by the upstream for its short throttle windows. */
export interface ThrottleState {
  productAvailable?: number;
  tenantAvailable?: number;
}

export interface ApiErrorDetails {
  statusCode?: number;
  url?: string;
  body?: string;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly statusCode?: number;
  readonly url?: string;
  readonly body?: string;

  constructor(
    message: string,
    details: ApiErrorDetails = {},
    kind: ApiErrorKind = "api_error",
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.url = details.url;
    this.body = details.body;
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, "authentication");
    this.name = "AuthenticationError";
  }
}

export class ValidationFailedError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, "validation_failed");
    this.name = "ValidationFailedError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, "not_found");
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends ApiError {
  constructor(
    message: string,
    readonly headers: Readonly<Record<string, string>>,
    readonly throttle: ThrottleState,
    details: ApiErrorDetails = {},
  ) {
    super(message, details, "rate_limited");
    this.name = "RateLimitedError";
  }
}

/** Daily quota is spent. Waiting seconds cannot fix it, so it is never retried. */
export class QuotaExhaustedError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, "quota_exhausted");
    this.name = "QuotaExhaustedError";
  }
}

export class ServerUnavailableError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, "server_unavailable");
    this.name = "ServerUnavailableError";
  }
}

/** Class name used as `error_kind` in the error ledger. */
export function errorClassName(err: unknown): string {
  if (err instanceof Error) return err.name;
  return "UnknownError";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
