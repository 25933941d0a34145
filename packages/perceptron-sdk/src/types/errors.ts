/**
 * Error hierarchy for the Perceptron SDK.
 *
 * All library errors inherit from PerceptronError and carry a `kind`
 * discriminant, so callers can switch over the four failure classes without
 * matching on messages or class names.
 */

/** The closed set of failure classes. */
export type PerceptronErrorKind =
  | "configuration"
  | "transport"
  | "api"
  | "deserialization";

// ---------------------------------------------------------------------------
// PerceptronError: base for all library errors
// ---------------------------------------------------------------------------

export abstract class PerceptronError extends Error {
  abstract readonly kind: PerceptronErrorKind;
  /**
   * Whether repeating the same call could succeed. Informational: the SDK
   * itself never retries.
   */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "PerceptronError";
    this.retryable = options?.retryable ?? false;
  }
}

export function isPerceptronError(value: unknown): value is PerceptronError {
  return value instanceof PerceptronError;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Missing API key, unusable base URL, or a request that cannot be
 * serialized. Raised before any network call.
 */
export class ConfigurationError extends PerceptronError {
  readonly kind = "configuration" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** The HTTP exchange did not complete. */
export class TransportError extends PerceptronError {
  readonly kind = "transport" as const;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, {
      cause: options?.cause,
      retryable: options?.retryable ?? true,
    });
    this.name = "TransportError";
  }
}

/** DNS, connection refused, TLS or other network-level failure. */
export class NetworkError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "NetworkError";
  }
}

/** The configured client timeout elapsed. */
export class RequestTimeoutError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** Request cancelled via the caller's abort signal. */
export class AbortError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "AbortError";
  }
}

// ---------------------------------------------------------------------------
// API
// ---------------------------------------------------------------------------

/** OpenAI-compatible error detail returned by the service. */
export interface ApiErrorDetail {
  readonly message: string;
  readonly type?: string;
  readonly param?: string;
  readonly code?: string;
}

export interface ApiErrorOptions {
  /** HTTP status code. */
  status_code: number;
  detail: ApiErrorDetail;
  /** Raw error response body, when it was JSON. */
  raw?: unknown;
  retryable?: boolean;
  /** Seconds to wait before retrying, from `Retry-After`. */
  retry_after?: number;
  cause?: unknown;
}

/** The service answered with a non-success status. */
export class ApiError extends PerceptronError {
  readonly kind = "api" as const;
  readonly status_code: number;
  readonly detail: ApiErrorDetail;
  readonly raw?: unknown;
  readonly retry_after?: number;

  constructor(message: string, options: ApiErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "ApiError";
    this.status_code = options.status_code;
    this.detail = options.detail;
    this.raw = options.raw;
    this.retry_after = options.retry_after;
  }
}

type StatusErrorOptions = Omit<ApiErrorOptions, "retryable">;

/** 401: Invalid or expired API key. */
export class AuthenticationError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions. */
export class AccessDeniedError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Model or endpoint not found. */
export class NotFoundError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters. */
export class InvalidRequestError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** 429: Rate limit exceeded. */
export class RateLimitError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Service internal error. */
export class ServerError extends ApiError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

// ---------------------------------------------------------------------------
// Deserialization
// ---------------------------------------------------------------------------

/** A success status whose body is not JSON or not a chat completion. */
export class DeserializationError extends PerceptronError {
  readonly kind = "deserialization" as const;
  /** The response text that failed to parse. */
  readonly body: string;

  constructor(message: string, options: { body: string; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "DeserializationError";
    this.body = options.body;
  }
}
