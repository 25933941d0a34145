/**
 * Error mapping for HTTP exchanges.
 *
 * Non-2xx responses become typed `ApiError`s; rejected `fetch` calls become
 * transport errors.
 */

import { z } from "zod";
import {
  ApiError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  NetworkError,
  RequestTimeoutError,
  AbortError,
  type ApiErrorDetail,
  type ApiErrorOptions,
  type TransportError,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Error body schema
// ---------------------------------------------------------------------------

const ApiErrorDetailSchema = z.object({
  message: z.string(),
  type: z.string().nullish(),
  param: z.string().nullish(),
  code: z.union([z.string(), z.number()]).nullish(),
});

const ApiErrorResponseSchema = z.object({ error: ApiErrorDetailSchema });

/**
 * Read the `{ error: { message, type, param, code } }` envelope. Bodies that
 * do not match keep their text in the message.
 */
export function parseErrorDetail(body: unknown, text: string): ApiErrorDetail {
  const result = ApiErrorResponseSchema.safeParse(body);
  if (!result.success) {
    return { message: `Failed to parse error response body: ${text}` };
  }

  const { message, type, param, code } = result.data.error;
  return {
    message,
    ...(type != null ? { type } : {}),
    ...(param != null ? { param } : {}),
    ...(code != null ? { code: String(code) } : {}),
  };
}

/**
 * Parse the `Retry-After` header value.
 *
 * Only the delay-seconds form is read; an HTTP date yields `undefined`.
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  if (!headers) return undefined;

  const raw = headers.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds;
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `ApiError`.
 *
 * @param status  - HTTP status code from the response.
 * @param body    - Parsed JSON body, or `undefined` when it was not JSON.
 * @param text    - Raw response text.
 * @param headers - Response headers (used to extract Retry-After).
 */
export function mapHttpError(
  status: number,
  body: unknown,
  text: string,
  headers?: Headers,
): ApiError {
  const detail = parseErrorDetail(body, text);
  const message = `API error (${status}): ${detail.message}`;

  const opts: Omit<ApiErrorOptions, "retryable"> = {
    status_code: status,
    detail,
    raw: body,
    retry_after: parseRetryAfter(headers),
  };

  switch (status) {
    case 400:
    case 422:
      return new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500 && status <= 599) {
    return new ServerError(message, opts);
  }

  return new ApiError(message, opts);
}

/**
 * Classify a rejected `fetch` call.
 *
 * A fired timeout is reported as a timeout even if the caller's signal has
 * also aborted.
 */
export function mapTransportError(
  error: unknown,
  context: { url: string; timedOut: boolean; aborted: boolean },
): TransportError {
  const reason = error instanceof Error ? error.message : String(error);

  if (context.timedOut) {
    return new RequestTimeoutError(`Request to ${context.url} timed out`, {
      cause: error,
    });
  }

  if (context.aborted) {
    return new AbortError(`Request to ${context.url} was aborted`, {
      cause: error,
    });
  }

  return new NetworkError(`Request failed: ${reason}`, { cause: error });
}
