import { describe, it, expect } from "vitest";
import {
  mapHttpError,
  mapTransportError,
  parseErrorDetail,
} from "../src/utils/error-mapping.js";
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
} from "../src/types/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Standard OpenAI-compatible error body. */
function errorBody(message: string, type?: string) {
  return {
    error: {
      message,
      ...(type ? { type } : {}),
    },
  };
}

function map(status: number, body: unknown) {
  return mapHttpError(status, body, JSON.stringify(body));
}

// ---------------------------------------------------------------------------
// Tests: status code mapping
// ---------------------------------------------------------------------------

describe("mapHttpError: status code mapping", () => {
  it("400 → InvalidRequestError", () => {
    const err = map(400, errorBody("bad request"));
    expect(err).toBeInstanceOf(InvalidRequestError);
    expect(err.message).toBe("API error (400): bad request");
    expect(err.status_code).toBe(400);
  });

  it("401 → AuthenticationError", () => {
    const err = map(401, errorBody("invalid api key"));
    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err.retryable).toBe(false);
  });

  it("403 → AccessDeniedError", () => {
    expect(map(403, errorBody("forbidden"))).toBeInstanceOf(AccessDeniedError);
  });

  it("404 → NotFoundError", () => {
    expect(map(404, errorBody("model not found"))).toBeInstanceOf(NotFoundError);
  });

  it("422 → InvalidRequestError", () => {
    expect(map(422, errorBody("unprocessable"))).toBeInstanceOf(InvalidRequestError);
  });

  it("429 → RateLimitError with retry_after", () => {
    const err = mapHttpError(
      429,
      errorBody("rate limited"),
      "",
      new Headers({ "retry-after": "7" }),
    );
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err.retry_after).toBe(7);
    expect(err.retryable).toBe(true);
  });

  it.each([500, 502, 503, 504, 599])("%i → ServerError", (status) => {
    const err = map(status, errorBody("internal server error", "server_error"));
    expect(err).toBeInstanceOf(ServerError);
    expect(err.status_code).toBe(status);
  });

  it("other statuses → plain ApiError", () => {
    const err = map(418, errorBody("teapot"));
    expect(err.constructor).toBe(ApiError);
    expect(err.kind).toBe("api");
    expect(err.status_code).toBe(418);
  });

  it("408 stays an API error, not a transport error", () => {
    const err = map(408, errorBody("request timeout"));
    expect(err).toBeInstanceOf(ApiError);
    expect(err.kind).toBe("api");
  });
});

// ---------------------------------------------------------------------------
// Tests: error detail
// ---------------------------------------------------------------------------

describe("parseErrorDetail", () => {
  it("reads every field of the error envelope", () => {
    const detail = parseErrorDetail(
      {
        error: {
          message: "bad temperature",
          type: "invalid_request_error",
          param: "temperature",
          code: "out_of_range",
        },
      },
      "",
    );
    expect(detail).toEqual({
      message: "bad temperature",
      type: "invalid_request_error",
      param: "temperature",
      code: "out_of_range",
    });
  });

  it("drops null fields and stringifies numeric codes", () => {
    const detail = parseErrorDetail(
      { error: { message: "nope", type: null, param: null, code: 42 } },
      "",
    );
    expect(detail).toEqual({ message: "nope", code: "42" });
  });

  it("falls back to the raw text when the body has no envelope", () => {
    expect(parseErrorDetail(undefined, "upstream exploded")).toEqual({
      message: "Failed to parse error response body: upstream exploded",
    });
    expect(parseErrorDetail({ message: "flat" }, '{"message":"flat"}')).toEqual({
      message: 'Failed to parse error response body: {"message":"flat"}',
    });
  });

  it("keeps the raw body on the mapped error", () => {
    const err = mapHttpError(500, undefined, "<html>oops</html>");
    expect(err).toBeInstanceOf(ServerError);
    expect(err.raw).toBeUndefined();
    expect(err.detail.message).toBe(
      "Failed to parse error response body: <html>oops</html>",
    );
  });
});

// ---------------------------------------------------------------------------
// Tests: transport mapping
// ---------------------------------------------------------------------------

describe("mapTransportError", () => {
  const url = "https://api.example.com/v1/chat/completions";

  it("maps plain failures to NetworkError", () => {
    const cause = new TypeError("fetch failed");
    const err = mapTransportError(cause, { url, timedOut: false, aborted: false });
    expect(err).toBeInstanceOf(NetworkError);
    expect(err.message).toBe("Request failed: fetch failed");
    expect(err.cause).toBe(cause);
  });

  it("maps a fired timeout to RequestTimeoutError", () => {
    const err = mapTransportError(new Error("aborted"), {
      url,
      timedOut: true,
      aborted: true,
    });
    expect(err).toBeInstanceOf(RequestTimeoutError);
    expect(err.message).toBe(`Request to ${url} timed out`);
  });

  it("maps a caller abort to AbortError", () => {
    const err = mapTransportError(new Error("aborted"), {
      url,
      timedOut: false,
      aborted: true,
    });
    expect(err).toBeInstanceOf(AbortError);
  });
});
