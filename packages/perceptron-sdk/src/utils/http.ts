/**
 * Thin HTTP wrapper around the `fetch` API.
 *
 * Sends one JSON POST and hands back status, headers and body. Transport
 * failures are converted to the SDK's transport errors here; status
 * semantics are left to the error-mapping utility.
 */

import { mapTransportError } from "./error-mapping.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Signature of the HTTP function, compatible with the global `fetch`. */
export type FetchFn = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

/** Resolved response from an HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

export interface HttpRequestOptions {
  /** Request timeout in milliseconds. Combined with any user-provided signal. */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
  /** HTTP function to use instead of the global `fetch`. */
  fetch?: FetchFn;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones,
 * matching names case-insensitively; the later spelling is kept.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        const lower = key.toLowerCase();
        for (const existing of Object.keys(merged)) {
          if (existing.toLowerCase() === lower) delete merged[existing];
        }
        merged[key] = value;
      }
    }
  }
  return merged;
}

interface CombinedSignal {
  signal?: AbortSignal;
  timeoutSignal?: AbortSignal;
}

/**
 * Build a combined `AbortSignal` from an optional user signal and an
 * optional timeout value. The timeout signal is returned separately so a
 * rejection can be attributed to it.
 */
function buildSignal(options?: HttpRequestOptions): CombinedSignal {
  const signals: AbortSignal[] = [];
  let timeoutSignal: AbortSignal | undefined;

  if (options?.signal) {
    signals.push(options.signal);
  }

  if (options?.timeout != null && options.timeout > 0) {
    timeoutSignal = AbortSignal.timeout(options.timeout);
    signals.push(timeoutSignal);
  }

  if (signals.length === 0) return {};
  if (signals.length === 1) return { signal: signals[0], timeoutSignal };

  return { signal: AbortSignal.any(signals), timeoutSignal };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * On non-2xx status codes the promise still resolves -- it is the caller's
 * responsibility to inspect `status` and throw an appropriate error.
 *
 * @throws {TransportError} When the exchange fails, times out or is aborted.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const merged = mergeHeaders(headers);
  const { signal, timeoutSignal } = buildSignal(options);
  const fetchFn = options?.fetch ?? globalThis.fetch;

  let res: Response;
  let text: string;
  try {
    res = await fetchFn(url, {
      method: "POST",
      headers: merged,
      body: JSON.stringify(body),
      signal,
    });
    text = await res.text();
  } catch (error) {
    throw mapTransportError(error, {
      url,
      timedOut: timeoutSignal?.aborted === true,
      aborted: options?.signal?.aborted === true,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  return {
    status: res.status,
    headers: res.headers,
    body: parsed,
    text,
  };
}
