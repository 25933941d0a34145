/**
 * In-process stand-in for the inference service.
 *
 * Exposes a `fetch`-compatible function that records every request and
 * answers with a canned reply.
 */

import type { FetchFn } from "../../src/utils/index.js";

export interface RecordedRequest {
  url: string;
  method: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  /** Parsed JSON request body. */
  body: unknown;
}

export interface FakeReply {
  status?: number;
  /** Serialized as JSON unless `text` is given. */
  json?: unknown;
  /** Raw body text. */
  text?: string;
  headers?: Record<string, string>;
}

export interface FakeServer {
  fetch: FetchFn;
  requests: RecordedRequest[];
}

export function createFakeServer(
  reply: FakeReply | ((request: RecordedRequest) => FakeReply),
): FakeServer {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const recorded: RecordedRequest = {
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(recorded);

    const r = typeof reply === "function" ? reply(recorded) : reply;
    const text = r.text ?? JSON.stringify(r.json ?? {});
    return new Response(text, {
      status: r.status ?? 200,
      headers: { "content-type": "application/json", ...(r.headers ?? {}) },
    });
  };

  return { fetch, requests };
}

/** A chat completion body with one choice. */
export function completion(content: string | null, reasoning?: string | null) {
  return {
    id: "chatcmpl-test",
    model: "test-model",
    choices: [
      {
        message: {
          role: "assistant",
          content,
          reasoning_content: reasoning ?? null,
        },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 },
  };
}
