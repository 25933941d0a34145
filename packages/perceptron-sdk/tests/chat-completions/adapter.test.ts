import { describe, it, expect } from "vitest";
import {
  CHAT_COMPLETIONS_PATH,
  ChatCompletionsAdapter,
} from "../../src/chat-completions/index.js";
import type { ChatCompletionRequestBody } from "../../src/chat-completions/wire.js";
import {
  DeserializationError,
  RateLimitError,
  RequestTimeoutError,
} from "../../src/types/errors.js";
import type { FetchFn } from "../../src/utils/index.js";
import { completion, createFakeServer } from "../helpers/fake-server.js";

const body: ChatCompletionRequestBody = {
  model: "test-model",
  messages: [
    {
      role: "user",
      content: [{ type: "image_url", image_url: { url: "https://example.com/a.png" } }],
    },
  ],
};

describe("ChatCompletionsAdapter", () => {
  it("appends the endpoint path and drops a trailing slash", () => {
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "http://localhost:8000/",
    });
    expect(CHAT_COMPLETIONS_PATH).toBe("/v1/chat/completions");
    expect(adapter.url).toBe("http://localhost:8000/v1/chat/completions");
  });

  it("posts the body as JSON and returns the validated response", async () => {
    const server = createFakeServer({ json: completion("ok") });
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "https://api.example.com",
      fetch: server.fetch,
    });

    const data = await adapter.complete(body);

    expect(server.requests[0]?.body).toEqual(body);
    expect(data.choices[0]?.message.content).toBe("ok");
  });

  it("lets default headers override the bearer token", async () => {
    const server = createFakeServer({ json: completion("ok") });
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "https://api.example.com",
      defaultHeaders: { Authorization: "Token other", "X-Client": "tests" },
      fetch: server.fetch,
    });

    await adapter.complete(body);

    expect(server.requests[0]?.headers).toEqual({
      "content-type": "application/json",
      authorization: "Token other",
      "x-client": "tests",
    });
  });

  it("raises the mapped API error for a non-2xx status", async () => {
    const server = createFakeServer({
      status: 429,
      json: { error: { message: "slow down" } },
      headers: { "retry-after": "3" },
    });
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "https://api.example.com",
      fetch: server.fetch,
    });

    const promise = adapter.complete(body);
    await expect(promise).rejects.toBeInstanceOf(RateLimitError);
    await expect(promise).rejects.toMatchObject({
      status_code: 429,
      retry_after: 3,
      retryable: true,
    });
  });

  it("treats an empty body as a deserialization failure", async () => {
    const server = createFakeServer({ text: "" });
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "https://api.example.com",
      fetch: server.fetch,
    });

    await expect(adapter.complete(body)).rejects.toBeInstanceOf(DeserializationError);
  });

  it("applies the configured timeout", async () => {
    const fetch: FetchFn = (_input, init) => {
      const signal = init?.signal;
      return new Promise((_resolve, reject) => {
        if (!signal) return;
        signal.addEventListener("abort", () => {
          reject(signal.reason);
        });
      });
    };
    const adapter = new ChatCompletionsAdapter({
      apiKey: "test-key",
      baseUrl: "https://api.example.com",
      timeout: 10,
      fetch,
    });

    await expect(adapter.complete(body)).rejects.toBeInstanceOf(RequestTimeoutError);
  });
});
