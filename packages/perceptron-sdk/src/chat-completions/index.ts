/**
 * Chat Completions adapter for the Perceptron API.
 *
 * Sends one POST to `{baseUrl}/v1/chat/completions` and returns the
 * validated body. Does NOT retry.
 */

import {
  httpPost,
  mapHttpError,
  mergeHeaders,
  type FetchFn,
} from "../utils/index.js";
import { parseChatCompletion } from "./translate-response.js";
import type { ChatCompletionRequestBody, ChatCompletionResponse } from "./wire.js";

export const CHAT_COMPLETIONS_PATH = "/v1/chat/completions";

export interface ChatCompletionsAdapterOptions {
  apiKey: string;
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  /** Per-request timeout in milliseconds. No timeout when omitted. */
  timeout?: number;
  fetch?: FetchFn;
}

export interface CompleteOptions {
  signal?: AbortSignal;
}

export class ChatCompletionsAdapter {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeout: number | undefined;
  private readonly fetchFn: FetchFn | undefined;

  constructor(options: ChatCompletionsAdapterOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.timeout = options.timeout;
    this.fetchFn = options.fetch;
  }

  get url(): string {
    return `${this.baseUrl}${CHAT_COMPLETIONS_PATH}`;
  }

  private buildHeaders(): Record<string, string> {
    return mergeHeaders(
      { Authorization: `Bearer ${this.apiKey}` },
      this.defaultHeaders,
    );
  }

  async complete(
    body: ChatCompletionRequestBody,
    options?: CompleteOptions,
  ): Promise<ChatCompletionResponse> {
    const httpRes = await httpPost(this.url, body, this.buildHeaders(), {
      timeout: this.timeout,
      signal: options?.signal,
      fetch: this.fetchFn,
    });

    if (httpRes.status < 200 || httpRes.status >= 300) {
      throw mapHttpError(httpRes.status, httpRes.body, httpRes.text, httpRes.headers);
    }

    return parseChatCompletion(httpRes.body, httpRes.text);
  }
}

export type {
  ChatCompletionContentPart,
  ChatCompletionMessage,
  ChatCompletionRequestBody,
  ChatCompletionResponse,
} from "./wire.js";
export { ChatCompletionResponseSchema } from "./wire.js";
export {
  systemHint,
  resolveParams,
  buildWireRequest,
  translateAnalyze,
  translateCaption,
  translateOcr,
  translateDetect,
} from "./translate-request.js";
export type { RequestDescriptor, TranslatedRequest } from "./translate-request.js";
export {
  parseChatCompletion,
  translateTextResponse,
  translatePointingResponse,
} from "./translate-response.js";
