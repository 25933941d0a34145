/**
 * PerceptronClient: the request/response facade.
 *
 * Holds read-only connection settings, turns requests into Chat Completions
 * bodies, applies middleware in onion pattern around a single HTTP call, and
 * maps the result into typed responses.
 */

import {
  ChatCompletionsAdapter,
  translateAnalyze,
  translateCaption,
  translateDetect,
  translateOcr,
  translatePointingResponse,
  translateTextResponse,
  type ChatCompletionRequestBody,
  type ChatCompletionResponse,
  type TranslatedRequest,
} from "./chat-completions/index.js";
import { readEnv, resolveConnection } from "./config.js";
import type {
  AnalyzeRequest,
  CaptionRequest,
  DetectRequest,
  GenerationParams,
  OcrRequest,
  PointingResponse,
  TextResponse,
} from "./types/index.js";
import type { FetchFn } from "./utils/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Middleware around the HTTP exchange.
 *
 * Follows the onion pattern: middleware runs in registration order for the
 * request phase and in reverse order for the response phase. This is the
 * place to attach logging or metrics; the client itself logs nothing.
 */
export type Middleware = (
  request: ChatCompletionRequestBody,
  next: (request: ChatCompletionRequestBody) => Promise<ChatCompletionResponse>,
) => Promise<ChatCompletionResponse>;

/** Configuration for the PerceptronClient constructor. */
export interface ClientConfig {
  /** Sent as `Authorization: Bearer <key>`. Required at call time. */
  apiKey?: string;
  /** Defaults to `https://api.perceptron.inc`. Point at a local server to run on-device. */
  baseUrl?: string;
  /** Extra headers for every request; they override the defaults. */
  headers?: Record<string, string>;
  /** Generation parameters applied when a request leaves them unset. */
  defaults?: GenerationParams;
  /** Per-request timeout in milliseconds. No timeout when omitted. */
  timeout?: number;
  /** HTTP function to use instead of the global `fetch`. */
  fetch?: FetchFn;
  /** Middleware chain (onion pattern). */
  middleware?: Middleware[];
}

/** Per-call options. */
export interface CallOptions {
  /** Cancels the HTTP exchange; surfaces as `AbortError`. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// PerceptronClient
// ---------------------------------------------------------------------------

export class PerceptronClient {
  private readonly config: Readonly<ClientConfig>;

  constructor(config: ClientConfig = {}) {
    this.config = {
      ...config,
      headers: { ...(config.headers ?? {}) },
      defaults: { ...(config.defaults ?? {}) },
      middleware: [...(config.middleware ?? [])],
    };
  }

  // -----------------------------------------------------------------------
  // Static factory
  // -----------------------------------------------------------------------

  /**
   * Create a client from `PERCEPTRON_API_KEY` and `PERCEPTRON_BASE_URL`.
   * Unset variables leave the corresponding setting at its default.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
  ): PerceptronClient {
    const { PERCEPTRON_API_KEY, PERCEPTRON_BASE_URL } = readEnv(env);
    return new PerceptronClient({
      apiKey: PERCEPTRON_API_KEY,
      baseUrl: PERCEPTRON_BASE_URL,
    });
  }

  // -----------------------------------------------------------------------
  // Fluent configuration. Each step returns a new client.
  // -----------------------------------------------------------------------

  withApiKey(apiKey: string): PerceptronClient {
    return new PerceptronClient({ ...this.config, apiKey });
  }

  withBaseUrl(baseUrl: string): PerceptronClient {
    return new PerceptronClient({ ...this.config, baseUrl });
  }

  withHeader(name: string, value: string): PerceptronClient {
    return new PerceptronClient({
      ...this.config,
      headers: { ...this.config.headers, [name]: value },
    });
  }

  /** Merge into the default generation parameters. */
  withDefaults(defaults: GenerationParams): PerceptronClient {
    return new PerceptronClient({
      ...this.config,
      defaults: { ...this.config.defaults, ...defaults },
    });
  }

  withTimeout(timeout: number): PerceptronClient {
    return new PerceptronClient({ ...this.config, timeout });
  }

  withFetch(fetch: FetchFn): PerceptronClient {
    return new PerceptronClient({ ...this.config, fetch });
  }

  /** Append a middleware; it becomes the innermost one. */
  use(middleware: Middleware): PerceptronClient {
    return new PerceptronClient({
      ...this.config,
      middleware: [...(this.config.middleware ?? []), middleware],
    });
  }

  /** The base URL requests are sent to, before validation. */
  get baseUrl(): string | undefined {
    return this.config.baseUrl;
  }

  // -----------------------------------------------------------------------
  // Operations
  // -----------------------------------------------------------------------

  /** Ask a free-form question about the media. */
  async analyze(
    request: AnalyzeRequest,
    options?: CallOptions,
  ): Promise<PointingResponse> {
    return this.sendPointing(
      () => translateAnalyze(request.options, this.config.defaults),
      options,
    );
  }

  /** Caption the media; grounded in boxes unless another format is set. */
  async caption(
    request: CaptionRequest,
    options?: CallOptions,
  ): Promise<PointingResponse> {
    return this.sendPointing(
      () => translateCaption(request.options, this.config.defaults),
      options,
    );
  }

  /** Transcribe the text in the media. */
  async ocr(request: OcrRequest, options?: CallOptions): Promise<TextResponse> {
    const adapter = this.createAdapter();
    const body = translateOcr(request.options, this.config.defaults);
    const data = await this.execute(adapter, body, options);
    return translateTextResponse(data);
  }

  /** Segment objects, optionally limited to the request's classes. */
  async detect(
    request: DetectRequest,
    options?: CallOptions,
  ): Promise<PointingResponse> {
    return this.sendPointing(
      () => translateDetect(request.options, this.config.defaults),
      options,
    );
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Validates the connection settings; throws before any I/O. */
  private createAdapter(): ChatCompletionsAdapter {
    const { apiKey, baseUrl } = resolveConnection(this.config);
    return new ChatCompletionsAdapter({
      apiKey,
      baseUrl,
      defaultHeaders: this.config.headers,
      timeout: this.config.timeout,
      fetch: this.config.fetch,
    });
  }

  private async sendPointing(
    translate: () => TranslatedRequest,
    options?: CallOptions,
  ): Promise<PointingResponse> {
    const adapter = this.createAdapter();
    const { body, outputFormat } = translate();
    const data = await this.execute(adapter, body, options);
    return translatePointingResponse(data, outputFormat);
  }

  private execute(
    adapter: ChatCompletionsAdapter,
    body: ChatCompletionRequestBody,
    options?: CallOptions,
  ): Promise<ChatCompletionResponse> {
    // The innermost call is the adapter itself.
    const innermost = (req: ChatCompletionRequestBody): Promise<ChatCompletionResponse> =>
      adapter.complete(req, { signal: options?.signal });

    // Wrap from the last middleware to the first so that the first middleware
    // registered is the outermost.
    const chain = (this.config.middleware ?? []).reduceRight<
      (req: ChatCompletionRequestBody) => Promise<ChatCompletionResponse>
    >((next, mw) => (req) => mw(req, next), innermost);

    return chain(body);
  }
}
