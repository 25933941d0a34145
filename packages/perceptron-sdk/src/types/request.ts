/**
 * Request builders for the Perceptron SDK.
 *
 * Every modifier returns a new request and leaves the receiver unchanged.
 * Builders do not validate. Validation happens when the client serializes a
 * request, before any network call.
 */

import type { CaptionStyle, OcrMode, OutputFormat } from "./enums.js";
import type { Media } from "./media.js";

// ---------------------------------------------------------------------------
// GenerationParams
// ---------------------------------------------------------------------------

/** Inference-time knobs shared by every request type. */
export interface GenerationParams {
  /** Enable chain-of-thought reasoning (`THINK` hint). */
  readonly reasoning?: boolean;
  readonly temperature?: number;
  /** Nucleus sampling probability. */
  readonly top_p?: number;
  readonly top_k?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
  readonly max_completion_tokens?: number;
}

/** Fields present on every request. */
export interface BaseRequestOptions extends GenerationParams {
  /** Required; model identifier. */
  readonly model: string;
  /** Required; image or video to run the model on. */
  readonly media: Media;
}

// ---------------------------------------------------------------------------
// Shared builder
// ---------------------------------------------------------------------------

export abstract class GenerationRequest<
  TSelf extends GenerationRequest<TSelf, TOptions>,
  TOptions extends BaseRequestOptions,
> {
  constructor(readonly options: TOptions) {}

  /** Build a sibling request carrying `options`. */
  protected abstract with(options: TOptions): TSelf;

  reasoning(enable: boolean): TSelf {
    return this.with({ ...this.options, reasoning: enable });
  }

  temperature(temperature: number): TSelf {
    return this.with({ ...this.options, temperature });
  }

  topP(topP: number): TSelf {
    return this.with({ ...this.options, top_p: topP });
  }

  topK(topK: number): TSelf {
    return this.with({ ...this.options, top_k: topK });
  }

  frequencyPenalty(penalty: number): TSelf {
    return this.with({ ...this.options, frequency_penalty: penalty });
  }

  presencePenalty(penalty: number): TSelf {
    return this.with({ ...this.options, presence_penalty: penalty });
  }

  maxCompletionTokens(maxTokens: number): TSelf {
    return this.with({ ...this.options, max_completion_tokens: maxTokens });
  }
}

// ---------------------------------------------------------------------------
// AnalyzeRequest
// ---------------------------------------------------------------------------

export interface AnalyzeRequestOptions extends BaseRequestOptions {
  /** User prompt sent after the media. */
  readonly message: string;
  /** Defaults to `text`. */
  readonly output_format?: OutputFormat;
}

/** Free-form question about a piece of media. */
export class AnalyzeRequest extends GenerationRequest<
  AnalyzeRequest,
  AnalyzeRequestOptions
> {
  static create(model: string, message: string, media: Media): AnalyzeRequest {
    return new AnalyzeRequest({ model, message, media });
  }

  outputFormat(format: OutputFormat): AnalyzeRequest {
    return this.with({ ...this.options, output_format: format });
  }

  protected with(options: AnalyzeRequestOptions): AnalyzeRequest {
    return new AnalyzeRequest(options);
  }
}

// ---------------------------------------------------------------------------
// CaptionRequest
// ---------------------------------------------------------------------------

export interface CaptionRequestOptions extends BaseRequestOptions {
  /** Defaults to `concise`. */
  readonly style?: CaptionStyle;
  /** Defaults to `box`, so captions come back grounded. */
  readonly output_format?: OutputFormat;
}

export class CaptionRequest extends GenerationRequest<
  CaptionRequest,
  CaptionRequestOptions
> {
  static create(model: string, media: Media): CaptionRequest {
    return new CaptionRequest({ model, media });
  }

  style(style: CaptionStyle): CaptionRequest {
    return this.with({ ...this.options, style });
  }

  outputFormat(format: OutputFormat): CaptionRequest {
    return this.with({ ...this.options, output_format: format });
  }

  protected with(options: CaptionRequestOptions): CaptionRequest {
    return new CaptionRequest(options);
  }
}

// ---------------------------------------------------------------------------
// OcrRequest
// ---------------------------------------------------------------------------

export interface OcrRequestOptions extends BaseRequestOptions {
  /** Defaults to `plain`. */
  readonly mode?: OcrMode;
}

export class OcrRequest extends GenerationRequest<OcrRequest, OcrRequestOptions> {
  static create(model: string, media: Media): OcrRequest {
    return new OcrRequest({ model, media });
  }

  mode(mode: OcrMode): OcrRequest {
    return this.with({ ...this.options, mode });
  }

  protected with(options: OcrRequestOptions): OcrRequest {
    return new OcrRequest(options);
  }
}

// ---------------------------------------------------------------------------
// DetectRequest
// ---------------------------------------------------------------------------

export interface DetectRequestOptions extends BaseRequestOptions {
  /** Categories to segment. Omitted or empty means "everything". */
  readonly classes?: readonly string[];
}

export class DetectRequest extends GenerationRequest<
  DetectRequest,
  DetectRequestOptions
> {
  static create(model: string, media: Media): DetectRequest {
    return new DetectRequest({ model, media });
  }

  classes(classes: readonly string[]): DetectRequest {
    return this.with({ ...this.options, classes: [...classes] });
  }

  protected with(options: DetectRequestOptions): DetectRequest {
    return new DetectRequest(options);
  }
}
