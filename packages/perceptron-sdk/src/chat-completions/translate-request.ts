/**
 * Translate SDK requests into the Chat Completions wire format.
 *
 * Each operation contributes its own system prompts and user text; the
 * shared part (hint tag, media part, generation parameters) is built by
 * `buildWireRequest`. Requests are validated here, at serialization time.
 */

import { z } from "zod";
import {
  CaptionStyle,
  ConfigurationError,
  MediaType,
  OcrMode,
  OutputFormat,
  mediaToUrl,
  mediaTypeOf,
  type AnalyzeRequestOptions,
  type BaseRequestOptions,
  type CaptionRequestOptions,
  type DetectRequestOptions,
  type GenerationParams,
  type Media,
  type OcrRequestOptions,
} from "../types/index.js";
import type {
  ChatCompletionContentPart,
  ChatCompletionMessage,
  ChatCompletionRequestBody,
} from "./wire.js";

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

const CAPTION_PROMPTS: Record<CaptionStyle, string> = {
  [CaptionStyle.CONCISE]:
    "Provide a concise, human-friendly caption for the upcoming image.",
  [CaptionStyle.DETAILED]:
    "Provide a detailed caption describing key objects, relationships, and context in the upcoming image.",
};

const OCR_SYSTEM_PROMPT =
  "You are an OCR (Optical Character Recognition) system. " +
  "Accurately detect, extract, and transcribe all readable text from the image.";

const OCR_PROMPTS: Record<OcrMode, string | undefined> = {
  [OcrMode.PLAIN]: undefined,
  [OcrMode.MARKDOWN]:
    "Transcribe every readable word in the image using Markdown formatting with headings, lists, tables, and other structural elements as appropriate.",
  [OcrMode.HTML]:
    "Transcribe every readable word in the image using HTML markup.",
};

const HINT_COMPONENTS: Record<OutputFormat, string | undefined> = {
  [OutputFormat.TEXT]: undefined,
  [OutputFormat.POINT]: "POINT",
  [OutputFormat.BOX]: "BOX",
  [OutputFormat.POLYGON]: "POLYGON",
};

/**
 * Build the `<hint>` system prompt for an output format and the reasoning
 * flag, e.g. `<hint>BOX THINK</hint>`. Returns `undefined` when there is
 * nothing to hint.
 */
export function systemHint(
  format: OutputFormat | undefined,
  reasoning: boolean | undefined,
): string | undefined {
  const components: string[] = [];

  const formatHint = format !== undefined ? HINT_COMPONENTS[format] : undefined;
  if (formatHint) components.push(formatHint);
  if (reasoning) components.push("THINK");

  return components.length > 0
    ? `<hint>${components.join(" ")}</hint>`
    : undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const NonEmptyString = z.string().trim().min(1);
const AbsoluteUrl = z.string().url();
const FiniteNumber = z.number().finite();

function invalid(reason: string): ConfigurationError {
  return new ConfigurationError(`Invalid request: ${reason}`);
}

function validateMedia(media: Media): void {
  switch (media.type) {
    case "url":
      if (!AbsoluteUrl.safeParse(media.url).success) {
        throw invalid(`media URL "${media.url}" is not a valid URL`);
      }
      return;
    case "base64":
      if (!NonEmptyString.safeParse(media.data).success) {
        throw invalid("base64 media payload is empty");
      }
      return;
  }
}

function validateBase(options: BaseRequestOptions): void {
  if (!NonEmptyString.safeParse(options.model).success) {
    throw invalid("model must be a non-empty string");
  }
  validateMedia(options.media);
}

// ---------------------------------------------------------------------------
// Wire request assembly
// ---------------------------------------------------------------------------

const PARAM_KEYS = [
  "max_completion_tokens",
  "temperature",
  "top_p",
  "top_k",
  "frequency_penalty",
  "presence_penalty",
] as const;

/**
 * Overlay request parameters on client defaults. Only values the request
 * actually sets replace a default.
 */
export function resolveParams(
  defaults: GenerationParams,
  params: GenerationParams,
): GenerationParams {
  return {
    reasoning: params.reasoning ?? defaults.reasoning,
    temperature: params.temperature ?? defaults.temperature,
    top_p: params.top_p ?? defaults.top_p,
    top_k: params.top_k ?? defaults.top_k,
    frequency_penalty: params.frequency_penalty ?? defaults.frequency_penalty,
    presence_penalty: params.presence_penalty ?? defaults.presence_penalty,
    max_completion_tokens:
      params.max_completion_tokens ?? defaults.max_completion_tokens,
  };
}

function mediaPart(media: Media): ChatCompletionContentPart {
  const url = mediaToUrl(media);
  switch (mediaTypeOf(media)) {
    case MediaType.IMAGE:
      return { type: "image_url", image_url: { url } };
    case MediaType.VIDEO:
      return { type: "video_url", video_url: { url } };
  }
}

export interface RequestDescriptor {
  model: string;
  media: Media;
  systemPrompts: readonly string[];
  userText?: string;
  params: GenerationParams;
}

/**
 * System prompts first, then one user message holding the media part and
 * the optional user text. Unset parameters are left out of the body; set
 * ones must be finite numbers.
 */
export function buildWireRequest(desc: RequestDescriptor): ChatCompletionRequestBody {
  const messages: ChatCompletionMessage[] = desc.systemPrompts.map(
    (content): ChatCompletionMessage => ({ role: "system", content }),
  );

  const userParts: ChatCompletionContentPart[] = [mediaPart(desc.media)];
  if (desc.userText !== undefined) {
    userParts.push({ type: "text", text: desc.userText });
  }
  messages.push({ role: "user", content: userParts });

  const body: ChatCompletionRequestBody = {
    model: desc.model,
    messages,
  };

  for (const key of PARAM_KEYS) {
    const value = desc.params[key];
    if (value !== undefined) {
      if (!FiniteNumber.safeParse(value).success) {
        throw invalid(`${key} must be a finite number`);
      }
      body[key] = value;
    }
  }

  return body;
}

// ---------------------------------------------------------------------------
// Per-operation translation
// ---------------------------------------------------------------------------

/** A wire body plus the format its answer should be read with. */
export interface TranslatedRequest {
  body: ChatCompletionRequestBody;
  outputFormat: OutputFormat;
}

function hintPrompts(
  format: OutputFormat | undefined,
  reasoning: boolean | undefined,
): string[] {
  const hint = systemHint(format, reasoning);
  return hint !== undefined ? [hint] : [];
}

export function translateAnalyze(
  options: AnalyzeRequestOptions,
  defaults: GenerationParams = {},
): TranslatedRequest {
  validateBase(options);
  if (!NonEmptyString.safeParse(options.message).success) {
    throw invalid("prompt must be a non-empty string");
  }

  const params = resolveParams(defaults, options);
  const outputFormat = options.output_format ?? OutputFormat.TEXT;

  return {
    outputFormat,
    body: buildWireRequest({
      model: options.model,
      media: options.media,
      systemPrompts: hintPrompts(outputFormat, params.reasoning),
      userText: options.message,
      params,
    }),
  };
}

export function translateCaption(
  options: CaptionRequestOptions,
  defaults: GenerationParams = {},
): TranslatedRequest {
  validateBase(options);

  const params = resolveParams(defaults, options);
  const outputFormat = options.output_format ?? OutputFormat.BOX;

  return {
    outputFormat,
    body: buildWireRequest({
      model: options.model,
      media: options.media,
      systemPrompts: hintPrompts(outputFormat, params.reasoning),
      userText: CAPTION_PROMPTS[options.style ?? CaptionStyle.CONCISE],
      params,
    }),
  };
}

export function translateOcr(
  options: OcrRequestOptions,
  defaults: GenerationParams = {},
): ChatCompletionRequestBody {
  validateBase(options);

  const params = resolveParams(defaults, options);

  return buildWireRequest({
    model: options.model,
    media: options.media,
    systemPrompts: [
      ...hintPrompts(undefined, params.reasoning),
      OCR_SYSTEM_PROMPT,
    ],
    userText: OCR_PROMPTS[options.mode ?? OcrMode.PLAIN],
    params,
  });
}

export function translateDetect(
  options: DetectRequestOptions,
  defaults: GenerationParams = {},
): TranslatedRequest {
  validateBase(options);

  const params = resolveParams(defaults, options);
  const classes = options.classes ?? [];
  const goal =
    classes.length > 0
      ? `Your goal is to segment out the following categories: ${classes.join(", ")}`
      : "Your goal is to segment out the objects in the scene";

  return {
    outputFormat: OutputFormat.BOX,
    body: buildWireRequest({
      model: options.model,
      media: options.media,
      systemPrompts: [...hintPrompts(OutputFormat.BOX, params.reasoning), goal],
      params,
    }),
  };
}
