/**
 * Translate a Chat Completions response body into SDK response types.
 */

import {
  DeserializationError,
  type OutputFormat,
  type PointingResponse,
  type TextResponse,
} from "../types/index.js";
import { extractPointing } from "../pointing.js";
import {
  ChatCompletionResponseSchema,
  type ChatCompletionResponse,
} from "./wire.js";

/**
 * Validate a parsed body against the response schema.
 *
 * @param body - Parsed JSON, or `undefined` when the text was not JSON.
 * @param text - Raw response text, kept on the error for inspection.
 */
export function parseChatCompletion(
  body: unknown,
  text: string,
): ChatCompletionResponse {
  if (body === undefined) {
    throw new DeserializationError("Failed to parse response: body is not valid JSON", {
      body: text,
    });
  }

  const result = ChatCompletionResponseSchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DeserializationError(
      `Failed to parse response${where}: ${issue?.message ?? "invalid body"}`,
      { body: text, cause: result.error },
    );
  }

  return result.data;
}

/** Read the first choice; an empty `choices` array yields empty fields. */
export function translateTextResponse(data: ChatCompletionResponse): TextResponse {
  const choice = data.choices[0];

  return {
    ...(choice?.message.content != null ? { content: choice.message.content } : {}),
    ...(choice?.message.reasoning_content != null
      ? { reasoning: choice.message.reasoning_content }
      : {}),
    ...(choice?.finish_reason != null ? { finish_reason: choice.finish_reason } : {}),
    ...(data.id != null ? { id: data.id } : {}),
    ...(data.model != null ? { model: data.model } : {}),
    ...(data.usage != null ? { usage: data.usage } : {}),
    raw: data,
  };
}

/** Like `translateTextResponse`, plus annotations of the requested kind. */
export function translatePointingResponse(
  data: ChatCompletionResponse,
  outputFormat: OutputFormat,
): PointingResponse {
  const response = translateTextResponse(data);
  const pointing =
    response.content !== undefined
      ? extractPointing(response.content, outputFormat)
      : undefined;

  return pointing !== undefined ? { ...response, pointing } : response;
}
