/**
 * Native Chat Completions wire format used by the Perceptron API.
 *
 * Request types are plain interfaces; the response is described by a zod
 * schema so that untrusted JSON is validated before it reaches callers.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export type ChatCompletionContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } }
  | { type: "video_url"; video_url: { url: string } };

export type ChatCompletionMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: ChatCompletionContentPart[] };

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  max_completion_tokens?: number;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export const ChatCompletionResponseSchema = z
  .object({
    id: z.string().nullish(),
    model: z.string().nullish(),
    choices: z.array(
      z
        .object({
          message: z
            .object({
              content: z.string().nullish(),
              reasoning_content: z.string().nullish(),
            })
            .passthrough(),
          finish_reason: z.string().nullish(),
        })
        .passthrough(),
    ),
    usage: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type ChatCompletionResponse = z.infer<
  typeof ChatCompletionResponseSchema
>;
