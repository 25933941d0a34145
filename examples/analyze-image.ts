/**
 * Example: locating objects in an image with the Perceptron SDK.
 *
 * This script demonstrates how to:
 *   1. Create a client from PERCEPTRON_API_KEY / PERCEPTRON_BASE_URL
 *   2. Attach a logging middleware
 *   3. Ask for bounding boxes and caption the same image
 *   4. Print the results and handle the SDK's error kinds
 *
 * Usage:
 *   PERCEPTRON_API_KEY=... npx tsx examples/analyze-image.ts <model> <image-url-or-path>
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import {
  AnalyzeRequest,
  CaptionRequest,
  CaptionStyle,
  MediaFormat,
  OutputFormat,
  PerceptronClient,
  fromBytes,
  getBoxes,
  imageUrl,
  isPerceptronError,
  type Media,
  type Middleware,
} from "perceptron-sdk";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FORMATS_BY_EXTENSION: Record<string, MediaFormat> = {
  ".png": MediaFormat.PNG,
  ".jpg": MediaFormat.JPEG,
  ".jpeg": MediaFormat.JPEG,
  ".webp": MediaFormat.WEBP,
};

async function loadMedia(source: string): Promise<Media> {
  if (/^https?:\/\//.test(source)) {
    return imageUrl(source);
  }
  const format = FORMATS_BY_EXTENSION[extname(source).toLowerCase()];
  if (!format) {
    throw new Error(`Unsupported image type: ${source}`);
  }
  return fromBytes(format, await readFile(source));
}

const logRequests: Middleware = async (request, next) => {
  const started = Date.now();
  console.log(`-> ${request.model} (${request.messages.length} messages)`);
  const response = await next(request);
  console.log(`<- ${response.id ?? "?"} in ${Date.now() - started}ms`);
  return response;
};

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const [model, source] = process.argv.slice(2);
  if (!model || !source) {
    console.error("Usage: analyze-image.ts <model> <image-url-or-path>");
    process.exitCode = 1;
    return;
  }

  const client = PerceptronClient.fromEnv()
    .withTimeout(60_000)
    .use(logRequests);
  const media = await loadMedia(source);

  // 1. Boxes around every person
  const located = await client.analyze(
    AnalyzeRequest.create(model, "Find every person in the image.", media)
      .outputFormat(OutputFormat.BOX)
      .temperature(0),
  );
  console.log(`\n${located.content ?? "(no content)"}\n`);
  for (const box of getBoxes(located)) {
    console.log(
      `  ${box.mention ?? "object"}: (${box.x1}, ${box.y1}) - (${box.x2}, ${box.y2})`,
    );
  }

  // 2. A detailed caption without grounding
  const caption = await client.caption(
    CaptionRequest.create(model, media)
      .style(CaptionStyle.DETAILED)
      .outputFormat(OutputFormat.TEXT),
  );
  console.log(`\nCaption: ${caption.content ?? "(none)"}`);
}

main().catch((error: unknown) => {
  if (isPerceptronError(error)) {
    console.error(`[${error.kind}] ${error.message}`);
  } else {
    console.error("Example failed:", error);
  }
  process.exitCode = 1;
});
