/**
 * Integration smoke tests for perceptron-sdk.
 *
 * These tests make REAL API calls and are SKIPPED unless PERCEPTRON_API_KEY
 * and PERCEPTRON_MODEL are present in the environment. PERCEPTRON_BASE_URL
 * may point them at another deployment.
 */

import { describe, it, expect } from "vitest";
import { PerceptronClient } from "../../src/client.js";
import {
  AnalyzeRequest,
  ApiError,
  CaptionRequest,
  MediaFormat,
  OutputFormat,
  base64,
} from "../../src/types/index.js";

const hasApiKey = !!process.env.PERCEPTRON_API_KEY;
const model = process.env.PERCEPTRON_MODEL ?? "";

// 1x1 PNG
const image = base64(
  MediaFormat.PNG,
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
);

describe.skipIf(!hasApiKey || !model)("Perceptron API smoke", () => {
  const client = PerceptronClient.fromEnv();

  it("answers a question about an image", async () => {
    const response = await client.analyze(
      AnalyzeRequest.create(model, "What color is this image?", image).maxCompletionTokens(64),
    );
    expect(typeof response.content).toBe("string");
  }, 60_000);

  it("returns boxes for a grounded caption", async () => {
    const response = await client.caption(
      CaptionRequest.create(model, image).outputFormat(OutputFormat.BOX),
    );
    expect(response.content).toBeDefined();
    if (response.pointing) {
      expect(response.pointing.kind).toBe("boxes");
    }
  }, 60_000);

  it("reports an unknown model as an API error", async () => {
    await expect(
      client.analyze(AnalyzeRequest.create("no-such-model", "Hi", image)),
    ).rejects.toBeInstanceOf(ApiError);
  }, 60_000);
});
