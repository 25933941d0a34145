import { describe, it, expect } from "vitest";
import {
  AnalyzeRequest,
  CaptionRequest,
  DetectRequest,
  OcrRequest,
} from "../src/types/request.js";
import { CaptionStyle, OcrMode, OutputFormat } from "../src/types/enums.js";
import { imageUrl } from "../src/types/media.js";

const media = imageUrl("https://example.com/img.jpg");

describe("AnalyzeRequest", () => {
  it("starts with only the required fields", () => {
    const request = AnalyzeRequest.create("test-model", "Describe this", media);
    expect(request.options).toEqual({
      model: "test-model",
      message: "Describe this",
      media,
    });
  });

  it("chains every modifier", () => {
    const request = AnalyzeRequest.create("test-model", "Describe this", media)
      .outputFormat(OutputFormat.POINT)
      .reasoning(true)
      .temperature(0.2)
      .topP(0.9)
      .topK(40)
      .frequencyPenalty(0.1)
      .presencePenalty(0.3)
      .maxCompletionTokens(256);

    expect(request).toBeInstanceOf(AnalyzeRequest);
    expect(request.options).toEqual({
      model: "test-model",
      message: "Describe this",
      media,
      output_format: "point",
      reasoning: true,
      temperature: 0.2,
      top_p: 0.9,
      top_k: 40,
      frequency_penalty: 0.1,
      presence_penalty: 0.3,
      max_completion_tokens: 256,
    });
  });

  it("returns a new request from each modifier", () => {
    const base = AnalyzeRequest.create("test-model", "Describe this", media);
    const warm = base.temperature(0.9);

    expect(warm).not.toBe(base);
    expect(base.options.temperature).toBeUndefined();
    expect(warm.options.temperature).toBe(0.9);
  });

  it("does not validate on construction", () => {
    expect(() => AnalyzeRequest.create("", "", imageUrl("not a url"))).not.toThrow();
  });
});

describe("CaptionRequest", () => {
  it("sets style and output format", () => {
    const request = CaptionRequest.create("test-model", media)
      .style(CaptionStyle.DETAILED)
      .outputFormat(OutputFormat.TEXT);

    expect(request).toBeInstanceOf(CaptionRequest);
    expect(request.options.style).toBe("detailed");
    expect(request.options.output_format).toBe("text");
  });
});

describe("OcrRequest", () => {
  it("sets the mode and keeps generation params", () => {
    const request = OcrRequest.create("test-model", media)
      .mode(OcrMode.MARKDOWN)
      .maxCompletionTokens(1024);

    expect(request.options).toEqual({
      model: "test-model",
      media,
      mode: "markdown",
      max_completion_tokens: 1024,
    });
  });
});

describe("DetectRequest", () => {
  it("copies the classes it is given", () => {
    const classes = ["cat", "dog"];
    const request = DetectRequest.create("test-model", media).classes(classes);
    classes.push("bird");

    expect(request.options.classes).toEqual(["cat", "dog"]);
  });
});
