/**
 * Closed value sets for the Perceptron SDK, written as `as const` objects
 * with a same-named union type.
 */

// ---------------------------------------------------------------------------
// OutputFormat
// ---------------------------------------------------------------------------

/**
 * Shape of the answer requested from the model.
 *
 * The format decides which field of a `PointingResponse` can be populated:
 * `content` and `reasoning` are always passed through, while `pointing` is
 * only ever set for the spatial formats and always with the matching kind.
 */
export const OutputFormat = {
  /** Plain text. `pointing` is never set. */
  TEXT: "text",
  /** `<point>` tags. `pointing.kind` is `"points"`. */
  POINT: "point",
  /** `<point_box>` tags. `pointing.kind` is `"boxes"`. */
  BOX: "box",
  /** `<polygon>` tags. `pointing.kind` is `"polygons"`. */
  POLYGON: "polygon",
} as const satisfies Record<string, string>;

export type OutputFormat = (typeof OutputFormat)[keyof typeof OutputFormat];

// ---------------------------------------------------------------------------
// CaptionStyle
// ---------------------------------------------------------------------------

export const CaptionStyle = {
  /** A brief, human-friendly caption. */
  CONCISE: "concise",
  /** Objects, relationships and context. */
  DETAILED: "detailed",
} as const satisfies Record<string, string>;

export type CaptionStyle = (typeof CaptionStyle)[keyof typeof CaptionStyle];

// ---------------------------------------------------------------------------
// OcrMode
// ---------------------------------------------------------------------------

export const OcrMode = {
  PLAIN: "plain",
  MARKDOWN: "markdown",
  HTML: "html",
} as const satisfies Record<string, string>;

export type OcrMode = (typeof OcrMode)[keyof typeof OcrMode];

// ---------------------------------------------------------------------------
// MediaType / MediaFormat
// ---------------------------------------------------------------------------

export const MediaType = {
  IMAGE: "image",
  VIDEO: "video",
} as const satisfies Record<string, string>;

export type MediaType = (typeof MediaType)[keyof typeof MediaType];

/** Encodings accepted for inline (base64) media. */
export const MediaFormat = {
  PNG: "png",
  JPEG: "jpeg",
  WEBP: "webp",
  MP4: "mp4",
  WEBM: "webm",
} as const satisfies Record<string, string>;

export type MediaFormat = (typeof MediaFormat)[keyof typeof MediaFormat];
