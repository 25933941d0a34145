/**
 * Response types for the Perceptron SDK.
 */

// ---------------------------------------------------------------------------
// Spatial annotations
// ---------------------------------------------------------------------------

export interface Point {
  readonly x: number;
  readonly y: number;
  /** Label the model attached to the point, if any. */
  readonly mention?: string;
}

export interface BoundingBox {
  /** Top-left corner. */
  readonly x1: number;
  readonly y1: number;
  /** Bottom-right corner. */
  readonly x2: number;
  readonly y2: number;
  readonly mention?: string;
}

export interface Polygon {
  /** Hull vertices as `[x, y]` pairs, at least three. */
  readonly hull: ReadonlyArray<readonly [number, number]>;
  readonly mention?: string;
}

/** Spatial data extracted from model output. Exactly one kind per response. */
export type Pointing =
  | { readonly kind: "points"; readonly points: readonly Point[] }
  | { readonly kind: "boxes"; readonly boxes: readonly BoundingBox[] }
  | { readonly kind: "polygons"; readonly polygons: readonly Polygon[] };

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** Token accounting as reported by the service. Passed through as-is. */
export type Usage = Readonly<Record<string, unknown>>;

/** Result of a text-only operation (OCR). */
export interface TextResponse {
  /** Main answer. Absent when the service returned no choice or null content. */
  readonly content?: string;
  /** Chain-of-thought output, when reasoning was enabled. */
  readonly reasoning?: string;
  readonly id?: string;
  readonly model?: string;
  readonly finish_reason?: string;
  readonly usage?: Usage;
  /** The validated response body. */
  readonly raw: Readonly<Record<string, unknown>>;
}

/** Result of a spatial operation (analyze, caption, detect). */
export interface PointingResponse extends TextResponse {
  readonly pointing?: Pointing;
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function getPoints(response: PointingResponse): readonly Point[] {
  return response.pointing?.kind === "points" ? response.pointing.points : [];
}

export function getBoxes(response: PointingResponse): readonly BoundingBox[] {
  return response.pointing?.kind === "boxes" ? response.pointing.boxes : [];
}

export function getPolygons(response: PointingResponse): readonly Polygon[] {
  return response.pointing?.kind === "polygons"
    ? response.pointing.polygons
    : [];
}
