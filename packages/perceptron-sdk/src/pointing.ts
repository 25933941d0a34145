/**
 * Extraction of spatial annotations from model output.
 *
 * The model answers spatial prompts with XML-like tags embedded in text:
 *
 *   <point mention="nose"> (200,280) </point>
 *   <point_box mention="cat"> (10,20) (100,200) </point_box>
 *   <polygon> (0,0) (100,0) (100,100) </polygon>
 *   <collection mention="cat"> <point_box> ... </point_box> ... </collection>
 */

import { OutputFormat } from "./types/enums.js";
import type {
  BoundingBox,
  Point,
  Pointing,
  Polygon,
} from "./types/response.js";

type Coord = readonly [number, number];

type ItemParser<T> = (coords: readonly Coord[], mention?: string) => T | undefined;

const MAX_COORDINATE = 0xffffffff;

// Attributes must start with whitespace so `point` never matches `<point_box>`.
function tagRegex(tagName: string): RegExp {
  return new RegExp(`<${tagName}(\\s[^>]*)?>([\\s\\S]*?)</${tagName}>`, "gi");
}

const POINT_REGEX = tagRegex("point");
const BOX_REGEX = tagRegex("point_box");
const POLYGON_REGEX = tagRegex("polygon");
const COLLECTION_REGEX = tagRegex("collection");

const COORD_REGEX = /\(\s*(\d+)\s*,\s*(\d+)\s*\)/g;
const MENTION_REGEX = /mention="([^"]*)"/;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function parseMention(attrs: string): string | undefined {
  return MENTION_REGEX.exec(attrs)?.[1];
}

function parseCoords(body: string): Coord[] {
  const coords: Coord[] = [];
  for (const match of body.matchAll(COORD_REGEX)) {
    const x = Number(match[1]);
    const y = Number(match[2]);
    if (x <= MAX_COORDINATE && y <= MAX_COORDINATE) {
      coords.push([x, y]);
    }
  }
  return coords;
}

function mentionField(mention?: string): { mention?: string } {
  return mention === undefined ? {} : { mention };
}

const parsePoint: ItemParser<Point> = (coords, mention) => {
  const first = coords[0];
  if (!first) return undefined;
  return { x: first[0], y: first[1], ...mentionField(mention) };
};

const parseBox: ItemParser<BoundingBox> = (coords, mention) => {
  const [topLeft, bottomRight] = coords;
  if (!topLeft || !bottomRight) return undefined;
  return {
    x1: topLeft[0],
    y1: topLeft[1],
    x2: bottomRight[0],
    y2: bottomRight[1],
    ...mentionField(mention),
  };
};

const parsePolygon: ItemParser<Polygon> = (coords, mention) => {
  if (coords.length < 3) return undefined;
  return { hull: coords, ...mentionField(mention) };
};

/**
 * Collect items of one tag type. Collections are handled first and their
 * children inherit the collection's mention; standalone items follow.
 */
function extractItems<T>(text: string, itemRegex: RegExp, parse: ItemParser<T>): T[] {
  const results: T[] = [];

  const remaining = text.replace(
    COLLECTION_REGEX,
    (_match: string, attrs: string | undefined, body: string) => {
      const parentMention = parseMention(attrs ?? "");
      for (const inner of body.matchAll(itemRegex)) {
        const mention = parseMention(inner[1] ?? "") ?? parentMention;
        const item = parse(parseCoords(inner[2] ?? ""), mention);
        if (item !== undefined) results.push(item);
      }
      return "";
    },
  );

  for (const match of remaining.matchAll(itemRegex)) {
    const item = parse(parseCoords(match[2] ?? ""), parseMention(match[1] ?? ""));
    if (item !== undefined) results.push(item);
  }

  return results;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract annotations of the kind selected by `format`.
 *
 * Returns `undefined` for the text format and when no well-formed item of the
 * requested kind is present.
 */
export function extractPointing(
  text: string,
  format: OutputFormat,
): Pointing | undefined {
  switch (format) {
    case OutputFormat.TEXT:
      return undefined;
    case OutputFormat.POINT: {
      const points = extractItems(text, POINT_REGEX, parsePoint);
      return points.length > 0 ? { kind: "points", points } : undefined;
    }
    case OutputFormat.BOX: {
      const boxes = extractItems(text, BOX_REGEX, parseBox);
      return boxes.length > 0 ? { kind: "boxes", boxes } : undefined;
    }
    case OutputFormat.POLYGON: {
      const polygons = extractItems(text, POLYGON_REGEX, parsePolygon);
      return polygons.length > 0 ? { kind: "polygons", polygons } : undefined;
    }
  }
}
