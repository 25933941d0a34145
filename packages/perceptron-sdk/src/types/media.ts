/**
 * Media references sent alongside a prompt: a remote URL or inline base64.
 */

import { MediaFormat, MediaType } from "./enums.js";

// ---------------------------------------------------------------------------
// Media (tagged union)
// ---------------------------------------------------------------------------

/** Media hosted somewhere the inference service can fetch it. */
export interface UrlMedia {
  readonly type: "url";
  readonly media_type: MediaType;
  readonly url: string;
}

/** Media embedded in the request as base64. */
export interface Base64Media {
  readonly type: "base64";
  readonly format: MediaFormat;
  /** Base64 payload without the `data:` prefix. */
  readonly data: string;
}

export type Media = UrlMedia | Base64Media;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function bufferToBase64(data: Uint8Array): string {
  let binary = "";
  for (const byte of data) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

const FORMAT_MEDIA_TYPE: Record<MediaFormat, MediaType> = {
  [MediaFormat.PNG]: MediaType.IMAGE,
  [MediaFormat.JPEG]: MediaType.IMAGE,
  [MediaFormat.WEBP]: MediaType.IMAGE,
  [MediaFormat.MP4]: MediaType.VIDEO,
  [MediaFormat.WEBM]: MediaType.VIDEO,
};

/** Image or video, derived from the encoding. */
export function formatMediaType(format: MediaFormat): MediaType {
  return FORMAT_MEDIA_TYPE[format];
}

/** MIME type for an encoding, e.g. `image/png` or `video/mp4`. */
export function formatMime(format: MediaFormat): string {
  return `${formatMediaType(format)}/${format}`;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function imageUrl(url: string): UrlMedia {
  return { type: "url", media_type: MediaType.IMAGE, url };
}

export function videoUrl(url: string): UrlMedia {
  return { type: "url", media_type: MediaType.VIDEO, url };
}

/** Wrap an already base64-encoded payload. */
export function base64(format: MediaFormat, data: string): Base64Media {
  return { type: "base64", format, data };
}

/** Encode raw bytes (e.g. a file read from disk) as inline media. */
export function fromBytes(format: MediaFormat, bytes: Uint8Array): Base64Media {
  return base64(format, bufferToBase64(bytes));
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function mediaTypeOf(media: Media): MediaType {
  switch (media.type) {
    case "url":
      return media.media_type;
    case "base64":
      return formatMediaType(media.format);
  }
}

/**
 * The value placed in the wire content part: URLs pass through unchanged,
 * inline payloads become `data:{mime};base64,{data}` URLs.
 */
export function mediaToUrl(media: Media): string {
  switch (media.type) {
    case "url":
      return media.url;
    case "base64":
      return `data:${formatMime(media.format)};base64,${media.data}`;
  }
}
