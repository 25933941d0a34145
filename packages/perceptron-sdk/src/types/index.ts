/**
 * Barrel re-export for all type modules.
 */

// Enums
export {
  OutputFormat,
  CaptionStyle,
  OcrMode,
  MediaType,
  MediaFormat,
} from "./enums.js";

// Media
export type { Media, UrlMedia, Base64Media } from "./media.js";
export {
  imageUrl,
  videoUrl,
  base64,
  fromBytes,
  mediaTypeOf,
  mediaToUrl,
  formatMediaType,
  formatMime,
} from "./media.js";

// Request types
export type {
  GenerationParams,
  BaseRequestOptions,
  AnalyzeRequestOptions,
  CaptionRequestOptions,
  OcrRequestOptions,
  DetectRequestOptions,
} from "./request.js";
export {
  GenerationRequest,
  AnalyzeRequest,
  CaptionRequest,
  OcrRequest,
  DetectRequest,
} from "./request.js";

// Response types
export type {
  Point,
  BoundingBox,
  Polygon,
  Pointing,
  Usage,
  TextResponse,
  PointingResponse,
} from "./response.js";
export { getPoints, getBoxes, getPolygons } from "./response.js";

// Error types
export type {
  PerceptronErrorKind,
  ApiErrorDetail,
  ApiErrorOptions,
} from "./errors.js";
export {
  PerceptronError,
  isPerceptronError,
  ConfigurationError,
  TransportError,
  NetworkError,
  RequestTimeoutError,
  AbortError,
  ApiError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  DeserializationError,
} from "./errors.js";
