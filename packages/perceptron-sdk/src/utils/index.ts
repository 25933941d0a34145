/**
 * Barrel re-export for utility modules.
 */

// HTTP client wrapper
export { httpPost, mergeHeaders } from "./http.js";
export type { FetchFn, HttpResponse, HttpRequestOptions } from "./http.js";

// Error mapping utility
export {
  mapHttpError,
  mapTransportError,
  parseErrorDetail,
} from "./error-mapping.js";
