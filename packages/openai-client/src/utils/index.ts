/**
 * Barrel re-export for client utility modules.
 */

// HTTP client wrapper
export {
  httpPost,
  httpPostForm,
  httpPostBinary,
  httpStream,
  mergeHeaders,
  parseJsonBody,
  toTransportError,
} from "./http.js";
export type {
  HttpResponse,
  HttpBinaryResponse,
  HttpStreamResponse,
  HttpRequestOptions,
} from "./http.js";

// SSE parser
export { parseSSEStream } from "./sse.js";
export type { SSEEvent } from "./sse.js";

// Error mapping
export { mapHttpError, mapStreamedError, isRecord } from "./error-mapping.js";
