/**
 * Barrel re-export for provider utility modules.
 */

// HTTP transport
export {
  FetchTransport,
  httpPost,
  httpStream,
  mergeHeaders,
  textStream,
} from "./http.js";
export type {
  FetchTransportOptions,
  HttpResponse,
  HttpStreamResponse,
  HttpRequestOptions,
  Transport,
} from "./http.js";

// Stream parsers
export { parseSSEStream } from "./sse.js";
export type { SSEEvent } from "./sse.js";
export { parseNDJSONStream } from "./ndjson.js";
export { readText, readAllText } from "./reader.js";

// Event queue
export { EventQueue, DEFAULT_QUEUE_CAPACITY } from "./event-queue.js";

// Retry utility
export { retry, calculateDelay } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Error mapping utility
export { mapHttpError, parseRetryAfter } from "./error-mapping.js";

// JSON narrowing
export {
  getArray,
  getBoolean,
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseToolArguments,
  tryParseJSON,
} from "./json.js";
export type { JsonObject } from "./json.js";
