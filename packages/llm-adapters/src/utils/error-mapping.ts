/**
 * Error mapping utility for vendor HTTP responses.
 *
 * Maps HTTP status codes and response bodies to the typed error hierarchy.
 */

import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  ContentFilterError,
  ContextLengthError,
  RequestTimeoutError,
  type ProviderErrorOptions,
} from "../types/index.js";
import { getRecord, getString, isRecord } from "./json.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Extract a human-readable error message from a vendor response body. */
function extractMessage(body: unknown): string {
  // Most vendors nest under `error.message`.
  const nested = getString(getRecord(body, "error"), "message");
  if (nested !== undefined) return nested;

  const topLevel = getString(body, "message");
  if (topLevel !== undefined) return topLevel;

  // Ollama: `error` is a plain string.
  const asString = getString(body, "error");
  if (asString !== undefined) return asString;

  if (typeof body === "string") return body;
  try {
    return JSON.stringify(body) ?? String(body);
  } catch {
    return String(body);
  }
}

/** Extract an error code from a vendor response body. */
function extractErrorCode(body: unknown): string | undefined {
  const errObj = getRecord(body, "error");
  if (errObj) {
    const code = getString(errObj, "code") ?? getString(errObj, "type") ?? getString(errObj, "status");
    if (code !== undefined) return code;
  }
  return getString(body, "code") ?? getString(body, "type");
}

/**
 * Parse the `Retry-After` header value.
 *
 * Only the integer-seconds form is handled; dates are uncommon for LLM APIs.
 */
export function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Message-based classification
// ---------------------------------------------------------------------------

const MESSAGE_PATTERNS: Array<{
  patterns: RegExp[];
  classify: (message: string, opts: ProviderErrorOptions) => ProviderError;
}> = [
  {
    patterns: [/not found/i, /does not exist/i],
    classify: (msg, opts) => new NotFoundError(msg, opts),
  },
  {
    patterns: [/unauthorized/i, /invalid key/i, /api key not valid/i],
    classify: (msg, opts) => new AuthenticationError(msg, opts),
  },
  {
    patterns: [/context length/i, /too many tokens/i, /prompt is too long/i],
    classify: (msg, opts) => new ContextLengthError(msg, opts),
  },
  {
    patterns: [/content filter/i, /safety/i],
    classify: (msg, opts) => new ContentFilterError(msg, opts),
  },
];

function classifyByMessage(
  message: string,
  opts: ProviderErrorOptions,
): ProviderError | undefined {
  for (const { patterns, classify } of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return classify(message, opts);
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed error.
 *
 * @param body - Parsed JSON body, or the raw text when it was not JSON.
 * @param headers - Used for Retry-After.
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): ProviderError | RequestTimeoutError {
  const message = extractMessage(body);
  const opts: ProviderErrorOptions = {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message);
    case 413:
      return classifyByMessage(message, opts) ?? new ContextLengthError(message, opts);
    case 422:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(message, opts);
  }

  const classified = classifyByMessage(message, opts);
  if (classified) return classified;

  // Unknown statuses are treated as transient.
  return new ProviderError(message, { ...opts, retryable: true });
}
