/**
 * HTTP transport.
 *
 * `httpPost` / `httpStream` are thin wrappers around the native `fetch` API.
 * `FetchTransport` puts the retry policy on top of them and is the default
 * `Transport` every adapter sends through; tests substitute their own.
 */

import { AbortError, NetworkError, RequestTimeoutError, SDKError } from "../types/index.js";
import type { Logger } from "../logger.js";
import { retry, type RetryPolicy } from "./retry.js";
import { parseRetryAfter } from "./error-mapping.js";
import { readAllText } from "./reader.js";
import { tryParseJSON } from "./json.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

/** Resolved response from a streaming HTTP request. */
export interface HttpStreamResponse {
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array>;
}

/** Options shared by both `httpPost` and `httpStream`. */
export interface HttpRequestOptions {
  /**
   * Timeout in milliseconds, combined with any caller signal. Covers the
   * whole exchange for `httpPost`, but only the wait for response headers
   * for `httpStream`: a body that keeps delivering is never cut off.
   */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * The collaborator that executes wire requests.
 *
 * Non-2xx statuses resolve normally; the adapter maps them to errors.
 * Connection failures reject with a transport error.
 */
export interface Transport {
  post(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse>;
  stream(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpStreamResponse>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

function combine(signals: AbortSignal[]): AbortSignal | undefined {
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

function buildSignal(options?: HttpRequestOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = [];

  if (options?.signal) {
    signals.push(options.signal);
  }
  if (options?.timeout != null && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }
  return combine(signals);
}

/**
 * Like `buildSignal`, but the timeout stops counting once `clear()` is
 * called. The caller's signal stays attached.
 */
function buildHeaderDeadline(options?: HttpRequestOptions): {
  signal: AbortSignal | undefined;
  clear: () => void;
} {
  const signals: AbortSignal[] = [];
  let timer: ReturnType<typeof setTimeout> | undefined;

  if (options?.signal) {
    signals.push(options.signal);
  }
  const timeout = options?.timeout;
  if (timeout != null && timeout > 0) {
    const deadline = new AbortController();
    timer = setTimeout(() => {
      deadline.abort(
        new DOMException(`No response headers after ${timeout} ms`, "TimeoutError"),
      );
    }, timeout);
    signals.push(deadline.signal);
  }

  return { signal: combine(signals), clear: () => clearTimeout(timer) };
}

/** Map a rejected `fetch` to the transport error family. */
function toTransportError(err: unknown, url: string): SDKError {
  if (err instanceof SDKError) return err;
  const name = err instanceof Error ? err.name : "";
  const message = err instanceof Error ? err.message : String(err);
  if (name === "TimeoutError") {
    return new RequestTimeoutError(`Request to ${url} timed out`, { cause: err });
  }
  if (name === "AbortError") {
    return new AbortError(`Request to ${url} was aborted`, { cause: err });
  }
  return new NetworkError(`Request to ${url} failed: ${message}`, { cause: err });
}

/** A byte stream holding `text`, for bodies that were already read. */
export function textStream(text: string): ReadableStream<Uint8Array> {
  const bytes = new TextEncoder().encode(text);
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (bytes.length > 0) controller.enqueue(bytes);
      controller.close();
    },
  });
}

// ---------------------------------------------------------------------------
// fetch wrappers
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * Non-2xx statuses still resolve; error semantics live in `mapHttpError`.
 *
 * @throws {NetworkError | RequestTimeoutError | AbortError}
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  let res: Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: mergeHeaders(headers),
      body: JSON.stringify(body),
      signal: buildSignal(options),
    });
    text = await res.text();
  } catch (err: unknown) {
    throw toTransportError(err, url);
  }

  return {
    status: res.status,
    headers: res.headers,
    body: tryParseJSON(text),
    text,
  };
}

/**
 * Send a JSON POST request and return a streaming response.
 *
 * The timeout only applies until the headers arrive. The caller is
 * responsible for consuming or cancelling the stream.
 */
export async function httpStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpStreamResponse> {
  const deadline = buildHeaderDeadline(options);
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: mergeHeaders(headers),
      body: JSON.stringify(body),
      signal: deadline.signal,
    });
  } catch (err: unknown) {
    throw toTransportError(err, url);
  } finally {
    deadline.clear();
  }

  return {
    status: res.status,
    headers: res.headers,
    body: res.body ?? textStream(""),
  };
}

// ---------------------------------------------------------------------------
// FetchTransport
// ---------------------------------------------------------------------------

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/** Carries a retryable HTTP response through `retry()`. */
class RetryableStatusError extends SDKError {
  readonly retry_after?: number;

  constructor(
    readonly status: number,
    readonly headers: Headers,
    readonly text: string,
  ) {
    super(`HTTP ${status}`, { retryable: true });
    this.name = "RetryableStatusError";
    this.retry_after = parseRetryAfter(headers);
  }
}

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

/**
 * `fetch`-backed Transport with retries on connection failures and on
 * 408/429/5xx. The last failed response is returned as-is once retries run
 * out, so the adapter still maps it to a typed error. Streams are only
 * retried before their body is handed over.
 */
export class FetchTransport implements Transport {
  private readonly timeout: number | undefined;
  private readonly policy: Partial<RetryPolicy>;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout;
    const logger = options.logger;
    this.policy = {
      ...options.retry,
      onRetry: (error, attempt, delay) => {
        logger?.warn("Retrying request", {
          attempt: attempt + 1,
          delay: Math.round(delay),
          reason: error.message,
        });
        options.retry?.onRetry?.(error, attempt, delay);
      },
    };
  }

  private withTimeout(options?: HttpRequestOptions): HttpRequestOptions {
    return { timeout: this.timeout, ...options };
  }

  async post(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse> {
    try {
      return await retry(async () => {
        const res = await httpPost(url, body, headers, this.withTimeout(options));
        if (RETRYABLE_STATUSES.has(res.status)) {
          throw new RetryableStatusError(res.status, res.headers, res.text);
        }
        return res;
      }, this.policy);
    } catch (err: unknown) {
      if (err instanceof RetryableStatusError) {
        return {
          status: err.status,
          headers: err.headers,
          body: tryParseJSON(err.text),
          text: err.text,
        };
      }
      throw err;
    }
  }

  async stream(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpStreamResponse> {
    try {
      return await retry(async () => {
        const res = await httpStream(url, body, headers, this.withTimeout(options));
        if (RETRYABLE_STATUSES.has(res.status)) {
          const text = await readAllText(res.body);
          throw new RetryableStatusError(res.status, res.headers, text);
        }
        return res;
      }, this.policy);
    } catch (err: unknown) {
      if (err instanceof RetryableStatusError) {
        return { status: err.status, headers: err.headers, body: textStream(err.text) };
      }
      throw err;
    }
  }
}
