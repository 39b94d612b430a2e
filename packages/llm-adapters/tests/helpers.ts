/**
 * Shared fixtures for the test suites: in-process byte streams and a fake
 * Transport that records what adapters send.
 */

import type { SSEEvent } from "../src/utils/sse.js";
import type {
  HttpRequestOptions,
  HttpResponse,
  HttpStreamResponse,
  Transport,
} from "../src/utils/http.js";
import { createLogger, type Logger } from "../src/logger.js";

/** Create a ReadableStream from an array of string chunks (simulating network). */
export function chunkedStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

/** Collect all values from an async iterable. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iter) {
    items.push(item);
  }
  return items;
}

/** Yield pre-parsed SSE events. */
export async function* mockSSEStream(events: SSEEvent[]): AsyncIterableIterator<SSEEvent> {
  for (const event of events) {
    yield event;
  }
}

/** An SSE event whose data is `payload` serialized as JSON. */
export function sse(payload: unknown, event?: string): SSEEvent {
  return { event, data: JSON.stringify(payload) };
}

/** Serialize events into an SSE body. */
export function sseBody(events: SSEEvent[]): string {
  return events
    .map((e) => `${e.event !== undefined ? `event: ${e.event}\n` : ""}data: ${e.data}\n\n`)
    .join("");
}

/** One JSON document per line. */
export function ndjsonBody(chunks: unknown[]): string {
  return chunks.map((chunk) => JSON.stringify(chunk)).join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface CapturedLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/** A debug-level logger that keeps every line it writes. */
export function capturingLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (
          parsed !== null &&
          typeof parsed === "object" &&
          "level" in parsed &&
          "msg" in parsed &&
          typeof parsed.level === "string" &&
          typeof parsed.msg === "string"
        ) {
          lines.push({ ...parsed, level: parsed.level, msg: parsed.msg });
        }
      },
    },
  });
  return { logger, lines };
}

// ---------------------------------------------------------------------------
// Fake transport
// ---------------------------------------------------------------------------

export interface RecordedRequest {
  url: string;
  body: unknown;
  headers: Record<string, string>;
  streaming: boolean;
  signal?: AbortSignal;
}

export interface FakeReply {
  status?: number;
  /** JSON body for `post`, or text that is serialized for `stream`. */
  body?: unknown;
  /** Raw text; overrides `body`. */
  text?: string;
  headers?: Record<string, string>;
}

/**
 * Transport that answers from a queue of replies, in call order, and
 * records every request.
 */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: FakeReply[];

  constructor(replies: FakeReply[] = []) {
    this.replies = [...replies];
  }

  enqueue(reply: FakeReply): this {
    this.replies.push(reply);
    return this;
  }

  async post(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse> {
    this.requests.push({ url, body: structuredClone(body), headers, streaming: false, signal: options?.signal });
    const reply = this.next();
    const text = reply.text ?? JSON.stringify(reply.body ?? {});
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = undefined;
    }
    return {
      status: reply.status ?? 200,
      headers: new Headers(reply.headers),
      body: parsed,
      text,
    };
  }

  async stream(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpRequestOptions,
  ): Promise<HttpStreamResponse> {
    this.requests.push({ url, body: structuredClone(body), headers, streaming: true, signal: options?.signal });
    const reply = this.next();
    const text = reply.text ?? (typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body ?? {}));
    return {
      status: reply.status ?? 200,
      headers: new Headers(reply.headers),
      body: chunkedStream([text]),
    };
  }

  private next(): FakeReply {
    const reply = this.replies.shift();
    if (!reply) throw new Error("FakeTransport: no reply queued");
    return reply;
  }
}

// ---------------------------------------------------------------------------
// Slow fetch
// ---------------------------------------------------------------------------

export type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

/**
 * A fetch that answers 200 at once, then sends one chunk every
 * `intervalMs`. Once the request signal aborts, the body fails with the
 * signal's reason, as a real fetch body does.
 */
export function slowFetch(chunks: string[], intervalMs: number): FetchFn {
  return async (_input, init) => {
    const signal = init?.signal;
    const encoder = new TextEncoder();
    let sent = 0;
    const body = new ReadableStream<Uint8Array>({
      async pull(controller) {
        await new Promise((resolve) => setTimeout(resolve, intervalMs));
        if (signal?.aborted) {
          controller.error(signal.reason);
          return;
        }
        const chunk = chunks[sent++];
        if (chunk === undefined) {
          controller.close();
        } else {
          controller.enqueue(encoder.encode(chunk));
        }
      },
    });
    return new Response(body, { status: 200 });
  };
}
