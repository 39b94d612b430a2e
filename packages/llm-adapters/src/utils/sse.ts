/**
 * Server-Sent Events (SSE) stream parser.
 *
 * Parses a `ReadableStream<Uint8Array>` into an async iterable of SSE events.
 * Follows the W3C event-stream rules:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - `retry:` lines set a reconnection interval
 *   - Lines starting with `:` are comments (ignored)
 *   - A blank line dispatches the accumulated event
 *
 * Handles chunks that split mid-line and multi-line data fields.
 */

import { readText } from "./reader.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single parsed SSE event. */
export interface SSEEvent {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
  /** Reconnection interval in milliseconds (from `retry:` line). */
  retry?: number;
}

interface SSEAccumulator {
  eventType: string | undefined;
  dataLines: string[];
  retry: number | undefined;
}

/**
 * Process a single SSE line, updating the accumulator.
 * Blank lines and comment lines are handled by the caller.
 */
function processField(line: string, acc: SSEAccumulator): void {
  const colonIdx = line.indexOf(":");
  let field: string;
  let value: string;

  if (colonIdx === -1) {
    field = line;
    value = "";
  } else {
    field = line.slice(0, colonIdx);
    value = line.slice(colonIdx + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }
  }

  switch (field) {
    case "event":
      acc.eventType = value;
      break;
    case "data":
      acc.dataLines.push(value);
      break;
    case "retry": {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        acc.retry = parsed;
      }
      break;
    }
    // Unknown fields are ignored.
  }
}

function takeEvent(acc: SSEAccumulator): SSEEvent | undefined {
  const event =
    acc.dataLines.length > 0
      ? { event: acc.eventType, data: acc.dataLines.join("\n"), retry: acc.retry }
      : undefined;
  acc.eventType = undefined;
  acc.dataLines = [];
  acc.retry = undefined;
  return event;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a ReadableStream of bytes as an SSE event stream.
 *
 * Yields events as they become complete. Iteration ends when the stream
 * closes or `signal` aborts; either way the body is released.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncIterableIterator<SSEEvent> {
  let buffer = "";
  const acc: SSEAccumulator = {
    eventType: undefined,
    dataLines: [],
    retry: undefined,
  };

  for await (const chunk of readText(stream, signal)) {
    buffer += chunk;

    // Lines end in \r\n, \r or \n. The last element is "" or a partial line.
    const lines = buffer.split(/\r\n|\r|\n/);
    buffer = lines.pop() ?? "";

    for (const line of lines) {
      if (line === "") {
        const event = takeEvent(acc);
        if (event) yield event;
        continue;
      }
      if (line.startsWith(":")) continue;
      processField(line, acc);
    }
  }

  // Trailing line without a final newline, then a trailing partial event.
  if (buffer !== "" && !buffer.startsWith(":")) {
    processField(buffer, acc);
  }
  const last = takeEvent(acc);
  if (last) yield last;
}
