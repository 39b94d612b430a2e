/**
 * Gemini streaming translation.
 *
 * Gemini streams full GenerateContentResponse objects as SSE `data:` lines.
 * Reasoning is not a separate block type: it is an ordinary text part with
 * `thought: true`.
 */

import {
  ProviderType,
  StreamError,
  StreamEventType,
  type StreamEvent,
} from "../../types/index.js";
import type { Logger } from "../../logger.js";
import type { SSEEvent } from "../../utils/sse.js";
import {
  getArray,
  getBoolean,
  getNumber,
  getRecord,
  getString,
  isRecord,
  tryParseJSON,
} from "../../utils/json.js";

// ---------------------------------------------------------------------------
// Part decoding
// ---------------------------------------------------------------------------

/** Parts of the first candidate. */
export function candidateParts(response: unknown): unknown[] {
  const candidate = getArray(response, "candidates")[0];
  return getArray(getRecord(candidate, "content"), "parts");
}

/**
 * Turns response parts into canonical events for one response.
 *
 * Thought-flagged text accumulates into one reasoning block, completed by
 * the next non-thought part or function call. Gemini also flags the
 * confirmation text it writes after a function call as a thought; once a
 * call has been seen, thought-flagged text is treated as answer text.
 */
export class GeminiPartDecoder {
  private thinking: { content: string; signature: string } | undefined;
  private sawFunctionCall = false;
  private callCount = 0;

  decode(part: unknown): StreamEvent[] {
    const events: StreamEvent[] = [];
    const signature = getString(part, "thoughtSignature");

    const functionCall = getRecord(part, "functionCall");
    if (functionCall) {
      this.completeThinking(events, signature);
      this.sawFunctionCall = true;
      events.push({
        type: StreamEventType.TOOL_CALL,
        tool_call: {
          id: `call_${this.callCount++}`,
          name: getString(functionCall, "name") ?? "",
          args: getRecord(functionCall, "args") ?? {},
        },
      });
      return events;
    }

    const text = getString(part, "text");
    if (text === undefined) return events;

    if (getBoolean(part, "thought") === true && !this.sawFunctionCall) {
      this.thinking ??= { content: "", signature: "" };
      this.thinking.content += text;
      if (signature) this.thinking.signature = signature;
      if (text !== "") events.push({ type: StreamEventType.THINKING, text });
      return events;
    }

    this.completeThinking(events, signature);
    if (text !== "") events.push({ type: StreamEventType.TEXT, text });
    return events;
  }

  /** Complete a reasoning block left open at the end of the response. */
  finish(): StreamEvent[] {
    const events: StreamEvent[] = [];
    this.completeThinking(events, undefined);
    return events;
  }

  private completeThinking(events: StreamEvent[], closingSignature: string | undefined): void {
    const block = this.thinking;
    if (!block) return;
    this.thinking = undefined;
    events.push({
      type: StreamEventType.THINKING_COMPLETE,
      content: block.content,
      signature: block.signature || closingSignature || "",
    });
  }
}

// ---------------------------------------------------------------------------
// Stream translation
// ---------------------------------------------------------------------------

/**
 * Translate Gemini SSE events into canonical StreamEvents.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  logger?: Logger,
): AsyncIterableIterator<StreamEvent> {
  const decoder = new GeminiPartDecoder();
  let totalTokens = 0;

  for await (const sse of sseStream) {
    const parsed = tryParseJSON(sse.data);
    if (!isRecord(parsed)) {
      logger?.debug("Skipping unparseable stream event", { provider: ProviderType.GEMINI });
      continue;
    }

    const error = getRecord(parsed, "error");
    if (error) {
      yield {
        type: StreamEventType.ERROR,
        error: new StreamError(getString(error, "message") ?? "Gemini stream error", {
          provider: ProviderType.GEMINI,
          raw: parsed,
        }),
      };
      return;
    }

    for (const part of candidateParts(parsed)) {
      yield* decoder.decode(part);
    }

    totalTokens = getNumber(getRecord(parsed, "usageMetadata"), "totalTokenCount") ?? totalTokens;
  }

  yield* decoder.finish();
  yield { type: StreamEventType.DONE, tokens_used: totalTokens };
}
