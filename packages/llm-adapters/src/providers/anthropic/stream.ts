/**
 * Anthropic streaming translation.
 *
 * Content arrives as indexed content_block_start / delta / stop events.
 * Each index owns its own accumulator until its stop event.
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
  getNumber,
  getRecord,
  getString,
  parseToolArguments,
  tryParseJSON,
  isRecord,
} from "../../utils/json.js";

// ---------------------------------------------------------------------------
// Streaming state
// ---------------------------------------------------------------------------

type BlockState =
  | { kind: "thinking"; content: string; signature: string }
  | { kind: "tool"; id: string; name: string; args: string }
  | { kind: "text" };

function openBlock(block: Record<string, unknown> | undefined): BlockState | undefined {
  switch (getString(block, "type")) {
    case "thinking":
      return {
        kind: "thinking",
        content: getString(block, "thinking") ?? "",
        signature: getString(block, "signature") ?? "",
      };
    case "tool_use":
      return {
        kind: "tool",
        id: getString(block, "id") ?? "",
        name: getString(block, "name") ?? "",
        args: "",
      };
    case "text":
      return { kind: "text" };
    default:
      return undefined;
  }
}

/**
 * Translate Anthropic SSE events into canonical StreamEvents.
 *
 * Ends after `message_stop` (DONE with input + output tokens) or an `error`
 * event (ERROR).
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  logger?: Logger,
): AsyncIterableIterator<StreamEvent> {
  let inputTokens = 0;
  let outputTokens = 0;
  const blocks = new Map<number, BlockState>();

  for await (const sse of sseStream) {
    const parsed = tryParseJSON(sse.data);
    if (!isRecord(parsed)) {
      logger?.debug("Skipping unparseable stream event", {
        provider: ProviderType.ANTHROPIC,
        event: sse.event,
      });
      continue;
    }

    const eventType = sse.event ?? getString(parsed, "type");
    const index = getNumber(parsed, "index") ?? 0;

    switch (eventType) {
      case "message_start": {
        const usage = getRecord(getRecord(parsed, "message"), "usage");
        inputTokens = getNumber(usage, "input_tokens") ?? 0;
        outputTokens = getNumber(usage, "output_tokens") ?? outputTokens;
        break;
      }

      case "content_block_start": {
        const block = getRecord(parsed, "content_block");
        const state = openBlock(block);
        if (!state) break;
        blocks.set(index, state);
        const initialText = state.kind === "text" ? getString(block, "text") : undefined;
        if (initialText) {
          yield { type: StreamEventType.TEXT, text: initialText };
        }
        break;
      }

      case "content_block_delta": {
        const delta = getRecord(parsed, "delta");
        const state = blocks.get(index);

        switch (getString(delta, "type")) {
          case "text_delta": {
            const text = getString(delta, "text") ?? "";
            if (text !== "") yield { type: StreamEventType.TEXT, text };
            break;
          }
          case "thinking_delta": {
            const text = getString(delta, "thinking") ?? "";
            if (state?.kind === "thinking") state.content += text;
            if (text !== "") yield { type: StreamEventType.THINKING, text };
            break;
          }
          case "signature_delta":
            if (state?.kind === "thinking") state.signature += getString(delta, "signature") ?? "";
            break;
          case "input_json_delta":
            if (state?.kind === "tool") state.args += getString(delta, "partial_json") ?? "";
            break;
          default:
            break;
        }
        break;
      }

      case "content_block_stop": {
        const state = blocks.get(index);
        blocks.delete(index);
        if (state?.kind === "thinking") {
          yield {
            type: StreamEventType.THINKING_COMPLETE,
            content: state.content,
            signature: state.signature,
          };
        } else if (state?.kind === "tool") {
          yield {
            type: StreamEventType.TOOL_CALL,
            tool_call: { id: state.id, name: state.name, args: parseToolArguments(state.args) },
          };
        }
        break;
      }

      case "message_delta": {
        const usage = getRecord(parsed, "usage");
        outputTokens = getNumber(usage, "output_tokens") ?? outputTokens;
        break;
      }

      case "message_stop":
        yield { type: StreamEventType.DONE, tokens_used: inputTokens + outputTokens };
        return;

      case "error": {
        const error = getRecord(parsed, "error");
        yield {
          type: StreamEventType.ERROR,
          error: new StreamError(getString(error, "message") ?? "Anthropic stream error", {
            provider: ProviderType.ANTHROPIC,
            raw: parsed,
          }),
        };
        return;
      }

      default:
        // ping and unknown events
        break;
    }
  }
}
