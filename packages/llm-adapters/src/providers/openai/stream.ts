/**
 * OpenAI Responses API streaming translation.
 *
 * - The SSE `event:` header names the event; the payload `type` is only a
 *   fallback
 * - A reasoning block completes exactly once, whichever completion events
 *   arrive, and an open block is completed before DONE
 * - A tool call can finish via `function_call_arguments.done` or
 *   `output_item.done`; the second one for the same call id is ignored
 */

import {
  ProviderType,
  StreamError,
  StreamEventType,
  type StreamEvent,
  type ToolCall,
} from "../../types/index.js";
import type { Logger } from "../../logger.js";
import type { SSEEvent } from "../../utils/sse.js";
import {
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseToolArguments,
  tryParseJSON,
} from "../../utils/json.js";
import { encryptedContent, summaryTexts } from "./translate-response.js";

// ---------------------------------------------------------------------------
// Streaming state
// ---------------------------------------------------------------------------

interface ReasoningState {
  id: string;
  content: string;
  signature: string;
  /** Summary text already went out as THINKING deltas. */
  streamed: boolean;
  /** `summary_index` of the last delta; a new index starts a new line. */
  summaryIndex?: number;
}

interface FunctionCallState {
  itemId: string;
  callId: string;
  name: string;
  args: string;
}

function errorMessage(payload: Record<string, unknown>): string {
  const nested =
    getRecord(payload, "error") ?? getRecord(getRecord(payload, "response"), "error");
  return getString(nested, "message") ?? getString(payload, "message") ?? "OpenAI stream error";
}

/**
 * Translate OpenAI Responses API SSE events into canonical StreamEvents.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  logger?: Logger,
): AsyncIterableIterator<StreamEvent> {
  const state: { reasoning?: ReasoningState; call?: FunctionCallState } = {};
  const completedReasoning = new Set<string>();
  const emittedCallIds = new Set<string>();
  let totalTokens = 0;

  const completeReasoning = (): StreamEvent | undefined => {
    const block = state.reasoning;
    state.reasoning = undefined;
    if (!block) return undefined;
    if (block.id !== "") completedReasoning.add(block.id);
    return {
      type: StreamEventType.THINKING_COMPLETE,
      content: block.content,
      signature: block.signature,
    };
  };

  const openReasoning = (id: string): ReasoningState => {
    state.reasoning ??= { id, content: "", signature: "", streamed: false };
    return state.reasoning;
  };

  /** The call to emit for `callId`, or undefined when already emitted. */
  const takeCall = (callId: string, name: string, args: string): ToolCall | undefined => {
    if (callId === "" || name === "") return undefined;
    if (emittedCallIds.has(callId)) {
      logger?.debug("Skipping duplicate tool call", { provider: ProviderType.OPENAI, call_id: callId });
      return undefined;
    }
    emittedCallIds.add(callId);
    return { id: callId, name, args: parseToolArguments(args) };
  };

  for await (const sse of sseStream) {
    const parsed = tryParseJSON(sse.data);
    if (!isRecord(parsed)) {
      if (sse.data !== "[DONE]") {
        logger?.debug("Skipping unparseable stream event", {
          provider: ProviderType.OPENAI,
          event: sse.event,
        });
      }
      continue;
    }

    const eventType = sse.event ?? getString(parsed, "type");

    switch (eventType) {
      case "response.output_item.added": {
        const item = getRecord(parsed, "item");
        const itemType = getString(item, "type");
        const itemId = getString(item, "id") ?? "";
        if (itemType === "reasoning") {
          // A new block closes one that never got its done event.
          if (state.reasoning && state.reasoning.id !== itemId) {
            const done = completeReasoning();
            if (done) yield done;
          }
          openReasoning(itemId);
        } else if (itemType === "function_call") {
          state.call = {
            itemId,
            callId: getString(item, "call_id") ?? itemId,
            name: getString(item, "name") ?? "",
            args: getString(item, "arguments") ?? "",
          };
        }
        break;
      }

      case "response.reasoning_summary_text.delta": {
        const delta = getString(parsed, "delta") ?? "";
        if (delta === "") break;
        const block = openReasoning(getString(parsed, "item_id") ?? "");
        const index = getNumber(parsed, "summary_index");
        const text =
          index !== undefined && block.summaryIndex !== undefined && index !== block.summaryIndex
            ? `\n${delta}`
            : delta;
        if (index !== undefined) block.summaryIndex = index;
        block.content += text;
        block.streamed = true;
        yield { type: StreamEventType.THINKING, text };
        break;
      }

      case "response.reasoning_summary_text.done": {
        // Carries the full part text; only needed when no deltas came.
        const text = getString(parsed, "text") ?? "";
        const itemId = getString(parsed, "item_id") ?? "";
        if (completedReasoning.has(itemId)) break;
        const block = openReasoning(itemId);
        if (!block.streamed && text !== "") {
          block.content += block.content === "" ? text : `\n${text}`;
          yield { type: StreamEventType.THINKING, text };
        }
        block.streamed = true;
        break;
      }

      case "response.output_item.done": {
        const item = getRecord(parsed, "item");
        const itemType = getString(item, "type");
        const itemId = getString(item, "id") ?? "";

        if (itemType === "reasoning") {
          if (completedReasoning.has(itemId)) break;
          const block = openReasoning(itemId);
          block.signature = encryptedContent(item) || block.signature;
          if (!block.streamed) {
            const texts = summaryTexts(item);
            for (const text of texts) {
              yield { type: StreamEventType.THINKING, text };
            }
            block.content = texts.join("\n");
          }
          const done = completeReasoning();
          if (done) yield done;
        } else if (itemType === "function_call") {
          const callId = getString(item, "call_id") ?? itemId;
          const toolCall = takeCall(
            callId,
            getString(item, "name") ?? "",
            getString(item, "arguments") ?? (state.call?.callId === callId ? state.call.args : ""),
          );
          if (state.call?.callId === callId) state.call = undefined;
          if (toolCall) yield { type: StreamEventType.TOOL_CALL, tool_call: toolCall };
        }
        break;
      }

      case "response.output_text.delta": {
        const delta = getString(parsed, "delta") ?? getString(getRecord(parsed, "delta"), "text") ?? "";
        if (delta !== "") yield { type: StreamEventType.TEXT, text: delta };
        break;
      }

      case "response.function_call_arguments.delta": {
        const delta = getString(parsed, "delta") ?? "";
        if (state.call) state.call.args += delta;
        break;
      }

      case "response.function_call_arguments.done": {
        const callId = state.call?.callId ?? getString(parsed, "call_id") ?? getString(parsed, "item_id") ?? "";
        const name = state.call?.name ?? getString(parsed, "name") ?? "";
        const args = getString(parsed, "arguments") ?? state.call?.args ?? "";
        state.call = undefined;
        const toolCall = takeCall(callId, name, args);
        if (toolCall) yield { type: StreamEventType.TOOL_CALL, tool_call: toolCall };
        break;
      }

      case "response.completed":
      case "response.incomplete": {
        const usage = getRecord(getRecord(parsed, "response"), "usage");
        totalTokens = getNumber(usage, "total_tokens") ?? totalTokens;
        const done = completeReasoning();
        if (done) yield done;
        yield { type: StreamEventType.DONE, tokens_used: totalTokens };
        return;
      }

      case "response.failed":
      case "error":
        yield {
          type: StreamEventType.ERROR,
          error: new StreamError(errorMessage(parsed), {
            provider: ProviderType.OPENAI,
            raw: parsed,
          }),
        };
        return;

      default:
        break;
    }
  }

  // Body ended without response.completed.
  const done = completeReasoning();
  if (done) yield done;
  yield { type: StreamEventType.DONE, tokens_used: totalTokens };
}
