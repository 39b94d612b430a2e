/**
 * Translate an Anthropic Messages API response into a CompletionResult.
 */

import {
  DecodeError,
  ProviderType,
  type CompletionResult,
  type ThinkingBlock,
  type ToolCall,
} from "../../types/index.js";
import { getArray, getNumber, getRecord, getString, isRecord } from "../../utils/json.js";

export function translateResponse(raw: unknown): CompletionResult {
  if (!isRecord(raw)) {
    throw new DecodeError("Anthropic response is not a JSON object", {
      provider: ProviderType.ANTHROPIC,
    });
  }

  let text = "";
  const toolCalls: ToolCall[] = [];
  let thinking: ThinkingBlock | undefined;

  for (const block of getArray(raw, "content")) {
    switch (getString(block, "type")) {
      case "text":
        text += getString(block, "text") ?? "";
        break;

      case "tool_use":
        toolCalls.push({
          id: getString(block, "id") ?? "",
          name: getString(block, "name") ?? "",
          args: getRecord(block, "input") ?? {},
        });
        break;

      case "thinking":
        // Only the first block is kept.
        thinking ??= {
          content: getString(block, "thinking") ?? "",
          signature: getString(block, "signature") ?? "",
        };
        break;

      default:
        break;
    }
  }

  const usage = getRecord(raw, "usage");
  const tokens = (getNumber(usage, "input_tokens") ?? 0) + (getNumber(usage, "output_tokens") ?? 0);

  return {
    text,
    tool_calls: toolCalls,
    tokens_used: tokens,
    ...(thinking ? { thinking } : {}),
  };
}
