/**
 * Translate an OpenAI Responses API response into a CompletionResult.
 */

import {
  DecodeError,
  ProviderType,
  type CompletionResult,
  type ThinkingBlock,
  type ToolCall,
} from "../../types/index.js";
import {
  getArray,
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseToolArguments,
} from "../../utils/json.js";

/** `encrypted_content` is a string, or an object with a `data` string. */
export function encryptedContent(item: unknown): string {
  return getString(item, "encrypted_content") ?? getString(getRecord(item, "encrypted_content"), "data") ?? "";
}

/** The `summary_text` entries of a reasoning item. */
export function summaryTexts(item: unknown): string[] {
  const texts: string[] = [];
  for (const entry of getArray(item, "summary")) {
    const text = getString(entry, "text");
    if (getString(entry, "type") === "summary_text" && text) {
      texts.push(text);
    }
  }
  return texts;
}

export function translateResponse(raw: unknown): CompletionResult {
  if (!isRecord(raw)) {
    throw new DecodeError("OpenAI response is not a JSON object", {
      provider: ProviderType.OPENAI,
    });
  }

  let text = "";
  const toolCalls: ToolCall[] = [];
  let thinking: ThinkingBlock | undefined;

  for (const item of getArray(raw, "output")) {
    switch (getString(item, "type")) {
      case "message":
        for (const part of getArray(item, "content")) {
          if (getString(part, "type") === "output_text") {
            text += getString(part, "text") ?? "";
          }
        }
        break;

      case "function_call":
        toolCalls.push({
          id: getString(item, "call_id") ?? getString(item, "id") ?? "",
          name: getString(item, "name") ?? "",
          args: parseToolArguments(getString(item, "arguments") ?? ""),
        });
        break;

      case "reasoning": {
        const content = summaryTexts(item).join("\n").trim();
        if (content !== "" && !thinking) {
          thinking = { content, signature: encryptedContent(item) };
        }
        break;
      }

      default:
        break;
    }
  }

  const usage = getRecord(raw, "usage");
  const tokens =
    getNumber(usage, "total_tokens") ??
    (getNumber(usage, "input_tokens") ?? 0) + (getNumber(usage, "output_tokens") ?? 0);

  return {
    text,
    tool_calls: toolCalls,
    tokens_used: tokens,
    ...(thinking ? { thinking } : {}),
  };
}
