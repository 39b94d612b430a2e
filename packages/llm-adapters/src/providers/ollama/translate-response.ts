/**
 * Translate an Ollama `/api/chat` response (stream: false) into a
 * CompletionResult.
 */

import {
  DecodeError,
  ProviderError,
  ProviderType,
  type CompletionResult,
} from "../../types/index.js";
import { getArray, getRecord, getString, isRecord } from "../../utils/json.js";
import { ToolCallAccumulator, chunkTokens } from "./stream.js";

export function translateResponse(raw: unknown): CompletionResult {
  if (!isRecord(raw)) {
    throw new DecodeError("Ollama response is not a JSON object", {
      provider: ProviderType.OLLAMA,
    });
  }

  const error = getString(raw, "error");
  if (error !== undefined) {
    throw new ProviderError(error, { provider: ProviderType.OLLAMA, raw });
  }

  const message = getRecord(raw, "message");
  const toolCalls = new ToolCallAccumulator();
  for (const fragment of getArray(message, "tool_calls")) {
    toolCalls.add(fragment);
  }

  const thinking = getString(message, "thinking") ?? "";

  return {
    text: getString(message, "content") ?? "",
    tool_calls: toolCalls.toolCalls(),
    tokens_used: chunkTokens(raw),
    ...(thinking !== "" ? { thinking: { content: thinking, signature: "" } } : {}),
  };
}
