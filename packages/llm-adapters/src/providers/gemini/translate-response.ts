/**
 * Translate a Gemini GenerateContentResponse into a CompletionResult.
 *
 * Parts go through the same decoder as the stream, so thought handling and
 * synthetic call ids match between the two paths.
 */

import {
  ContentFilterError,
  DecodeError,
  ProviderType,
  StreamCollector,
  StreamEventType,
  type CompletionResult,
} from "../../types/index.js";
import { getArray, getNumber, getRecord, getString, isRecord } from "../../utils/json.js";
import { GeminiPartDecoder, candidateParts } from "./stream.js";

export function translateResponse(raw: unknown): CompletionResult {
  if (!isRecord(raw)) {
    throw new DecodeError("Gemini response is not a JSON object", {
      provider: ProviderType.GEMINI,
    });
  }

  const blockReason = getString(getRecord(raw, "promptFeedback"), "blockReason");
  if (getArray(raw, "candidates").length === 0 && blockReason) {
    throw new ContentFilterError(`Prompt blocked: ${blockReason}`, {
      provider: ProviderType.GEMINI,
      raw,
    });
  }

  const decoder = new GeminiPartDecoder();
  const collector = new StreamCollector();
  for (const part of candidateParts(raw)) {
    for (const event of decoder.decode(part)) collector.process(event);
  }
  for (const event of decoder.finish()) collector.process(event);

  collector.process({
    type: StreamEventType.DONE,
    tokens_used: getNumber(getRecord(raw, "usageMetadata"), "totalTokenCount") ?? 0,
  });
  return collector.result();
}
