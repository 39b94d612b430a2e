/**
 * Barrel re-export for all provider adapters, plus the factory that picks
 * an implementation from validated settings.
 */

import { ProviderType } from "../types/index.js";
import type { Logger } from "../logger.js";
import type { ProviderSettings } from "../config.js";
import { FetchTransport, type Transport } from "../utils/http.js";
import type { ProviderAdapter } from "./adapter.js";
import type { AdapterOptions } from "./shared.js";
import { AnthropicAdapter } from "./anthropic/index.js";
import { OpenAIAdapter } from "./openai/index.js";
import { GeminiAdapter } from "./gemini/index.js";
import { OllamaAdapter } from "./ollama/index.js";

// Adapter interface
export type { ExecuteOptions, ProviderAdapter, WireRequest } from "./adapter.js";
export { BaseAdapter } from "./shared.js";
export type { AdapterOptions } from "./shared.js";
export { runStreamingDecode } from "./run-stream.js";
export type { OpenDecodedStream, RunStreamOptions } from "./run-stream.js";

// Anthropic adapter (Messages API)
export { AnthropicAdapter, ANTHROPIC_VERSION, applyContinuityRule } from "./anthropic/index.js";
export type { AnthropicAdapterOptions } from "./anthropic/index.js";

// OpenAI adapter (Responses API)
export {
  OpenAIAdapter,
  effortForBudget,
  isReasoningModel,
  isSummaryRejection,
  responsesUrl,
} from "./openai/index.js";
export type { OpenAIAdapterOptions } from "./openai/index.js";

// Gemini adapter
export { GeminiAdapter } from "./gemini/index.js";
export type { GeminiAdapterOptions } from "./gemini/index.js";

// Ollama adapter
export { OllamaAdapter, isThinkingCapableModel } from "./ollama/index.js";
export type { OllamaAdapterOptions } from "./ollama/index.js";

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface AdapterDeps {
  logger?: Logger;
  /** Replaces the FetchTransport built from the settings. */
  transport?: Transport;
}

/**
 * Build the adapter for one validated settings object.
 *
 * The default transport takes its timeout and retry count from the
 * settings.
 */
export function createAdapter(
  settings: ProviderSettings,
  deps: AdapterDeps = {},
): ProviderAdapter {
  const logger = deps.logger?.child({ provider: settings.type });
  const transport =
    deps.transport ??
    new FetchTransport({
      timeout: settings.timeoutMs,
      retry: { maxRetries: settings.maxRetries },
      logger,
    });
  const common: AdapterOptions = {
    baseUrl: settings.baseUrl,
    defaultHeaders: settings.headers,
    transport,
    logger,
    queueCapacity: settings.queueCapacity,
  };

  switch (settings.type) {
    case ProviderType.ANTHROPIC:
      return new AnthropicAdapter({ ...common, apiKey: settings.apiKey });
    case ProviderType.OPENAI:
      return new OpenAIAdapter({ ...common, apiKey: settings.apiKey });
    case ProviderType.GEMINI:
      return new GeminiAdapter({ ...common, apiKey: settings.apiKey });
    case ProviderType.OLLAMA:
      return new OllamaAdapter({ ...common, apiKey: settings.apiKey });
  }
}
