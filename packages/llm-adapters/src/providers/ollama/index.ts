/**
 * Ollama provider adapter.
 *
 * Talks to a local (or proxied) Ollama server via POST /api/chat. Streams
 * are NDJSON, not SSE. No auth unless an API key is configured for a proxy.
 */

import {
  ProviderType,
  type CompletionResult,
  type GenerateOptions,
  type Message,
  type StreamEvent,
  type ToolDefinition,
} from "../../types/index.js";
import { DEFAULT_BASE_URLS } from "../../config.js";
import { parseNDJSONStream } from "../../utils/ndjson.js";
import type { ExecuteOptions, WireRequest } from "../adapter.js";
import { runStreamingDecode } from "../run-stream.js";
import {
  BaseAdapter,
  openByteStream,
  postJSON,
  trimTrailingSlash,
  type AdapterOptions,
} from "../shared.js";
import { translateRequest, type OllamaRequestBody } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export interface OllamaAdapterOptions extends AdapterOptions {
  apiKey?: string;
}

export class OllamaAdapter extends BaseAdapter<OllamaRequestBody> {
  readonly name = ProviderType.OLLAMA;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(options: OllamaAdapterOptions = {}) {
    super(options);
    this.apiKey = options.apiKey;
    this.baseUrl = trimTrailingSlash(options.baseUrl ?? DEFAULT_BASE_URLS.ollama);
  }

  encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<OllamaRequestBody> {
    const auth: Record<string, string> = this.apiKey
      ? { Authorization: `Bearer ${this.apiKey}` }
      : {};
    return {
      provider: this.name,
      url: `${this.baseUrl}/api/chat`,
      headers: this.headers(auth),
      body: translateRequest(messages, tools, options, streaming, this.logger),
      streaming,
    };
  }

  async executeOnce(
    wire: WireRequest<OllamaRequestBody>,
    options: ExecuteOptions = {},
  ): Promise<CompletionResult> {
    this.logDispatch(wire, wire.body.model);
    return translateResponse(await postJSON(this.transport, wire, options.signal));
  }

  executeStreaming(
    wire: WireRequest<OllamaRequestBody>,
    options: ExecuteOptions = {},
  ): AsyncIterableIterator<StreamEvent> {
    this.logDispatch(wire, wire.body.model);
    return runStreamingDecode(async (signal) => {
      const bytes = await openByteStream(this.transport, wire, signal);
      const chunks = parseNDJSONStream(bytes, { signal, logger: this.logger });
      return translateStream(chunks, this.logger);
    }, this.streamOptions(options.signal));
  }
}

export { isThinkingCapableModel, translateMessages, translateRequest } from "./translate-request.js";
export type { OllamaRequestBody } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { ToolCallAccumulator, translateStream } from "./stream.js";
