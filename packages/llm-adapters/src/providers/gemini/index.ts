/**
 * Gemini provider adapter.
 *
 * Uses the native Gemini API (v1beta generateContent), NOT the
 * OpenAI-compatible endpoint. The API key goes in `x-goog-api-key`.
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
import { parseSSEStream } from "../../utils/sse.js";
import type { ExecuteOptions, WireRequest } from "../adapter.js";
import { runStreamingDecode } from "../run-stream.js";
import {
  BaseAdapter,
  openByteStream,
  postJSON,
  trimTrailingSlash,
  type AdapterOptions,
} from "../shared.js";
import { translateRequest, type GeminiRequestBody } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export interface GeminiAdapterOptions extends AdapterOptions {
  apiKey: string;
}

export class GeminiAdapter extends BaseAdapter<GeminiRequestBody> {
  readonly name = ProviderType.GEMINI;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: GeminiAdapterOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.baseUrl = trimTrailingSlash(options.baseUrl ?? DEFAULT_BASE_URLS.gemini);
  }

  encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<GeminiRequestBody> {
    const model = encodeURIComponent(options.model);
    const url = streaming
      ? `${this.baseUrl}/v1beta/models/${model}:streamGenerateContent?alt=sse`
      : `${this.baseUrl}/v1beta/models/${model}:generateContent`;
    return {
      provider: this.name,
      url,
      headers: this.headers({ "x-goog-api-key": this.apiKey }),
      body: translateRequest(messages, tools, options, this.logger),
      streaming,
    };
  }

  async executeOnce(
    wire: WireRequest<GeminiRequestBody>,
    options: ExecuteOptions = {},
  ): Promise<CompletionResult> {
    this.logDispatch(wire);
    return translateResponse(await postJSON(this.transport, wire, options.signal));
  }

  executeStreaming(
    wire: WireRequest<GeminiRequestBody>,
    options: ExecuteOptions = {},
  ): AsyncIterableIterator<StreamEvent> {
    this.logDispatch(wire);
    return runStreamingDecode(async (signal) => {
      const bytes = await openByteStream(this.transport, wire, signal);
      return translateStream(parseSSEStream(bytes, signal), this.logger);
    }, this.streamOptions(options.signal));
  }
}

export { translateContents, translateRequest } from "./translate-request.js";
export type { GeminiRequestBody } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { GeminiPartDecoder, translateStream } from "./stream.js";
