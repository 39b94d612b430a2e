/**
 * Anthropic provider adapter.
 *
 * Uses the Messages API (POST /v1/messages).
 * Authentication via x-api-key header + anthropic-version header.
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
  applyPrefill,
  openByteStream,
  postJSON,
  prependPrefill,
  trimTrailingSlash,
  type AdapterOptions,
} from "../shared.js";
import { translateRequest, type AnthropicRequestBody } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export const ANTHROPIC_VERSION = "2023-06-01";

export interface AnthropicAdapterOptions extends AdapterOptions {
  apiKey: string;
}

export class AnthropicAdapter extends BaseAdapter<AnthropicRequestBody> {
  readonly name = ProviderType.ANTHROPIC;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: AnthropicAdapterOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.baseUrl = trimTrailingSlash(options.baseUrl ?? DEFAULT_BASE_URLS.anthropic);
  }

  encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<AnthropicRequestBody> {
    const { body, extraHeaders, prefill } = translateRequest(
      messages,
      tools,
      options,
      streaming,
      this.logger,
    );
    return {
      provider: this.name,
      url: `${this.baseUrl}/v1/messages`,
      headers: this.headers(
        { "x-api-key": this.apiKey, "anthropic-version": ANTHROPIC_VERSION },
        extraHeaders,
      ),
      body,
      streaming,
      ...(prefill ? { prefill } : {}),
    };
  }

  async executeOnce(
    wire: WireRequest<AnthropicRequestBody>,
    options: ExecuteOptions = {},
  ): Promise<CompletionResult> {
    this.logDispatch(wire, wire.body.model);
    const body = await postJSON(this.transport, wire, options.signal);
    return applyPrefill(translateResponse(body), wire.prefill);
  }

  executeStreaming(
    wire: WireRequest<AnthropicRequestBody>,
    options: ExecuteOptions = {},
  ): AsyncIterableIterator<StreamEvent> {
    this.logDispatch(wire, wire.body.model);
    return runStreamingDecode(async (signal) => {
      const bytes = await openByteStream(this.transport, wire, signal);
      const events = translateStream(parseSSEStream(bytes, signal), this.logger);
      return prependPrefill(events, wire.prefill);
    }, this.streamOptions(options.signal));
  }
}

export { applyContinuityRule, translateRequest } from "./translate-request.js";
export type { AnthropicRequestBody } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { translateStream } from "./stream.js";
