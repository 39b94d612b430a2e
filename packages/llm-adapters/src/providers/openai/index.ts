/**
 * OpenAI provider adapter.
 *
 * Uses the Responses API (POST /v1/responses), NOT Chat Completions, so
 * reasoning summaries and encrypted reasoning can be requested.
 */

import {
  ProviderError,
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
import {
  translateRequest,
  withoutReasoningSummary,
  type OpenAIRequestBody,
} from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export interface OpenAIAdapterOptions extends AdapterOptions {
  apiKey: string;
}

/**
 * Organizations that are not verified cannot request reasoning summaries.
 * The API answers 400 `unsupported_value` naming them.
 */
export function isSummaryRejection(err: unknown): boolean {
  return (
    err instanceof ProviderError &&
    err.status_code === 400 &&
    err.error_code === "unsupported_value" &&
    err.message.includes("reasoning summaries")
  );
}

/** `{base}/responses` when the base already ends in `/v1`. */
export function responsesUrl(baseUrl: string): string {
  const base = trimTrailingSlash(baseUrl);
  return base.endsWith("/v1") ? `${base}/responses` : `${base}/v1/responses`;
}

export class OpenAIAdapter extends BaseAdapter<OpenAIRequestBody> {
  readonly name = ProviderType.OPENAI;
  private readonly apiKey: string;
  private readonly url: string;

  constructor(options: OpenAIAdapterOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.url = responsesUrl(options.baseUrl ?? DEFAULT_BASE_URLS.openai);
  }

  encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<OpenAIRequestBody> {
    return {
      provider: this.name,
      url: this.url,
      headers: this.headers({ Authorization: `Bearer ${this.apiKey}` }),
      body: translateRequest(messages, tools, options, streaming, this.logger),
      streaming,
    };
  }

  async executeOnce(
    wire: WireRequest<OpenAIRequestBody>,
    options: ExecuteOptions = {},
  ): Promise<CompletionResult> {
    this.logDispatch(wire, wire.body.model);
    try {
      return translateResponse(await postJSON(this.transport, wire, options.signal));
    } catch (err: unknown) {
      const retryWire = this.summaryRetry(wire, err);
      if (!retryWire) throw err;
      return translateResponse(await postJSON(this.transport, retryWire, options.signal));
    }
  }

  executeStreaming(
    wire: WireRequest<OpenAIRequestBody>,
    options: ExecuteOptions = {},
  ): AsyncIterableIterator<StreamEvent> {
    this.logDispatch(wire, wire.body.model);
    return runStreamingDecode(async (signal) => {
      let bytes: ReadableStream<Uint8Array>;
      try {
        bytes = await openByteStream(this.transport, wire, signal);
      } catch (err: unknown) {
        const retryWire = this.summaryRetry(wire, err);
        if (!retryWire) throw err;
        bytes = await openByteStream(this.transport, retryWire, signal);
      }
      return translateStream(parseSSEStream(bytes, signal), this.logger);
    }, this.streamOptions(options.signal));
  }

  /**
   * The request to re-issue once when `err` rejected a summary request.
   * `wire` itself is left unchanged.
   */
  private summaryRetry(
    wire: WireRequest<OpenAIRequestBody>,
    err: unknown,
  ): WireRequest<OpenAIRequestBody> | undefined {
    if (!wire.body.reasoning?.summary || !isSummaryRejection(err)) return undefined;
    this.logger.warn("Reasoning summaries rejected, retrying without summary", {
      provider: this.name,
      model: wire.body.model,
    });
    return { ...wire, body: withoutReasoningSummary(wire.body) };
  }
}

export {
  effortForBudget,
  isReasoningModel,
  translateRequest,
  withoutReasoningSummary,
} from "./translate-request.js";
export type { OpenAIRequestBody } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { translateStream } from "./stream.js";
