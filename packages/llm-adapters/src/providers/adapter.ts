/**
 * ProviderAdapter interface: the contract each of the four vendor adapters
 * implements.
 *
 * Encoding and execution are separate steps so a caller can inspect or log
 * the wire request, and so a retry re-executes the same request.
 */

import type {
  CompletionResult,
  GenerateOptions,
  Message,
  ProviderType,
  StreamEvent,
  ToolDefinition,
} from "../types/index.js";

/** A fully encoded vendor request, ready for the transport. */
export interface WireRequest<TBody = unknown> {
  readonly provider: ProviderType;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: TBody;
  readonly streaming: boolean;
  /**
   * Text the model's answer was forced to start with. Re-attached to the
   * front of the decoded text.
   */
  readonly prefill?: string;
}

export interface ExecuteOptions {
  /** Cancels the call. Streams end with an AbortError event. */
  signal?: AbortSignal;
}

export interface ProviderAdapter<TBody = unknown> {
  readonly name: ProviderType;

  /**
   * Encode a canonical conversation for this vendor.
   *
   * @throws {EncodingError} when the conversation or options cannot be
   *   represented.
   */
  encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<TBody>;

  /** Execute a non-streaming request and parse the single response. */
  executeOnce(
    wire: WireRequest<TBody>,
    options?: ExecuteOptions,
  ): Promise<CompletionResult>;

  /**
   * Execute a streaming request. The iterator ends with exactly one DONE or
   * ERROR event; breaking out early cancels the request.
   */
  executeStreaming(
    wire: WireRequest<TBody>,
    options?: ExecuteOptions,
  ): AsyncIterableIterator<StreamEvent>;

  /** `encode` + `executeOnce`. */
  complete(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: GenerateOptions,
    execute?: ExecuteOptions,
  ): Promise<CompletionResult>;

  /**
   * `encode` + `executeStreaming`. An encoding failure surfaces as the
   * stream's ERROR event.
   */
  stream(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: GenerateOptions,
    execute?: ExecuteOptions,
  ): AsyncIterableIterator<StreamEvent>;
}
