/**
 * Pieces every adapter uses: sending through the transport, turning HTTP
 * failures into typed errors, and validating options that mean the same
 * thing for every vendor.
 */

import {
  DecodeError,
  EncodingError,
  PartKind,
  Role,
  StreamEventType,
  type CompletionResult,
  type Message,
  type StreamEvent,
  type GenerateOptions,
  type ProviderType,
  type StructuredOutput,
  type ToolDefinition,
} from "../types/index.js";
import { defaultLogger, type Logger } from "../logger.js";
import { FetchTransport, mergeHeaders, type Transport } from "../utils/http.js";
import { mapHttpError } from "../utils/error-mapping.js";
import { readAllText } from "../utils/reader.js";
import { isRecord, tryParseJSON } from "../utils/json.js";
import type { ExecuteOptions, ProviderAdapter, WireRequest } from "./adapter.js";
import { runStreamingDecode, type RunStreamOptions } from "./run-stream.js";

// ---------------------------------------------------------------------------
// Adapter construction options
// ---------------------------------------------------------------------------

/** Options every adapter constructor accepts. */
export interface AdapterOptions {
  /** Overrides the vendor's public endpoint. */
  baseUrl?: string;
  /** Extra headers on every request. */
  defaultHeaders?: Record<string, string>;
  /** Defaults to a FetchTransport with the standard retry policy. */
  transport?: Transport;
  logger?: Logger;
  /** Bound on buffered stream events per call. */
  queueCapacity?: number;
}

export function resolveTransport(options: AdapterOptions): Transport {
  return options.transport ?? new FetchTransport({ logger: options.logger });
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

// ---------------------------------------------------------------------------
// BaseAdapter
// ---------------------------------------------------------------------------

/**
 * Wiring shared by the four adapters. Subclasses supply the vendor's
 * encoder and the two execute paths; `complete` and `stream` compose them.
 */
export abstract class BaseAdapter<TBody> implements ProviderAdapter<TBody> {
  abstract readonly name: ProviderType;
  protected readonly transport: Transport;
  protected readonly logger: Logger;
  private readonly queueCapacity: number | undefined;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: AdapterOptions) {
    this.transport = resolveTransport(options);
    this.logger = options.logger ?? defaultLogger();
    this.queueCapacity = options.queueCapacity;
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  abstract encode(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    streaming: boolean,
    options: GenerateOptions,
  ): WireRequest<TBody>;

  abstract executeOnce(
    wire: WireRequest<TBody>,
    options?: ExecuteOptions,
  ): Promise<CompletionResult>;

  abstract executeStreaming(
    wire: WireRequest<TBody>,
    options?: ExecuteOptions,
  ): AsyncIterableIterator<StreamEvent>;

  async complete(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: GenerateOptions,
    execute?: ExecuteOptions,
  ): Promise<CompletionResult> {
    return this.executeOnce(this.encode(messages, tools, false, options), execute);
  }

  stream(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: GenerateOptions,
    execute?: ExecuteOptions,
  ): AsyncIterableIterator<StreamEvent> {
    let wire: WireRequest<TBody>;
    try {
      wire = this.encode(messages, tools, true, options);
    } catch (err: unknown) {
      return runStreamingDecode(() => Promise.reject(err), this.streamOptions(execute?.signal));
    }
    return this.executeStreaming(wire, execute);
  }

  /** Vendor headers, then the caller's defaults, then `extra`; later wins. */
  protected headers(
    vendor: Record<string, string>,
    extra?: Record<string, string>,
  ): Record<string, string> {
    return mergeHeaders(vendor, this.defaultHeaders, extra);
  }

  protected streamOptions(signal?: AbortSignal): RunStreamOptions {
    return {
      provider: this.name,
      signal,
      capacity: this.queueCapacity,
      logger: this.logger,
    };
  }

  protected logDispatch(wire: WireRequest<TBody>, model?: string): void {
    this.logger.debug("Sending request", {
      provider: this.name,
      ...(model !== undefined ? { model } : {}),
      streaming: wire.streaming,
      url: wire.url,
    });
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/**
 * POST a non-streaming request and return the parsed JSON body.
 *
 * @throws {ProviderError} for non-2xx statuses.
 * @throws {DecodeError} when a 2xx body is not JSON.
 */
export async function postJSON(
  transport: Transport,
  wire: WireRequest,
  signal?: AbortSignal,
): Promise<unknown> {
  const res = await transport.post(wire.url, wire.body, wire.headers, { signal });
  if (res.status < 200 || res.status >= 300) {
    throw mapHttpError(res.status, res.body ?? res.text, wire.provider, res.headers);
  }
  if (res.body === undefined) {
    throw new DecodeError(`${wire.provider} returned a response that is not JSON`, {
      provider: wire.provider,
    });
  }
  return res.body;
}

/**
 * POST a streaming request and return the response body.
 *
 * A non-2xx response is read in full and thrown as a typed error.
 */
export async function openByteStream(
  transport: Transport,
  wire: WireRequest,
  signal?: AbortSignal,
): Promise<ReadableStream<Uint8Array>> {
  const res = await transport.stream(wire.url, wire.body, wire.headers, { signal });
  if (res.status < 200 || res.status >= 300) {
    const text = await readAllText(res.body);
    throw mapHttpError(res.status, tryParseJSON(text) ?? text, wire.provider, res.headers);
  }
  return res.body;
}

// ---------------------------------------------------------------------------
// Prefill
// ---------------------------------------------------------------------------

export function applyPrefill(
  result: CompletionResult,
  prefill: string | undefined,
): CompletionResult {
  if (!prefill) return result;
  return { ...result, text: prefill + result.text };
}

/** Emit the prefill as the first TEXT event, then pass `events` through. */
export async function* prependPrefill(
  events: AsyncIterable<StreamEvent>,
  prefill: string | undefined,
): AsyncIterableIterator<StreamEvent> {
  if (prefill) {
    yield { type: StreamEventType.TEXT, text: prefill };
  }
  yield* events;
}

// ---------------------------------------------------------------------------
// Encoding helpers
// ---------------------------------------------------------------------------

/** Text of every system (unspecified-role) message, in order. */
export function systemTexts(messages: readonly Message[]): string[] {
  const texts: string[] = [];
  for (const msg of messages) {
    if (msg.role !== Role.SYSTEM) continue;
    for (const part of msg.parts) {
      if (part.kind === PartKind.TEXT && part.text !== "") {
        texts.push(part.text);
      }
    }
  }
  return texts;
}

export type ResolvedStructuredOutput =
  | {
      readonly format: "json";
      readonly schema?: Record<string, unknown>;
      readonly prefill?: string;
      readonly property_ordering?: readonly string[];
    }
  | {
      readonly format: "enum";
      readonly values: readonly string[];
      readonly prefill?: string;
    };

/**
 * Validate structured-output options.
 *
 * @throws {EncodingError} when a schema is given but is not an object
 *   schema, or an enum has no values.
 */
export function resolveStructuredOutput(
  structured: StructuredOutput | undefined,
  provider: string,
): ResolvedStructuredOutput | undefined {
  if (!structured) return undefined;

  if (structured.format === "enum") {
    const values = structured.enum ?? [];
    if (values.length === 0) {
      throw new EncodingError("Structured output format \"enum\" requires at least one value", {
        provider,
      });
    }
    return { format: "enum", values, prefill: structured.prefill };
  }

  if (structured.format !== "json") {
    throw new EncodingError(`Unsupported structured output format "${String(structured.format)}"`, {
      provider,
    });
  }

  if (structured.schema === undefined) {
    return {
      format: "json",
      prefill: structured.prefill,
      property_ordering: structured.property_ordering,
    };
  }
  if (!isRecord(structured.schema)) {
    throw new EncodingError("Structured output schema must be a JSON object", { provider });
  }
  const type = structured.schema["type"];
  if (type !== undefined && type !== "object") {
    throw new EncodingError(
      `Structured output schema must describe an object, got type ${JSON.stringify(type)}`,
      { provider },
    );
  }
  return {
    format: "json",
    schema: structured.schema,
    prefill: structured.prefill,
    property_ordering: structured.property_ordering,
  };
}

/**
 * Tool call id -> function name, filled while encoding agent turns, for
 * vendors whose tool results are matched by name.
 */
export class ToolNameMap {
  private readonly idToName = new Map<string, string>();

  register(id: string, name: string): void {
    this.idToName.set(id, name);
  }

  getName(id: string): string | undefined {
    return this.idToName.get(id);
  }

  /** The registered name, or the id itself when none was registered. */
  nameFor(id: string): string {
    return this.idToName.get(id) ?? id;
  }
}

/** Tool output as sent back to vendors with no error flag on results. */
export function toolResultText(content: string, error: string | undefined): string {
  if (!error) return content;
  return content ? `Error: ${error}\n${content}` : `Error: ${error}`;
}

/** A string-valued JSON schema restricted to `values`. */
export function enumSchema(values: readonly string[]): Record<string, unknown> {
  return { type: "string", enum: [...values] };
}

/** Prompt text asking for JSON that matches `schema`. */
export function schemaInstructions(schema: Record<string, unknown>): string {
  return [
    "You must respond with valid JSON matching this exact schema:",
    "",
    JSON.stringify(schema, null, 2),
    "",
    "Important:",
    "- Output ONLY valid JSON, no other text",
    "- All required fields must be present",
    "- Follow the exact structure specified",
    "- Use correct data types for each field",
  ].join("\n");
}

/** Prompt text asking for exactly one of `values`. */
export function enumInstructions(values: readonly string[]): string {
  return `Respond with exactly one of the following values and nothing else: ${values.join(", ")}`;
}
