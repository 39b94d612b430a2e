/**
 * Canonical stream events and a collector that folds them into a
 * CompletionResult.
 */

import { StreamEventType } from "./enums.js";
import type { ThinkingBlock } from "./message.js";
import type { ToolCall } from "./tool.js";
import type { CompletionResult } from "./response.js";
import type { SDKError } from "./errors.js";

// ---------------------------------------------------------------------------
// StreamEvent: discriminated union on `type`
// ---------------------------------------------------------------------------

export interface TextEvent {
  readonly type: typeof StreamEventType.TEXT;
  readonly text: string;
}

export interface ThinkingEvent {
  readonly type: typeof StreamEventType.THINKING;
  readonly text: string;
}

export interface ThinkingCompleteEvent {
  readonly type: typeof StreamEventType.THINKING_COMPLETE;
  readonly content: string;
  readonly signature: string;
}

export interface ToolCallEvent {
  readonly type: typeof StreamEventType.TOOL_CALL;
  readonly tool_call: ToolCall;
}

export interface DoneEvent {
  readonly type: typeof StreamEventType.DONE;
  readonly tokens_used: number;
}

export interface ErrorEvent {
  readonly type: typeof StreamEventType.ERROR;
  readonly error: SDKError;
}

/**
 * A single event of a canonical stream.
 *
 * A stream ends with exactly one DoneEvent or ErrorEvent and nothing
 * follows it.
 */
export type StreamEvent =
  | TextEvent
  | ThinkingEvent
  | ThinkingCompleteEvent
  | ToolCallEvent
  | DoneEvent
  | ErrorEvent;

export type TerminalEvent = DoneEvent | ErrorEvent;

/** True for the two event types that end a stream. */
export function isTerminalEvent(event: StreamEvent): event is TerminalEvent {
  return (
    event.type === StreamEventType.DONE || event.type === StreamEventType.ERROR
  );
}

// ---------------------------------------------------------------------------
// StreamCollector
// ---------------------------------------------------------------------------

/**
 * Collects stream events into a CompletionResult.
 *
 * Usage:
 * ```ts
 * const collector = new StreamCollector();
 * for await (const event of adapter.stream(messages, tools, options)) {
 *   collector.process(event);
 * }
 * const result = collector.result();
 * ```
 *
 * The first completed reasoning block becomes `thinking`, matching what the
 * non-streaming parsers return.
 */
export class StreamCollector {
  private textChunks: string[] = [];
  private toolCalls: ToolCall[] = [];
  private thinking: ThinkingBlock | undefined;
  private tokensUsed = 0;
  private failure: SDKError | undefined;
  private finished = false;

  process(event: StreamEvent): void {
    switch (event.type) {
      case StreamEventType.TEXT:
        this.textChunks.push(event.text);
        break;
      case StreamEventType.THINKING:
        // Deltas are superseded by the completion event.
        break;
      case StreamEventType.THINKING_COMPLETE:
        if (!this.thinking) {
          this.thinking = { content: event.content, signature: event.signature };
        }
        break;
      case StreamEventType.TOOL_CALL:
        this.toolCalls.push(event.tool_call);
        break;
      case StreamEventType.DONE:
        this.tokensUsed = event.tokens_used;
        this.finished = true;
        break;
      case StreamEventType.ERROR:
        this.failure = event.error;
        this.finished = true;
        break;
    }
  }

  /** Whether a terminal event has been seen. */
  get done(): boolean {
    return this.finished;
  }

  /** The error carried by a terminal ErrorEvent, if any. */
  get error(): SDKError | undefined {
    return this.failure;
  }

  result(): CompletionResult {
    return {
      text: this.textChunks.join(""),
      tool_calls: [...this.toolCalls],
      tokens_used: this.tokensUsed,
      ...(this.thinking ? { thinking: this.thinking } : {}),
    };
  }
}

/**
 * Drain a stream into a CompletionResult, throwing the error of a terminal
 * ErrorEvent.
 */
export async function collectStream(
  events: AsyncIterable<StreamEvent>,
): Promise<CompletionResult> {
  const collector = new StreamCollector();
  for await (const event of events) {
    collector.process(event);
  }
  if (collector.error) {
    throw collector.error;
  }
  return collector.result();
}
