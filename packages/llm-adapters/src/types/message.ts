/**
 * Message and Part types for the canonical model.
 */

import type { Role } from "./enums.js";
import { PartKind, Role as RoleValues } from "./enums.js";
import type { ToolCall } from "./tool.js";

// ---------------------------------------------------------------------------
// ThinkingBlock
// ---------------------------------------------------------------------------

/** A reasoning trace as returned by a vendor. */
export interface ThinkingBlock {
  readonly content: string;
  /**
   * Opaque vendor token that must be replayed verbatim for the block to be
   * accepted on a later turn. May be empty.
   */
  readonly signature: string;
}

// ---------------------------------------------------------------------------
// Part: discriminated union on `kind`
// ---------------------------------------------------------------------------

export interface TextPart {
  readonly kind: typeof PartKind.TEXT;
  readonly text: string;
}

/** Inline bytes or a URI reference. One of `data` / `uri` is set. */
export interface FilePart {
  readonly kind: typeof PartKind.FILE;
  readonly data?: Uint8Array;
  readonly uri?: string;
  /** e.g. "image/png". Detected from the bytes when absent. */
  readonly media_type?: string;
}

export interface ToolCallPart {
  readonly kind: typeof PartKind.TOOL_CALL;
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export interface ToolResultPart {
  readonly kind: typeof PartKind.TOOL_RESULT;
  /** The ToolCallPart.id this result answers. */
  readonly tool_call_id: string;
  readonly content: string;
  /** Set when the tool failed. */
  readonly error?: string;
}

export interface ThinkingPart {
  readonly kind: typeof PartKind.THINKING;
  readonly thinking: ThinkingBlock;
}

export type Part =
  | TextPart
  | FilePart
  | ToolCallPart
  | ToolResultPart
  | ThinkingPart;

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** One turn of a canonical conversation. Parts are processed in order. */
export interface Message {
  readonly role: Role;
  readonly parts: readonly Part[];
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system (unspecified-role) message from plain text. */
export function createSystemMessage(text: string): Message {
  return {
    role: RoleValues.SYSTEM,
    parts: [{ kind: PartKind.TEXT, text }],
  };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): Message {
  return {
    role: RoleValues.USER,
    parts: [{ kind: PartKind.TEXT, text }],
  };
}

/**
 * Create an agent message. Thinking (when given) comes first, then text,
 * then tool calls.
 */
export function createAgentMessage(
  text: string,
  options?: { tool_calls?: readonly ToolCall[]; thinking?: ThinkingBlock },
): Message {
  const parts: Part[] = [];
  if (options?.thinking) {
    parts.push({ kind: PartKind.THINKING, thinking: options.thinking });
  }
  if (text !== "") {
    parts.push({ kind: PartKind.TEXT, text });
  }
  for (const call of options?.tool_calls ?? []) {
    parts.push({
      kind: PartKind.TOOL_CALL,
      id: call.id,
      name: call.name,
      args: call.args,
    });
  }
  return { role: RoleValues.AGENT, parts };
}

/** Create a user-role message carrying a single tool result. */
export function createToolResultMessage(
  tool_call_id: string,
  content: string,
  error?: string,
): Message {
  return {
    role: RoleValues.USER,
    parts: [
      {
        kind: PartKind.TOOL_RESULT,
        tool_call_id,
        content,
        ...(error !== undefined ? { error } : {}),
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/**
 * Concatenate text from all TEXT parts of a message.
 * Returns empty string if no text parts exist.
 */
export function getMessageText(message: Message): string {
  return message.parts
    .filter((part): part is TextPart => part.kind === PartKind.TEXT)
    .map((part) => part.text)
    .join("");
}

/** Extract all tool calls from a message's parts. */
export function getMessageToolCalls(message: Message): ToolCall[] {
  return message.parts
    .filter((part): part is ToolCallPart => part.kind === PartKind.TOOL_CALL)
    .map((part) => ({ id: part.id, name: part.name, args: part.args }));
}

/** Extract all tool results from a message's parts. */
export function getMessageToolResults(message: Message): ToolResultPart[] {
  return message.parts.filter(
    (part): part is ToolResultPart => part.kind === PartKind.TOOL_RESULT,
  );
}

/** The first thinking block on a message, if any. */
export function getMessageThinking(message: Message): ThinkingBlock | undefined {
  for (const part of message.parts) {
    if (part.kind === PartKind.THINKING) return part.thinking;
  }
  return undefined;
}
