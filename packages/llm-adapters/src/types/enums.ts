/**
 * Core enums for the canonical model.
 *
 * Uses `as const satisfies` objects instead of TypeScript enums so the values
 * stay plain strings on the wire and in tests.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Who produced a canonical message. */
export const Role = {
  /** The unspecified role. Treated as system instructions by every adapter. */
  SYSTEM: "system",
  /** Human input, including tool results returned to the model. */
  USER: "user",
  /** Model output: text, tool calls, thinking. */
  AGENT: "agent",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// PartKind
// ---------------------------------------------------------------------------

/** Discriminator tags for Part. */
export const PartKind = {
  TEXT: "text",
  /** Inline bytes or a URI, with an optional media type. */
  FILE: "file",
  TOOL_CALL: "tool_call",
  TOOL_RESULT: "tool_result",
  /** A replayable reasoning block on an agent turn. */
  THINKING: "thinking",
} as const satisfies Record<string, string>;

export type PartKind = (typeof PartKind)[keyof typeof PartKind];

// ---------------------------------------------------------------------------
// StreamEventType
// ---------------------------------------------------------------------------

/** Discriminator tags for StreamEvent. */
export const StreamEventType = {
  /** Incremental answer text. */
  TEXT: "text",
  /** Incremental reasoning text. */
  THINKING: "thinking",
  /** A reasoning block has ended. Emitted exactly once per block. */
  THINKING_COMPLETE: "thinking_complete",
  /** A fully parsed tool call. */
  TOOL_CALL: "tool_call",
  /** Terminal: generation finished. */
  DONE: "done",
  /** Terminal: generation failed. */
  ERROR: "error",
} as const satisfies Record<string, string>;

export type StreamEventType =
  (typeof StreamEventType)[keyof typeof StreamEventType];

// ---------------------------------------------------------------------------
// ProviderType
// ---------------------------------------------------------------------------

/** The closed set of vendor protocols an adapter exists for. */
export const ProviderType = {
  ANTHROPIC: "anthropic",
  OPENAI: "openai",
  GEMINI: "gemini",
  OLLAMA: "ollama",
} as const satisfies Record<string, string>;

export type ProviderType = (typeof ProviderType)[keyof typeof ProviderType];
