/**
 * Tool-related types for the canonical model.
 */

// ---------------------------------------------------------------------------
// ToolCall
// ---------------------------------------------------------------------------

/** A model-initiated tool invocation with fully parsed arguments. */
export interface ToolCall {
  /** Call identifier (vendor-assigned or synthesized by the adapter). */
  readonly id: string;
  readonly name: string;
  /** Parsed JSON arguments. Unparseable input arrives as `{ _raw: string }`. */
  readonly args: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// ToolDefinition
// ---------------------------------------------------------------------------

/** A tool the model may call. Supplied per request. */
export interface ToolDefinition {
  readonly name: string;
  /** Human-readable description for the model. */
  readonly description: string;
  /** JSON Schema for the arguments (root is an object schema). */
  readonly parameters: Record<string, unknown>;
}
