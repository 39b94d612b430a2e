/**
 * Per-call options shared by every adapter.
 */

// ---------------------------------------------------------------------------
// StructuredOutput
// ---------------------------------------------------------------------------

/** Constrained generation settings. */
export interface StructuredOutput {
  /** "json" for a JSON document, "enum" for exactly one of `enum`. */
  readonly format: "json" | "enum";
  /** JSON Schema for `json`. Must be an object schema. */
  readonly schema?: unknown;
  /** Allowed values for `enum`. */
  readonly enum?: readonly string[];
  /** Text the model's answer is forced to start with (Claude-style only). */
  readonly prefill?: string;
  /** Output field order hint (Gemini-style only). */
  readonly property_ordering?: readonly string[];
}

// ---------------------------------------------------------------------------
// ThinkingOptions
// ---------------------------------------------------------------------------

export interface ThinkingOptions {
  readonly enabled: boolean;
  /** Reasoning token budget. Each vendor applies its own default. */
  readonly budget_tokens?: number;
}

// ---------------------------------------------------------------------------
// GenerateOptions
// ---------------------------------------------------------------------------

/** Options accepted by `encode()`. */
export interface GenerateOptions {
  /** The vendor's native model ID. */
  readonly model: string;
  /** Maximum output tokens. */
  readonly max_tokens?: number;
  /** Sampling temperature. Ignored where the vendor forbids it. */
  readonly temperature?: number;
  readonly thinking?: ThinkingOptions;
  readonly structured_output?: StructuredOutput;
}
