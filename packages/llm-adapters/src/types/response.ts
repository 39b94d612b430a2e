/**
 * Result type for non-streaming calls.
 */

import type { ThinkingBlock } from "./message.js";
import type { ToolCall } from "./tool.js";

/** The parsed outcome of `executeOnce()`. */
export interface CompletionResult {
  /** Concatenated answer text. */
  readonly text: string;
  readonly tool_calls: readonly ToolCall[];
  /** Vendor-reported token usage (0 when unreported). */
  readonly tokens_used: number;
  readonly thinking?: ThinkingBlock;
}
