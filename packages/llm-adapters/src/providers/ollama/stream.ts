/**
 * Ollama streaming translation.
 *
 * The body is NDJSON: one complete chat chunk per line, the last one with
 * `done: true` and the token counts. Tool calls are only emitted at the
 * end, once every fragment has been merged.
 */

import {
  ProviderType,
  StreamError,
  StreamEventType,
  type StreamEvent,
  type ToolCall,
} from "../../types/index.js";
import type { Logger } from "../../logger.js";
import {
  getArray,
  getBoolean,
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseToolArguments,
} from "../../utils/json.js";

// ---------------------------------------------------------------------------
// Tool call accumulation
// ---------------------------------------------------------------------------

interface ToolCallBuilder {
  index: number;
  name: string;
  args: Record<string, unknown>;
}

function fragmentArguments(fn: Record<string, unknown> | undefined): Record<string, unknown> {
  const raw = fn?.["arguments"];
  if (typeof raw === "string") return parseToolArguments(raw);
  return isRecord(raw) ? raw : {};
}

/**
 * Merges tool-call fragments by `function.index`. A fragment without an
 * index takes the next free one.
 */
export class ToolCallAccumulator {
  private readonly builders = new Map<number, ToolCallBuilder>();

  add(fragment: unknown): void {
    const fn = getRecord(fragment, "function");
    const index = this.resolveIndex(getNumber(fn, "index"));
    const name = getString(fn, "name") ?? "";
    const args = fragmentArguments(fn);

    const existing = this.builders.get(index);
    if (existing) {
      existing.args = { ...existing.args, ...args };
      if (existing.name === "") existing.name = name;
    } else {
      this.builders.set(index, { index, name, args });
    }
  }

  get size(): number {
    return this.builders.size;
  }

  /** Calls in index order, with ids `call_<index>_<name>`. */
  toolCalls(): ToolCall[] {
    return [...this.builders.values()]
      .sort((a, b) => a.index - b.index)
      .map((b) => ({ id: `call_${b.index}_${b.name}`, name: b.name, args: b.args }));
  }

  private resolveIndex(index: number | undefined): number {
    if (index !== undefined && index >= 0) return index;
    let next = this.builders.size;
    while (this.builders.has(next)) next++;
    return next;
  }
}

export function chunkTokens(chunk: unknown): number {
  return (getNumber(chunk, "prompt_eval_count") ?? 0) + (getNumber(chunk, "eval_count") ?? 0);
}

// ---------------------------------------------------------------------------
// Stream translation
// ---------------------------------------------------------------------------

/**
 * Translate parsed NDJSON chunks into canonical StreamEvents.
 */
export async function* translateStream(
  chunks: AsyncIterable<unknown>,
  logger?: Logger,
): AsyncIterableIterator<StreamEvent> {
  const toolCalls = new ToolCallAccumulator();
  let thinking: string | undefined;

  function* completeThinking(): Generator<StreamEvent> {
    if (thinking === undefined) return;
    yield { type: StreamEventType.THINKING_COMPLETE, content: thinking, signature: "" };
    thinking = undefined;
  }

  function* finish(tokens: number): Generator<StreamEvent> {
    yield* completeThinking();
    for (const call of toolCalls.toolCalls()) {
      yield { type: StreamEventType.TOOL_CALL, tool_call: call };
    }
    yield { type: StreamEventType.DONE, tokens_used: tokens };
  }

  for await (const chunk of chunks) {
    const error = getString(chunk, "error");
    if (error !== undefined) {
      yield {
        type: StreamEventType.ERROR,
        error: new StreamError(error, {
          provider: ProviderType.OLLAMA,
          ...(isRecord(chunk) ? { raw: chunk } : {}),
        }),
      };
      return;
    }

    const message = getRecord(chunk, "message");

    const thought = getString(message, "thinking") ?? "";
    if (thought !== "") {
      thinking = (thinking ?? "") + thought;
      yield { type: StreamEventType.THINKING, text: thought };
    }

    const content = getString(message, "content") ?? "";
    if (content !== "") {
      yield* completeThinking();
      yield { type: StreamEventType.TEXT, text: content };
    }

    for (const fragment of getArray(message, "tool_calls")) {
      toolCalls.add(fragment);
    }

    if (getBoolean(chunk, "done") === true) {
      yield* finish(chunkTokens(chunk));
      return;
    }
  }

  logger?.debug("Stream ended without a done chunk", {
    provider: ProviderType.OLLAMA,
    tool_calls: toolCalls.size,
  });
  yield* finish(0);
}
