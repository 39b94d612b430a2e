/**
 * Translate a canonical conversation into Anthropic Messages API format.
 *
 * - System messages are joined into the top-level `system` string
 * - Strict user/assistant alternation with merging
 * - Tool results become user-role `tool_result` blocks
 * - With thinking enabled, every replayed tool-use turn needs its signed
 *   thinking block (see `applyContinuityRule`)
 */

import {
  EncodingError,
  PartKind,
  ProviderType,
  Role,
  type FilePart,
  type GenerateOptions,
  type Message,
  type ThinkingBlock,
  type ToolDefinition,
} from "../../types/index.js";
import type { Logger } from "../../logger.js";
import { prepareInlineImage } from "../../media/index.js";
import {
  enumInstructions,
  resolveStructuredOutput,
  schemaInstructions,
  systemTexts,
} from "../shared.js";

// ---------------------------------------------------------------------------
// Anthropic native types (request body)
// ---------------------------------------------------------------------------

export type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean }
  | { type: "thinking"; thinking: string; signature: string };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicContentBlock[];
}

export interface AnthropicToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface AnthropicRequestBody {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string;
  temperature?: number;
  tools?: AnthropicToolDefinition[];
  thinking?: { type: "enabled"; budget_tokens: number };
  stream?: boolean;
}

export interface TranslatedRequest {
  body: AnthropicRequestBody;
  extraHeaders: Record<string, string>;
  prefill?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_THINKING_BUDGET = 10_000;
/** The API rejects any other temperature while thinking is enabled. */
export const THINKING_TEMPERATURE = 1;
export const INTERLEAVED_THINKING_BETA = "interleaved-thinking-2025-05-14";
export const EMPTY_TOOL_RESULT = "(no output)";

// ---------------------------------------------------------------------------
// Thinking continuity
// ---------------------------------------------------------------------------

function hasToolCalls(msg: Message): boolean {
  return msg.parts.some((part) => part.kind === PartKind.TOOL_CALL);
}

function usableThinking(msg: Message): ThinkingBlock | undefined {
  for (const part of msg.parts) {
    if (
      part.kind === PartKind.THINKING &&
      part.thinking.content !== "" &&
      part.thinking.signature !== ""
    ) {
      return part.thinking;
    }
  }
  return undefined;
}

/**
 * With thinking enabled, an assistant turn that called tools must open with
 * a signed thinking block. Turns that lack one are dropped together with the
 * tool results answering their calls. If no tool-calling turn has one, the
 * history cannot be sent at all.
 *
 * @throws {EncodingError} when every tool-calling agent turn lacks thinking.
 */
export function applyContinuityRule(
  messages: readonly Message[],
  logger?: Logger,
): Message[] {
  const toolTurns = messages.filter((msg) => msg.role === Role.AGENT && hasToolCalls(msg));
  const missing = new Set(toolTurns.filter((msg) => !usableThinking(msg)));

  if (missing.size === 0) return [...messages];
  if (missing.size === toolTurns.length) {
    throw new EncodingError(
      "Thinking is enabled but no tool-calling agent turn carries a signed thinking block",
      { provider: ProviderType.ANTHROPIC },
    );
  }

  const skippedIds = new Set<string>();
  for (const msg of missing) {
    for (const part of msg.parts) {
      if (part.kind === PartKind.TOOL_CALL) skippedIds.add(part.id);
    }
  }

  const kept: Message[] = [];
  for (const msg of messages) {
    if (missing.has(msg)) continue;
    const parts = msg.parts.filter(
      (part) => part.kind !== PartKind.TOOL_RESULT || !skippedIds.has(part.tool_call_id),
    );
    if (parts.length === 0) continue;
    kept.push(parts.length === msg.parts.length ? msg : { role: msg.role, parts });
  }

  logger?.warn("Omitting agent turns without thinking blocks", {
    provider: ProviderType.ANTHROPIC,
    omitted_turns: missing.size,
    omitted_tool_calls: skippedIds.size,
  });
  return kept;
}

// ---------------------------------------------------------------------------
// Message translation with alternation merging
// ---------------------------------------------------------------------------

function translateFile(part: FilePart, logger?: Logger): AnthropicContentBlock | undefined {
  if (part.uri !== undefined && part.data === undefined) {
    throw new EncodingError("Image URIs are not supported; send the image bytes instead", {
      provider: ProviderType.ANTHROPIC,
    });
  }
  const image = prepareInlineImage(part, ProviderType.ANTHROPIC, logger);
  if (!image) return undefined;
  return {
    type: "image",
    source: { type: "base64", media_type: image.media_type, data: image.data },
  };
}

function translateUserParts(msg: Message, logger?: Logger): AnthropicContentBlock[] {
  const blocks: AnthropicContentBlock[] = [];
  for (const part of msg.parts) {
    switch (part.kind) {
      case PartKind.TEXT:
        if (part.text !== "") blocks.push({ type: "text", text: part.text });
        break;
      case PartKind.FILE: {
        const block = translateFile(part, logger);
        if (block) blocks.push(block);
        break;
      }
      case PartKind.TOOL_RESULT: {
        if (part.tool_call_id === "") {
          logger?.warn("Skipping tool result without a tool call id", {
            provider: ProviderType.ANTHROPIC,
          });
          break;
        }
        const failed = part.error !== undefined && part.error !== "";
        const content = part.content || (failed ? part.error : "") || EMPTY_TOOL_RESULT;
        blocks.push({
          type: "tool_result",
          tool_use_id: part.tool_call_id,
          content,
          ...(failed ? { is_error: true } : {}),
        });
        break;
      }
      default:
        break;
    }
  }
  return blocks;
}

function translateAgentParts(msg: Message, thinkingEnabled: boolean): AnthropicContentBlock[] {
  const blocks: AnthropicContentBlock[] = [];
  const thinking = usableThinking(msg);
  if (thinkingEnabled && thinking) {
    blocks.push({ type: "thinking", thinking: thinking.content, signature: thinking.signature });
  }
  for (const part of msg.parts) {
    if (part.kind === PartKind.TEXT && part.text !== "") {
      blocks.push({ type: "text", text: part.text });
    }
  }
  for (const part of msg.parts) {
    if (part.kind === PartKind.TOOL_CALL) {
      blocks.push({ type: "tool_use", id: part.id, name: part.name, input: part.args });
    }
  }
  return blocks;
}

function pushMerged(
  result: AnthropicMessage[],
  role: AnthropicMessage["role"],
  blocks: AnthropicContentBlock[],
): void {
  if (blocks.length === 0) return;
  const last = result[result.length - 1];
  if (last && last.role === role) {
    last.content.push(...blocks);
  } else {
    result.push({ role, content: blocks });
  }
}

function translateMessages(
  messages: readonly Message[],
  thinkingEnabled: boolean,
  logger?: Logger,
): AnthropicMessage[] {
  const result: AnthropicMessage[] = [];
  for (const msg of messages) {
    if (msg.role === Role.SYSTEM) continue;
    if (msg.role === Role.AGENT) {
      pushMerged(result, "assistant", translateAgentParts(msg, thinkingEnabled));
    } else {
      pushMerged(result, "user", translateUserParts(msg, logger));
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: GenerateOptions,
  streaming: boolean,
  logger?: Logger,
): TranslatedRequest {
  const thinkingEnabled = options.thinking?.enabled === true;
  const structured = resolveStructuredOutput(options.structured_output, ProviderType.ANTHROPIC);
  const history = thinkingEnabled ? applyContinuityRule(messages, logger) : messages;

  const maxTokens = options.max_tokens ?? DEFAULT_MAX_TOKENS;
  const body: AnthropicRequestBody = {
    model: options.model,
    messages: translateMessages(history, thinkingEnabled, logger),
    max_tokens: maxTokens,
  };

  const system = systemTexts(messages);
  if (structured?.format === "json") {
    system.push(schemaInstructions(structured.schema ?? { type: "object" }));
  } else if (structured?.format === "enum") {
    system.push(enumInstructions(structured.values));
  }
  if (system.length > 0) {
    body.system = system.join("\n\n");
  }

  const extraHeaders: Record<string, string> = {};
  if (thinkingEnabled) {
    const budget = options.thinking?.budget_tokens ?? DEFAULT_THINKING_BUDGET;
    body.thinking = { type: "enabled", budget_tokens: Math.min(budget, maxTokens - 1) };
    body.temperature = THINKING_TEMPERATURE;
    extraHeaders["anthropic-beta"] = INTERLEAVED_THINKING_BETA;
  } else if (options.temperature !== undefined) {
    body.temperature = options.temperature;
  }

  if (tools.length > 0) {
    body.tools = tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.parameters,
    }));
  }

  let prefill: string | undefined;
  if (structured?.prefill) {
    if (thinkingEnabled) {
      logger?.warn("Ignoring prefill because thinking is enabled", {
        provider: ProviderType.ANTHROPIC,
      });
    } else {
      prefill = structured.prefill;
      pushMerged(body.messages, "assistant", [{ type: "text", text: prefill }]);
    }
  }

  if (streaming) {
    body.stream = true;
  }

  return { body, extraHeaders, prefill };
}
