/**
 * Translate a canonical conversation into Ollama `/api/chat` format.
 *
 * - System messages -> user messages prefixed "System: "
 * - Tool results -> `tool` messages labelled by function name, looked up
 *   from the call id recorded while encoding the agent turn that made it
 * - Images -> base64 strings in `images`
 */

import {
  PartKind,
  ProviderType,
  Role,
  type GenerateOptions,
  type Message,
  type ToolDefinition,
} from "../../types/index.js";
import type { Logger } from "../../logger.js";
import { prepareInlineImage } from "../../media/index.js";
import {
  ToolNameMap,
  enumSchema,
  resolveStructuredOutput,
  toolResultText,
} from "../shared.js";

// ---------------------------------------------------------------------------
// Ollama native types (request body)
// ---------------------------------------------------------------------------

export interface OllamaToolCall {
  type: "function";
  function: { index: number; name: string; arguments: Record<string, unknown> };
}

export interface OllamaMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  thinking?: string;
  images?: string[];
  tool_calls?: OllamaToolCall[];
  tool_name?: string;
}

export interface OllamaToolDefinition {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface OllamaRequestBody {
  model: string;
  messages: OllamaMessage[];
  stream: boolean;
  think?: boolean;
  format?: "json" | Record<string, unknown>;
  options?: { temperature?: number; num_predict?: number };
  tools?: OllamaToolDefinition[];
}

// ---------------------------------------------------------------------------
// Thinking-capable models
// ---------------------------------------------------------------------------

const THINKING_MODEL_PATTERNS = ["qwen3", "deepseek-r1", "deepseek-v3", "gpt-oss"] as const;
const NON_THINKING_MODEL_PATTERNS = ["qwen3-coder", "qwen2-coder"] as const;

/** Name-based guess; exclusions are checked first. */
export function isThinkingCapableModel(model: string): boolean {
  const name = model.toLowerCase();
  if (NON_THINKING_MODEL_PATTERNS.some((pattern) => name.includes(pattern))) return false;
  return THINKING_MODEL_PATTERNS.some((pattern) => name.includes(pattern));
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function messageText(msg: Message): string {
  return msg.parts.map((part) => (part.kind === PartKind.TEXT ? part.text : "")).join("");
}

function translateUserMessage(
  msg: Message,
  names: ToolNameMap,
  out: OllamaMessage[],
  logger?: Logger,
): void {
  for (const part of msg.parts) {
    if (part.kind !== PartKind.TOOL_RESULT) continue;
    out.push({
      role: "tool",
      content: toolResultText(part.content, part.error),
      tool_name: names.nameFor(part.tool_call_id),
    });
  }

  const images: string[] = [];
  for (const part of msg.parts) {
    if (part.kind !== PartKind.FILE) continue;
    if (!part.data) {
      logger?.warn("Dropping image URI; only inline images are supported", {
        provider: ProviderType.OLLAMA,
      });
      continue;
    }
    const image = prepareInlineImage(part, ProviderType.OLLAMA, logger);
    if (image) images.push(image.data);
  }

  const text = messageText(msg);
  if (text !== "" || images.length > 0) {
    out.push({ role: "user", content: text, ...(images.length > 0 ? { images } : {}) });
  }
}

function translateAgentMessage(msg: Message, names: ToolNameMap, out: OllamaMessage[]): void {
  const toolCalls: OllamaToolCall[] = [];
  let thinking: string | undefined;
  for (const part of msg.parts) {
    if (part.kind === PartKind.TOOL_CALL) {
      names.register(part.id, part.name);
      toolCalls.push({
        type: "function",
        function: { index: toolCalls.length, name: part.name, arguments: part.args },
      });
    } else if (part.kind === PartKind.THINKING && thinking === undefined) {
      thinking = part.thinking.content;
    }
  }

  out.push({
    role: "assistant",
    content: messageText(msg),
    ...(thinking ? { thinking } : {}),
    ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
  });
}

export function translateMessages(messages: readonly Message[], logger?: Logger): OllamaMessage[] {
  const names = new ToolNameMap();
  const out: OllamaMessage[] = [];
  for (const msg of messages) {
    switch (msg.role) {
      case Role.SYSTEM: {
        const text = messageText(msg);
        if (text !== "") out.push({ role: "user", content: `System: ${text}` });
        break;
      }
      case Role.AGENT:
        translateAgentMessage(msg, names, out);
        break;
      default:
        translateUserMessage(msg, names, out, logger);
        break;
    }
  }
  return out;
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
): OllamaRequestBody {
  const body: OllamaRequestBody = {
    model: options.model,
    messages: translateMessages(messages, logger),
    stream: streaming,
  };

  const modelOptions: NonNullable<OllamaRequestBody["options"]> = {};
  if (options.temperature !== undefined && options.temperature > 0) {
    modelOptions.temperature = options.temperature;
  }
  if (options.max_tokens !== undefined) {
    modelOptions.num_predict = options.max_tokens;
  }
  if (Object.keys(modelOptions).length > 0) {
    body.options = modelOptions;
  }

  if (isThinkingCapableModel(options.model) && options.thinking?.enabled !== false) {
    body.think = true;
  }

  const structured = resolveStructuredOutput(options.structured_output, ProviderType.OLLAMA);
  if (structured?.format === "enum") {
    body.format = enumSchema(structured.values);
  } else if (structured) {
    body.format = structured.schema ?? "json";
  }

  if (tools.length > 0) {
    body.tools = tools.map((tool) => ({
      type: "function" as const,
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
  }

  return body;
}
