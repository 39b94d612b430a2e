/**
 * Translate a canonical conversation into OpenAI Responses API format.
 *
 * - System messages -> `instructions` parameter
 * - Messages go in a flat `input` array of typed items (NOT `messages`)
 * - Tool calls/results are top-level `function_call` / `function_call_output`
 *   items
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
import { prepareImageUri, prepareInlineImage } from "../../media/index.js";
import {
  enumSchema,
  resolveStructuredOutput,
  systemTexts,
  toolResultText,
} from "../shared.js";

// ---------------------------------------------------------------------------
// OpenAI Responses API native types
// ---------------------------------------------------------------------------

export type OpenAIContentBlock =
  | { type: "input_text"; text: string }
  | { type: "output_text"; text: string }
  | { type: "input_image"; image_url: string };

export type OpenAIInputItem =
  | { type: "message"; role: "user" | "assistant"; content: OpenAIContentBlock[] }
  | { type: "function_call"; call_id: string; name: string; arguments: string }
  | { type: "function_call_output"; call_id: string; output: string };

export interface OpenAIToolDefinition {
  type: "function";
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  strict: boolean;
}

export type ReasoningEffort = "low" | "medium" | "high";

export interface OpenAIReasoningConfig {
  effort: ReasoningEffort;
  summary?: "auto";
}

export interface OpenAITextFormat {
  type: "json_schema";
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

export interface OpenAIRequestBody {
  model: string;
  input: OpenAIInputItem[];
  instructions?: string;
  temperature?: number;
  max_output_tokens?: number;
  tools?: OpenAIToolDefinition[];
  tool_choice?: "auto";
  reasoning?: OpenAIReasoningConfig;
  include?: string[];
  text?: { format: OpenAITextFormat };
  stream?: boolean;
}

// ---------------------------------------------------------------------------
// Reasoning models
// ---------------------------------------------------------------------------

const REASONING_MODEL_FAMILIES = ["o1", "o3", "o4", "gpt-5"] as const;

export const REASONING_EFFORT_LOW_THRESHOLD = 1024;
export const REASONING_EFFORT_MEDIUM_THRESHOLD = 8192;

/** `o1`, `o3`, `o4`, `gpt-5`, exactly or followed by `-`. */
export function isReasoningModel(model: string): boolean {
  const name = model.toLowerCase();
  return REASONING_MODEL_FAMILIES.some(
    (family) => name === family || name.startsWith(`${family}-`),
  );
}

export function effortForBudget(budget: number | undefined): ReasoningEffort {
  if (budget === undefined) return "medium";
  if (budget <= REASONING_EFFORT_LOW_THRESHOLD) return "low";
  if (budget <= REASONING_EFFORT_MEDIUM_THRESHOLD) return "medium";
  return "high";
}

// ---------------------------------------------------------------------------
// Input items
// ---------------------------------------------------------------------------

function translateUserMessage(
  msg: Message,
  items: OpenAIInputItem[],
  logger?: Logger,
): void {
  let content: OpenAIContentBlock[] = [];
  const flush = (): void => {
    if (content.length > 0) {
      items.push({ type: "message", role: "user", content });
      content = [];
    }
  };

  for (const part of msg.parts) {
    switch (part.kind) {
      case PartKind.TEXT:
        content.push({ type: "input_text", text: part.text });
        break;
      case PartKind.FILE: {
        if (part.data) {
          const image = prepareInlineImage(part, ProviderType.OPENAI, logger);
          if (image) {
            content.push({
              type: "input_image",
              image_url: `data:${image.media_type};base64,${image.data}`,
            });
          }
        } else {
          const ref = prepareImageUri(part, ProviderType.OPENAI, logger);
          if (ref) content.push({ type: "input_image", image_url: ref.uri });
        }
        break;
      }
      case PartKind.TOOL_RESULT:
        flush();
        items.push({
          type: "function_call_output",
          call_id: part.tool_call_id,
          output: toolResultText(part.content, part.error),
        });
        break;
      default:
        break;
    }
  }
  flush();
}

function translateAgentMessage(msg: Message, items: OpenAIInputItem[]): void {
  const text = msg.parts
    .map((part) => (part.kind === PartKind.TEXT ? part.text : ""))
    .join("");
  if (text !== "") {
    items.push({ type: "message", role: "assistant", content: [{ type: "output_text", text }] });
  }
  for (const part of msg.parts) {
    if (part.kind === PartKind.TOOL_CALL) {
      items.push({
        type: "function_call",
        call_id: part.id,
        name: part.name,
        arguments: JSON.stringify(part.args),
      });
    }
  }
}

export function translateInput(messages: readonly Message[], logger?: Logger): OpenAIInputItem[] {
  const items: OpenAIInputItem[] = [];
  for (const msg of messages) {
    if (msg.role === Role.SYSTEM) continue;
    if (msg.role === Role.AGENT) {
      translateAgentMessage(msg, items);
    } else {
      translateUserMessage(msg, items, logger);
    }
  }
  // The API needs at least one input item.
  if (items.length === 0) {
    items.push({ type: "message", role: "user", content: [{ type: "input_text", text: "" }] });
  }
  return items;
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
): OpenAIRequestBody {
  const structured = resolveStructuredOutput(options.structured_output, ProviderType.OPENAI);

  const body: OpenAIRequestBody = {
    model: options.model,
    input: translateInput(messages, logger),
  };

  const instructions = systemTexts(messages);
  if (instructions.length > 0) {
    body.instructions = instructions.join("\n\n");
  }

  if (options.max_tokens !== undefined) {
    body.max_output_tokens = options.max_tokens;
  }

  if (isReasoningModel(options.model)) {
    const thinkingEnabled = options.thinking?.enabled === true;
    body.reasoning = {
      effort: effortForBudget(thinkingEnabled ? options.thinking?.budget_tokens : undefined),
      ...(thinkingEnabled ? { summary: "auto" as const } : {}),
    };
    body.include = ["reasoning.encrypted_content"];
  } else if (options.temperature !== undefined) {
    body.temperature = options.temperature;
  }

  if (tools.length > 0) {
    body.tools = tools.map((tool) => ({
      type: "function" as const,
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
      strict: false,
    }));
    body.tool_choice = "auto";
  }

  if (structured) {
    const schema =
      structured.format === "enum"
        ? enumSchema(structured.values)
        : (structured.schema ?? { type: "object" });
    body.text = { format: { type: "json_schema", name: "response", strict: true, schema } };
  }

  if (streaming) {
    body.stream = true;
  }

  return body;
}

/** A copy of `body` whose reasoning config no longer asks for a summary. */
export function withoutReasoningSummary(body: OpenAIRequestBody): OpenAIRequestBody {
  if (!body.reasoning) return { ...body };
  return { ...body, reasoning: { effort: body.reasoning.effort } };
}
