/**
 * Translate a canonical conversation into Gemini API format.
 *
 * - System messages -> `systemInstruction` (a user-role content; Gemini has
 *   no system turn)
 * - USER -> "user" role, AGENT -> "model" role
 * - Tool calls/results are `functionCall` / `functionResponse` parts;
 *   results are matched by function name, looked up from the call id
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
  ToolNameMap,
  enumSchema,
  resolveStructuredOutput,
  systemTexts,
  type ResolvedStructuredOutput,
} from "../shared.js";

// ---------------------------------------------------------------------------
// Gemini native types (request body)
// ---------------------------------------------------------------------------

export type GeminiPart =
  | { text: string }
  | { fileData: { mimeType: string; fileUri: string } }
  | { inlineData: { mimeType: string; data: string } }
  | {
      functionCall: { name: string; args: Record<string, unknown> };
      thoughtSignature?: string;
    }
  | { functionResponse: { name: string; response: Record<string, unknown> } };

export interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

export interface GeminiToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface GeminiGenerationConfig {
  maxOutputTokens?: number;
  temperature?: number;
  thinkingConfig?: { includeThoughts: boolean; thinkingBudget?: number };
  responseMimeType?: "application/json" | "text/x.enum";
  responseSchema?: Record<string, unknown>;
}

export interface GeminiRequestBody {
  contents: GeminiContent[];
  systemInstruction?: { role: "user"; parts: GeminiPart[] };
  tools?: Array<{ functionDeclarations: GeminiToolDeclaration[] }>;
  generationConfig: GeminiGenerationConfig;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateUserParts(msg: Message, names: ToolNameMap, logger?: Logger): GeminiPart[] {
  const parts: GeminiPart[] = [];
  for (const part of msg.parts) {
    switch (part.kind) {
      case PartKind.TEXT:
        if (part.text !== "") parts.push({ text: part.text });
        break;
      case PartKind.FILE: {
        if (part.data) {
          const image = prepareInlineImage(part, ProviderType.GEMINI, logger);
          if (image) parts.push({ inlineData: { mimeType: image.media_type, data: image.data } });
        } else {
          const ref = prepareImageUri(part, ProviderType.GEMINI, logger);
          if (ref) parts.push({ fileData: { mimeType: ref.media_type, fileUri: ref.uri } });
        }
        break;
      }
      case PartKind.TOOL_RESULT:
        parts.push({
          functionResponse: {
            name: names.nameFor(part.tool_call_id),
            response: part.error
              ? { error: part.error, content: part.content }
              : { content: part.content },
          },
        });
        break;
      default:
        break;
    }
  }
  return parts;
}

function translateAgentParts(msg: Message, names: ToolNameMap): GeminiPart[] {
  const parts: GeminiPart[] = [];
  const text = msg.parts.map((part) => (part.kind === PartKind.TEXT ? part.text : "")).join("");
  if (text !== "") parts.push({ text });

  // The signature of the turn's reasoning rides on its first function call.
  let signature: string | undefined;
  for (const part of msg.parts) {
    if (part.kind === PartKind.THINKING && part.thinking.signature !== "") {
      signature = part.thinking.signature;
      break;
    }
  }

  for (const part of msg.parts) {
    if (part.kind !== PartKind.TOOL_CALL) continue;
    names.register(part.id, part.name);
    parts.push({
      functionCall: { name: part.name, args: part.args },
      ...(signature !== undefined ? { thoughtSignature: signature } : {}),
    });
    signature = undefined;
  }
  return parts;
}

export function translateContents(messages: readonly Message[], logger?: Logger): GeminiContent[] {
  const names = new ToolNameMap();
  const contents: GeminiContent[] = [];
  for (const msg of messages) {
    if (msg.role === Role.SYSTEM) continue;
    const agent = msg.role === Role.AGENT;
    const parts = agent ? translateAgentParts(msg, names) : translateUserParts(msg, names, logger);
    if (parts.length > 0) {
      contents.push({ role: agent ? "model" : "user", parts });
    }
  }
  return contents;
}

// ---------------------------------------------------------------------------
// Generation config
// ---------------------------------------------------------------------------

function responseFormat(structured: ResolvedStructuredOutput): GeminiGenerationConfig {
  if (structured.format === "enum") {
    return { responseMimeType: "text/x.enum", responseSchema: enumSchema(structured.values) };
  }
  if (!structured.schema) {
    return { responseMimeType: "application/json" };
  }
  const ordering = structured.property_ordering ?? [];
  return {
    responseMimeType: "application/json",
    responseSchema:
      ordering.length > 0
        ? { ...structured.schema, propertyOrdering: [...ordering] }
        : structured.schema,
  };
}

function generationConfig(options: GenerateOptions): GeminiGenerationConfig {
  const config: GeminiGenerationConfig = {};
  if (options.max_tokens !== undefined) {
    config.maxOutputTokens = options.max_tokens;
  }
  // Zero means "vendor default" here.
  if (options.temperature !== undefined && options.temperature > 0) {
    config.temperature = options.temperature;
  }
  if (options.thinking?.enabled) {
    config.thinkingConfig = {
      includeThoughts: true,
      ...(options.thinking.budget_tokens !== undefined
        ? { thinkingBudget: options.thinking.budget_tokens }
        : {}),
    };
  }
  const structured = resolveStructuredOutput(options.structured_output, ProviderType.GEMINI);
  return structured ? { ...config, ...responseFormat(structured) } : config;
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: GenerateOptions,
  logger?: Logger,
): GeminiRequestBody {
  const body: GeminiRequestBody = {
    contents: translateContents(messages, logger),
    generationConfig: generationConfig(options),
  };

  const system = systemTexts(messages);
  if (system.length > 0) {
    body.systemInstruction = { role: "user", parts: system.map((text) => ({ text })) };
  }

  if (tools.length > 0) {
    body.tools = [
      {
        functionDeclarations: tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        })),
      },
    ];
  }

  return body;
}
