/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, PartKind, StreamEventType, ProviderType } from "./enums.js";

// Message types
export type {
  ThinkingBlock,
  TextPart,
  FilePart,
  ToolCallPart,
  ToolResultPart,
  ThinkingPart,
  Part,
  Message,
} from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAgentMessage,
  createToolResultMessage,
  getMessageText,
  getMessageToolCalls,
  getMessageToolResults,
  getMessageThinking,
} from "./message.js";

// Tool types
export type { ToolCall, ToolDefinition } from "./tool.js";

// Request types
export type {
  GenerateOptions,
  StructuredOutput,
  ThinkingOptions,
} from "./request.js";

// Response types
export type { CompletionResult } from "./response.js";

// Stream types
export type {
  StreamEvent,
  TextEvent,
  ThinkingEvent,
  ThinkingCompleteEvent,
  ToolCallEvent,
  DoneEvent,
  ErrorEvent,
  TerminalEvent,
} from "./stream.js";
export { StreamCollector, collectStream, isTerminalEvent } from "./stream.js";

// Error types
export type { ProviderErrorOptions } from "./errors.js";
export {
  SDKError,
  EncodingError,
  DecodeError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  ContentFilterError,
  ContextLengthError,
  RequestTimeoutError,
  AbortError,
  NetworkError,
  StreamError,
  ConfigurationError,
  toSDKError,
} from "./errors.js";
