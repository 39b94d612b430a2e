export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export provider utilities
export * from "./utils/index.js";

// Media normalizer
export {
  DEFAULT_MEDIA_TYPE,
  IMAGE_SIZE_LIMITS,
  detectMediaType,
  fits,
  isImageMediaType,
  prepareImageUri,
  prepareInlineImage,
  toBase64,
} from "./media/index.js";
export type { InlineImage } from "./media/index.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Settings
export {
  DEFAULT_BASE_URLS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
  AnthropicSettingsSchema,
  ClientConfigSchema,
  GeminiSettingsSchema,
  OllamaSettingsSchema,
  OpenAISettingsSchema,
  ProviderSettingsSchema,
  configFromEnv,
  parseClientConfig,
  parseProviderSettings,
} from "./config.js";
export type {
  AnthropicSettings,
  ClientConfig,
  ClientConfigInput,
  GeminiSettings,
  OllamaSettings,
  OpenAISettings,
  ProviderSettings,
  ProviderSettingsInput,
  ThinkingSettings,
} from "./config.js";

// Logging
export { createLogger, defaultLogger, parseLogLevel, silentLogger } from "./logger.js";
export type { CreateLoggerOptions, LogContext, LogLevel, Logger } from "./logger.js";

// Re-export Client class and related types
export { Client, defaultsFromSettings } from "./client.js";
export type {
  CallDefaults,
  CallInfo,
  CallObserver,
  CallOptions,
  ClientDeps,
  ClientOptions,
} from "./client.js";
