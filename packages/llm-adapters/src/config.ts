/**
 * Adapter settings.
 *
 * Settings are plain objects validated by zod. Parsing is the single
 * default-filling step: whatever a caller leaves out gets the documented
 * default here, and nothing reads process-wide state except
 * `configFromEnv()`, which only builds raw input for `parseClientConfig()`.
 */

import { z } from "zod";
import { ConfigurationError, ProviderType } from "./types/index.js";
import { parseLogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_BASE_URLS = {
  [ProviderType.ANTHROPIC]: "https://api.anthropic.com",
  [ProviderType.OPENAI]: "https://api.openai.com/v1",
  [ProviderType.GEMINI]: "https://generativelanguage.googleapis.com",
  [ProviderType.OLLAMA]: "http://localhost:11434",
} as const satisfies Record<ProviderType, string>;

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_RETRIES = 2;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ThinkingSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  budgetTokens: z.number().int().positive().optional(),
});

const commonSettings = {
  /** Model used when a call does not name one. */
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  thinking: ThinkingSettingsSchema.optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  /** Bound on buffered stream events per call. */
  queueCapacity: z.number().int().positive().default(64),
  headers: z.record(z.string()).default({}),
};

export const AnthropicSettingsSchema = z.object({
  type: z.literal(ProviderType.ANTHROPIC),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URLS.anthropic),
  ...commonSettings,
});

export const OpenAISettingsSchema = z.object({
  type: z.literal(ProviderType.OPENAI),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URLS.openai),
  ...commonSettings,
});

export const GeminiSettingsSchema = z.object({
  type: z.literal(ProviderType.GEMINI),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URLS.gemini),
  ...commonSettings,
});

export const OllamaSettingsSchema = z.object({
  type: z.literal(ProviderType.OLLAMA),
  /** Only needed behind an authenticating proxy. */
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URLS.ollama),
  ...commonSettings,
});

export const ProviderSettingsSchema = z.discriminatedUnion("type", [
  AnthropicSettingsSchema,
  OpenAISettingsSchema,
  GeminiSettingsSchema,
  OllamaSettingsSchema,
]);

export const ClientConfigSchema = z.object({
  /** Name used when a call does not name a provider. */
  defaultProvider: z.string().optional(),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  providers: z.record(ProviderSettingsSchema).default({}),
});

export type ThinkingSettings = z.infer<typeof ThinkingSettingsSchema>;
export type AnthropicSettings = z.infer<typeof AnthropicSettingsSchema>;
export type OpenAISettings = z.infer<typeof OpenAISettingsSchema>;
export type GeminiSettings = z.infer<typeof GeminiSettingsSchema>;
export type OllamaSettings = z.infer<typeof OllamaSettingsSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type ProviderSettingsInput = z.input<typeof ProviderSettingsSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validate and fill defaults. Throws ConfigurationError on invalid input. */
export function parseClientConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid client config: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  const config = result.data;
  if (config.defaultProvider !== undefined && !(config.defaultProvider in config.providers)) {
    throw new ConfigurationError(
      `Default provider "${config.defaultProvider}" is not configured`,
    );
  }
  return config;
}

/** Validate and fill defaults for one provider. */
export function parseProviderSettings(raw: unknown): ProviderSettings {
  const result = ProviderSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid provider settings: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/**
 * Build raw client config from environment variables.
 *
 * Registers a provider for each key present: `ANTHROPIC_API_KEY`,
 * `OPENAI_API_KEY`, `GEMINI_API_KEY` (or `GOOGLE_API_KEY`), and `OLLAMA_HOST`
 * for a local server. `*_BASE_URL` variables override endpoints. The first
 * registered provider becomes the default.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): ClientConfigInput {
  const providers: Record<string, ProviderSettingsInput> = {};

  const anthropicKey = env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    providers.anthropic = {
      type: ProviderType.ANTHROPIC,
      apiKey: anthropicKey,
      ...(env.ANTHROPIC_BASE_URL ? { baseUrl: env.ANTHROPIC_BASE_URL } : {}),
    };
  }
  const openaiKey = env.OPENAI_API_KEY;
  if (openaiKey) {
    providers.openai = {
      type: ProviderType.OPENAI,
      apiKey: openaiKey,
      ...(env.OPENAI_BASE_URL ? { baseUrl: env.OPENAI_BASE_URL } : {}),
    };
  }
  const geminiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY;
  if (geminiKey) {
    providers.gemini = {
      type: ProviderType.GEMINI,
      apiKey: geminiKey,
      ...(env.GEMINI_BASE_URL ? { baseUrl: env.GEMINI_BASE_URL } : {}),
    };
  }
  const ollamaHost = env.OLLAMA_HOST;
  if (ollamaHost) {
    providers.ollama = { type: ProviderType.OLLAMA, baseUrl: ollamaHost };
  }

  return {
    providers,
    defaultProvider: Object.keys(providers)[0],
    ...(env.LLM_LOG_LEVEL ? { logLevel: parseLogLevel(env.LLM_LOG_LEVEL) } : {}),
  };
}
