/**
 * Client: the registry of named adapters.
 *
 * Routes calls to the adapter registered under a name, fills per-call
 * options from that provider's settings, logs every call and reports it to
 * an optional CallObserver.
 */

import {
  ConfigurationError,
  StreamEventType,
  toSDKError,
  type CompletionResult,
  type GenerateOptions,
  type Message,
  type SDKError,
  type StreamEvent,
  type ThinkingOptions,
  type ToolDefinition,
} from "./types/index.js";
import type { ExecuteOptions, ProviderAdapter } from "./providers/adapter.js";
import { createAdapter } from "./providers/index.js";
import {
  configFromEnv,
  parseClientConfig,
  type ProviderSettings,
} from "./config.js";
import { createLogger, defaultLogger, type Logger } from "./logger.js";
import type { Transport } from "./utils/http.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the observer learns about each call. */
export interface CallInfo {
  /** Registered name the call was routed to. */
  name: string;
  provider: string;
  model: string;
  streaming: boolean;
  latency_ms: number;
}

/** Receives one notification per finished call. */
export interface CallObserver {
  onComplete?(info: CallInfo & { tokens_used: number }): void;
  onError?(info: CallInfo, error: SDKError): void;
}

/** Per-call options. Anything left out comes from the provider's settings. */
export type CallOptions = Partial<GenerateOptions> & ExecuteOptions;

/** Option defaults held per registered name. */
export interface CallDefaults {
  model?: string;
  max_tokens?: number;
  temperature?: number;
  thinking?: ThinkingOptions;
}

export interface ClientOptions {
  /** Name used when a call does not name a provider. */
  defaultProvider?: string;
  logger?: Logger;
  observer?: CallObserver;
}

export interface ClientDeps {
  logger?: Logger;
  /** Shared by every adapter built from config. */
  transport?: Transport;
  observer?: CallObserver;
}

interface Entry {
  adapter: ProviderAdapter;
  defaults: CallDefaults;
}

/** Per-call defaults carried by a provider's settings. */
export function defaultsFromSettings(settings: ProviderSettings): CallDefaults {
  return {
    ...(settings.model !== undefined ? { model: settings.model } : {}),
    ...(settings.maxTokens !== undefined ? { max_tokens: settings.maxTokens } : {}),
    ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
    ...(settings.thinking
      ? {
          thinking: {
            enabled: settings.thinking.enabled,
            ...(settings.thinking.budgetTokens !== undefined
              ? { budget_tokens: settings.thinking.budgetTokens }
              : {}),
          },
        }
      : {}),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class Client {
  private readonly entries = new Map<string, Entry>();
  private readonly defaultProvider: string | undefined;
  private readonly logger: Logger;
  private readonly observer: CallObserver | undefined;

  constructor(options: ClientOptions = {}) {
    this.defaultProvider = options.defaultProvider;
    this.logger = options.logger ?? defaultLogger();
    this.observer = options.observer;
  }

  // -----------------------------------------------------------------------
  // Static factories
  // -----------------------------------------------------------------------

  /**
   * Build a Client from raw config, validated by `parseClientConfig()`.
   *
   * @throws {ConfigurationError} when the config is invalid.
   */
  static fromConfig(raw: unknown, deps: ClientDeps = {}): Client {
    const config = parseClientConfig(raw);
    const logger = deps.logger ?? createLogger({ level: config.logLevel });
    const client = new Client({
      defaultProvider: config.defaultProvider,
      logger,
      observer: deps.observer,
    });
    for (const [name, settings] of Object.entries(config.providers)) {
      const adapter = createAdapter(settings, { logger, transport: deps.transport });
      client.register(name, adapter, defaultsFromSettings(settings));
    }
    return client;
  }

  /**
   * Build a Client from environment variables. See `configFromEnv()` for
   * the variables read.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    deps: ClientDeps = {},
  ): Client {
    return Client.fromConfig(configFromEnv(env), deps);
  }

  // -----------------------------------------------------------------------
  // Registry
  // -----------------------------------------------------------------------

  /** Register (or replace) an adapter under `name`. */
  register(name: string, adapter: ProviderAdapter, defaults: CallDefaults = {}): this {
    this.entries.set(name, { adapter, defaults });
    return this;
  }

  /** Registered names, in registration order. */
  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * The adapter registered under `name`, or under the default provider.
   *
   * @throws {ConfigurationError} for an unknown name.
   */
  get(name?: string): ProviderAdapter {
    return this.resolve(name).entry.adapter;
  }

  // -----------------------------------------------------------------------
  // Calls
  // -----------------------------------------------------------------------

  async complete(
    name: string | undefined,
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: CallOptions = {},
  ): Promise<CompletionResult> {
    const { name: resolved, entry } = this.resolve(name);
    const generate = this.generateOptions(resolved, entry, options);
    const start = Date.now();
    const info = (): CallInfo => ({
      name: resolved,
      provider: entry.adapter.name,
      model: generate.model,
      streaming: false,
      latency_ms: Date.now() - start,
    });

    try {
      const result = await entry.adapter.complete(messages, tools, generate, {
        signal: options.signal,
      });
      this.finished(info(), result.tokens_used);
      return result;
    } catch (err: unknown) {
      this.failed(info(), toSDKError(err));
      throw err;
    }
  }

  /**
   * Stream a call. Routing and option errors throw; everything after that
   * arrives as the stream's terminal event.
   */
  stream(
    name: string | undefined,
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: CallOptions = {},
  ): AsyncIterableIterator<StreamEvent> {
    const { name: resolved, entry } = this.resolve(name);
    const generate = this.generateOptions(resolved, entry, options);
    const start = Date.now();
    const info = (): CallInfo => ({
      name: resolved,
      provider: entry.adapter.name,
      model: generate.model,
      streaming: true,
      latency_ms: Date.now() - start,
    });

    const events = entry.adapter.stream(messages, tools, generate, { signal: options.signal });
    return this.observe(events, info);
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private resolve(name: string | undefined): { name: string; entry: Entry } {
    const target = name ?? this.defaultProvider;
    if (target === undefined) {
      throw new ConfigurationError(
        "No provider named and no default provider configured",
      );
    }
    const entry = this.entries.get(target);
    if (!entry) {
      throw new ConfigurationError(`Provider "${target}" is not registered`);
    }
    return { name: target, entry };
  }

  private generateOptions(name: string, entry: Entry, options: CallOptions): GenerateOptions {
    const { defaults } = entry;
    const model = options.model ?? defaults.model;
    if (model === undefined) {
      throw new ConfigurationError(`No model given for provider "${name}" and none configured`);
    }
    const maxTokens = options.max_tokens ?? defaults.max_tokens;
    const temperature = options.temperature ?? defaults.temperature;
    const thinking = options.thinking ?? defaults.thinking;
    return {
      model,
      ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
      ...(thinking !== undefined ? { thinking } : {}),
      ...(options.structured_output !== undefined
        ? { structured_output: options.structured_output }
        : {}),
    };
  }

  /** Report the terminal event before handing it to the consumer. */
  private async *observe(
    events: AsyncIterableIterator<StreamEvent>,
    info: () => CallInfo,
  ): AsyncIterableIterator<StreamEvent> {
    for await (const event of events) {
      if (event.type === StreamEventType.DONE) {
        this.finished(info(), event.tokens_used);
      } else if (event.type === StreamEventType.ERROR) {
        this.failed(info(), event.error);
      }
      yield event;
    }
  }

  private finished(info: CallInfo, tokensUsed: number): void {
    this.logger.debug("Call completed", { ...info, tokens_used: tokensUsed });
    this.notify(() => this.observer?.onComplete?.({ ...info, tokens_used: tokensUsed }));
  }

  private failed(info: CallInfo, error: SDKError): void {
    this.logger.debug("Call failed", { ...info, error: error.name });
    this.notify(() => this.observer?.onError?.(info, error));
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (err: unknown) {
      this.logger.error("Call observer threw", err);
    }
  }
}
