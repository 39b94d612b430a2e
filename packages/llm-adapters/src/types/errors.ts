/**
 * Error hierarchy for the adapters.
 *
 * Everything thrown or carried in an ErrorEvent inherits from SDKError.
 * Four families matter to callers:
 *
 * - EncodingError: the conversation cannot be expressed for the vendor.
 * - ProviderError and subclasses: the vendor answered with an error payload.
 * - NetworkError / RequestTimeoutError / AbortError / StreamError: the
 *   transport failed or the stream was cut.
 * - DecodeError: the vendor answered with something that is not the
 *   document it must be.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

export class SDKError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// Encoding / decoding
// ---------------------------------------------------------------------------

/** The canonical request cannot be represented for the target vendor. */
export class EncodingError extends SDKError {
  /** Adapter that rejected the request. */
  readonly provider: string;

  constructor(message: string, options: { provider: string; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "EncodingError";
    this.provider = options.provider;
  }
}

/** A vendor response body could not be parsed. */
export class DecodeError extends SDKError {
  readonly provider: string;

  constructor(message: string, options: { provider: string; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "DecodeError";
    this.provider = options.provider;
  }
}

// ---------------------------------------------------------------------------
// ProviderError: errors reported by the vendor API
// ---------------------------------------------------------------------------

export interface ProviderErrorOptions {
  provider: string;
  status_code?: number;
  /** Vendor-specific error code, e.g. "unsupported_value". */
  error_code?: string;
  /** Seconds to wait before retrying. */
  retry_after?: number;
  /** Raw error response body from the vendor. */
  raw?: Record<string, unknown>;
  cause?: unknown;
}

export class ProviderError extends SDKError {
  readonly provider: string;
  readonly status_code?: number;
  readonly error_code?: string;
  readonly retry_after?: number;
  readonly raw?: Record<string, unknown>;

  constructor(
    message: string,
    options: ProviderErrorOptions & { retryable?: boolean },
  ) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
  }
}

// ---------------------------------------------------------------------------
// ProviderError subclasses: non-retryable
// ---------------------------------------------------------------------------

/** 401: Invalid API key, expired token. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions. */
export class AccessDeniedError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Model or endpoint not found. */
export class NotFoundError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters, invalid schema. */
export class InvalidRequestError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Response blocked by a safety filter. */
export class ContentFilterError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContentFilterError";
  }
}

/** Input plus output exceeds the context window. */
export class ContextLengthError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContextLengthError";
  }
}

// ---------------------------------------------------------------------------
// ProviderError subclasses: retryable
// ---------------------------------------------------------------------------

/** 429: Rate limit exceeded. */
export class RateLimitError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Vendor internal error. */
export class ServerError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

// ---------------------------------------------------------------------------
// Transport errors
// ---------------------------------------------------------------------------

/** Request or stream timed out. Retryable. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** Request cancelled via abort signal. Not retryable. */
export class AbortError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "AbortError";
  }
}

/** Network-level failure. Retryable. */
export class NetworkError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "NetworkError";
  }
}

/** The stream broke off or carried an in-band error payload. */
export class StreamError extends SDKError {
  readonly provider?: string;
  readonly raw?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { cause?: unknown; provider?: string; raw?: Record<string, unknown> },
  ) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "StreamError";
    this.provider = options?.provider;
    this.raw = options?.raw;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Invalid settings or an unknown provider name. Not retryable. */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** Wrap anything thrown into an SDKError, keeping SDKErrors as they are. */
export function toSDKError(err: unknown): SDKError {
  if (err instanceof SDKError) return err;
  if (err instanceof Error) {
    return new StreamError(err.message, { cause: err });
  }
  return new StreamError(String(err));
}
