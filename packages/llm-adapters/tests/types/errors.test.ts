import { describe, it, expect } from "vitest";
import {
  AbortError,
  ConfigurationError,
  EncodingError,
  NetworkError,
  ProviderError,
  RateLimitError,
  SDKError,
  StreamError,
  toSDKError,
} from "../../src/types/index.js";

describe("error hierarchy", () => {
  it("sets retryable per family", () => {
    expect(new EncodingError("x", { provider: "anthropic" }).retryable).toBe(false);
    expect(new RateLimitError("x", { provider: "openai" }).retryable).toBe(true);
    expect(new NetworkError("x").retryable).toBe(true);
    expect(new AbortError("x").retryable).toBe(false);
    expect(new ConfigurationError("x").retryable).toBe(false);
  });

  it("keeps vendor details on ProviderError", () => {
    const err = new RateLimitError("slow down", {
      provider: "openai",
      status_code: 429,
      retry_after: 3,
      raw: { error: "slow down" },
    });

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toBeInstanceOf(SDKError);
    expect(err.name).toBe("RateLimitError");
    expect(err).toMatchObject({ provider: "openai", status_code: 429, retry_after: 3 });
  });
});

describe("toSDKError", () => {
  it("passes SDK errors through", () => {
    const err = new AbortError("stop");
    expect(toSDKError(err)).toBe(err);
  });

  it("wraps other values in a StreamError", () => {
    const cause = new TypeError("bad");
    const wrapped = toSDKError(cause);

    expect(wrapped).toBeInstanceOf(StreamError);
    expect(wrapped.message).toBe("bad");
    expect(wrapped.cause).toBe(cause);
    expect(toSDKError("plain").message).toBe("plain");
  });
});
