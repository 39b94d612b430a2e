import { describe, it, expect } from "vitest";
import { mapHttpError, parseRetryAfter } from "../../src/utils/error-mapping.js";
import {
  AccessDeniedError,
  AuthenticationError,
  ContextLengthError,
  InvalidRequestError,
  NotFoundError,
  ProviderError,
  RateLimitError,
  RequestTimeoutError,
  ServerError,
} from "../../src/types/errors.js";

describe("mapHttpError", () => {
  it("maps status codes to the error hierarchy", () => {
    expect(mapHttpError(401, {}, "anthropic")).toBeInstanceOf(AuthenticationError);
    expect(mapHttpError(403, {}, "anthropic")).toBeInstanceOf(AccessDeniedError);
    expect(mapHttpError(404, {}, "anthropic")).toBeInstanceOf(NotFoundError);
    expect(mapHttpError(408, {}, "anthropic")).toBeInstanceOf(RequestTimeoutError);
    expect(mapHttpError(413, {}, "anthropic")).toBeInstanceOf(ContextLengthError);
    expect(mapHttpError(429, {}, "anthropic")).toBeInstanceOf(RateLimitError);
    expect(mapHttpError(503, {}, "anthropic")).toBeInstanceOf(ServerError);
  });

  it("reads the nested message and code", () => {
    const err = mapHttpError(
      400,
      { error: { message: "Bad field", code: "unsupported_value" } },
      "openai",
    );

    expect(err).toBeInstanceOf(InvalidRequestError);
    expect(err.message).toBe("Bad field");
    expect(err).toMatchObject({
      provider: "openai",
      status_code: 400,
      error_code: "unsupported_value",
      retryable: false,
    });
  });

  it("reads a plain string error", () => {
    const err = mapHttpError(500, { error: "model crashed" }, "ollama");

    expect(err).toBeInstanceOf(ServerError);
    expect(err.message).toBe("model crashed");
    expect(err.retryable).toBe(true);
  });

  it("classifies a 400 by its message", () => {
    const err = mapHttpError(400, { error: { message: "prompt is too long: 250000 tokens" } }, "anthropic");

    expect(err).toBeInstanceOf(ContextLengthError);
  });

  it("uses a text body as the message", () => {
    const err = mapHttpError(502, "upstream unavailable", "gemini");

    expect(err.message).toBe("upstream unavailable");
    expect(err).toBeInstanceOf(ProviderError);
  });

  it("treats unknown statuses as retryable", () => {
    const err = mapHttpError(599, { message: "odd" }, "gemini");

    expect(err.retryable).toBe(true);
    expect(err).toBeInstanceOf(ProviderError);
  });

  it("reads Retry-After into retry_after", () => {
    const err = mapHttpError(429, {}, "openai", new Headers({ "retry-after": "7" }));

    expect(err).toMatchObject({ retry_after: 7 });
  });
});

describe("parseRetryAfter", () => {
  it("accepts seconds and rejects dates", () => {
    expect(parseRetryAfter(new Headers({ "retry-after": "2.5" }))).toBe(2.5);
    expect(parseRetryAfter(new Headers({ "retry-after": "Wed, 21 Oct 2015 07:28:00 GMT" }))).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});
