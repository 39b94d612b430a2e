import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { retry, calculateDelay, type RetryPolicy } from "../../src/utils/retry.js";
import { InvalidRequestError, RateLimitError, ServerError } from "../../src/types/errors.js";

function serverError(message = "server error"): ServerError {
  return new ServerError(message, { provider: "test", status_code: 500 });
}

function rateLimitError(retryAfter?: number): RateLimitError {
  return new RateLimitError("rate limited", {
    provider: "test",
    status_code: 429,
    retry_after: retryAfter,
  });
}

const fixed: RetryPolicy = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 5000,
  backoffMultiplier: 2,
  jitter: false,
};

describe("calculateDelay", () => {
  it("computes exponential backoff capped at maxDelay", () => {
    expect(calculateDelay(0, fixed)).toBe(1000);
    expect(calculateDelay(1, fixed)).toBe(2000);
    expect(calculateDelay(2, fixed)).toBe(4000);
    expect(calculateDelay(5, fixed)).toBe(5000);
  });

  it("applies jitter within 0.5x to 1.5x", () => {
    for (let i = 0; i < 50; i++) {
      const delay = calculateDelay(0, { ...fixed, jitter: true });
      expect(delay).toBeGreaterThanOrEqual(500);
      expect(delay).toBeLessThan(1500);
    }
  });
});

describe("retry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    expect(await retry(fn)).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries retryable errors with backoff", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(serverError())
      .mockRejectedValueOnce(serverError())
      .mockResolvedValue("recovered");
    const onRetry = vi.fn();

    const promise = retry(fn, { maxRetries: 2, jitter: false, baseDelay: 100, onRetry });
    await vi.advanceTimersByTimeAsync(100);
    await vi.advanceTimersByTimeAsync(200);

    expect(await promise).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [0, 100],
      [1, 200],
    ]);
  });

  it("does not retry non-retryable errors", async () => {
    const err = new InvalidRequestError("bad", { provider: "test", status_code: 400 });
    const fn = vi.fn().mockRejectedValue(err);

    await expect(retry(fn, { maxRetries: 3 })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledOnce();
  });

  it("throws the last error once retries run out", async () => {
    vi.useRealTimers();
    const err = serverError("persistent");
    const fn = vi.fn().mockRejectedValue(err);

    await expect(retry(fn, { maxRetries: 2, jitter: false, baseDelay: 1 })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("waits retry_after seconds instead of the computed delay", async () => {
    const fn = vi.fn().mockRejectedValueOnce(rateLimitError(2)).mockResolvedValue("ok");
    const onRetry = vi.fn();

    const promise = retry(fn, { maxRetries: 1, jitter: false, baseDelay: 10, onRetry });
    await vi.advanceTimersByTimeAsync(2000);

    expect(await promise).toBe("ok");
    expect(onRetry.mock.calls[0]?.[2]).toBe(2000);
  });

  it("gives up at once when retry_after exceeds maxDelay", async () => {
    const err = rateLimitError(120);
    const fn = vi.fn().mockRejectedValue(err);

    await expect(retry(fn, { maxRetries: 3, maxDelay: 60000 })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledOnce();
  });

  it("stops waiting when the signal aborts", async () => {
    vi.useRealTimers();
    const controller = new AbortController();
    const err = serverError();
    const fn = vi.fn().mockRejectedValue(err);

    const promise = retry(fn, { maxRetries: 3, baseDelay: 60000, signal: controller.signal });
    controller.abort();

    await expect(promise).rejects.toBe(err);
    expect(fn).toHaveBeenCalledOnce();
  });
});
