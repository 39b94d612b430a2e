import { describe, it, expect } from "vitest";
import {
  StreamCollector,
  StreamError,
  StreamEventType,
  collectStream,
  isTerminalEvent,
  type StreamEvent,
} from "../../src/types/index.js";

async function* events(list: StreamEvent[]): AsyncIterableIterator<StreamEvent> {
  for (const event of list) yield event;
}

describe("StreamCollector", () => {
  it("folds a stream into a result", () => {
    const collector = new StreamCollector();
    const input: StreamEvent[] = [
      { type: StreamEventType.THINKING, text: "hmm" },
      { type: StreamEventType.THINKING_COMPLETE, content: "hmm", signature: "sig-1" },
      { type: StreamEventType.THINKING_COMPLETE, content: "later", signature: "sig-2" },
      { type: StreamEventType.TEXT, text: "Hel" },
      { type: StreamEventType.TEXT, text: "lo" },
      { type: StreamEventType.TOOL_CALL, tool_call: { id: "1", name: "f", args: {} } },
      { type: StreamEventType.DONE, tokens_used: 12 },
    ];
    for (const event of input) collector.process(event);

    expect(collector.done).toBe(true);
    expect(collector.result()).toEqual({
      text: "Hello",
      tool_calls: [{ id: "1", name: "f", args: {} }],
      tokens_used: 12,
      thinking: { content: "hmm", signature: "sig-1" },
    });
  });

  it("records the error of an ERROR event", () => {
    const collector = new StreamCollector();
    const error = new StreamError("boom");
    collector.process({ type: StreamEventType.ERROR, error });

    expect(collector.done).toBe(true);
    expect(collector.error).toBe(error);
  });
});

describe("collectStream", () => {
  it("returns the aggregate", async () => {
    const result = await collectStream(
      events([
        { type: StreamEventType.TEXT, text: "ok" },
        { type: StreamEventType.DONE, tokens_used: 3 },
      ]),
    );

    expect(result).toEqual({ text: "ok", tool_calls: [], tokens_used: 3 });
  });

  it("throws the terminal error", async () => {
    const error = new StreamError("cut off");

    await expect(collectStream(events([{ type: StreamEventType.ERROR, error }]))).rejects.toBe(error);
  });
});

describe("isTerminalEvent", () => {
  it("is true only for DONE and ERROR", () => {
    expect(isTerminalEvent({ type: StreamEventType.DONE, tokens_used: 0 })).toBe(true);
    expect(isTerminalEvent({ type: StreamEventType.ERROR, error: new StreamError("x") })).toBe(true);
    expect(isTerminalEvent({ type: StreamEventType.TEXT, text: "x" })).toBe(false);
  });
});
