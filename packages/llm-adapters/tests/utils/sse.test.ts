import { describe, it, expect } from "vitest";
import { parseSSEStream } from "../../src/utils/sse.js";
import { chunkedStream, collect } from "../helpers.js";

describe("parseSSEStream", () => {
  it("parses a simple data-only event", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data: hello world\n\n"])));

    expect(events).toEqual([{ event: undefined, data: "hello world", retry: undefined }]);
  });

  it("parses multiple events separated by blank lines", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data: first\n\ndata: second\n\n"])));

    expect(events.map((e) => e.data)).toEqual(["first", "second"]);
  });

  it("handles the event type field", async () => {
    const events = await collect(
      parseSSEStream(chunkedStream(['event: message\ndata: {"text":"hi"}\n\n'])),
    );

    expect(events).toEqual([{ event: "message", data: '{"text":"hi"}', retry: undefined }]);
  });

  it("joins multiple data lines with newlines", async () => {
    const events = await collect(
      parseSSEStream(chunkedStream(["data: line1\ndata: line2\ndata: line3\n\n"])),
    );

    expect(events).toHaveLength(1);
    expect(events[0]?.data).toBe("line1\nline2\nline3");
  });

  it("reads the retry field and ignores non-numeric values", async () => {
    const events = await collect(
      parseSSEStream(chunkedStream(["retry: 3000\ndata: a\n\nretry: soon\ndata: b\n\n"])),
    );

    expect(events.map((e) => e.retry)).toEqual([3000, undefined]);
  });

  it("ignores comment lines and unknown fields", async () => {
    const events = await collect(
      parseSSEStream(chunkedStream([": keep-alive\nid: 123\ndata: actual data\n\n"])),
    );

    expect(events.map((e) => e.data)).toEqual(["actual data"]);
  });

  it("strips exactly one leading space from a field value", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data:  two spaces\n\ndata:nospace\n\n"])));

    expect(events.map((e) => e.data)).toEqual([" two spaces", "nospace"]);
  });

  it("handles chunks that split mid-line", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["dat", "a: hello ", "world\n\n"])));

    expect(events.map((e) => e.data)).toEqual(["hello world"]);
  });

  it("handles \\r\\n and bare \\r line endings", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data: crlf\r\n\r\ndata: cr\r\r"])));

    expect(events.map((e) => e.data)).toEqual(["crlf", "cr"]);
  });

  it("emits a trailing event at stream end without a final blank line", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data: trailing"])));

    expect(events.map((e) => e.data)).toEqual(["trailing"]);
  });

  it("resets the event type between events", async () => {
    const events = await collect(
      parseSSEStream(chunkedStream(["event: typeA\ndata: first\n\ndata: second\n\n"])),
    );

    expect(events.map((e) => e.event)).toEqual(["typeA", undefined]);
  });

  it("keeps an empty data field", async () => {
    const events = await collect(parseSSEStream(chunkedStream(["data:\n\n"])));

    expect(events.map((e) => e.data)).toEqual([""]);
  });

  it("produces no events from an empty or comment-only stream", async () => {
    expect(await collect(parseSSEStream(chunkedStream([])))).toEqual([]);
    expect(await collect(parseSSEStream(chunkedStream([": keep-alive\n\n"])))).toEqual([]);
  });

  it("yields nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const events = await collect(
      parseSSEStream(chunkedStream(["data: never\n\n"]), controller.signal),
    );

    expect(events).toEqual([]);
  });
});
