import { describe, it, expect } from "vitest";
import {
  GeminiAdapter,
  GeminiPartDecoder,
  translateRequest,
  translateResponse,
  translateStream,
} from "../../src/providers/gemini/index.js";
import {
  ContentFilterError,
  PartKind,
  Role,
  StreamEventType,
  createAgentMessage,
  createSystemMessage,
  createToolResultMessage,
  createUserMessage,
} from "../../src/types/index.js";
import { silentLogger } from "../../src/logger.js";
import { FakeTransport, collect, mockSSEStream, sse, sseBody } from "../helpers.js";

function response(parts: unknown[], totalTokenCount?: number): Record<string, unknown> {
  return {
    candidates: [{ content: { role: "model", parts } }],
    ...(totalTokenCount !== undefined ? { usageMetadata: { totalTokenCount } } : {}),
  };
}

// ---------------------------------------------------------------------------
// Request translation
// ---------------------------------------------------------------------------

describe("translateRequest", () => {
  it("maps roles and names tool results by their call", () => {
    const body = translateRequest(
      [
        createSystemMessage("Sys"),
        createUserMessage("Hi"),
        createAgentMessage("Calling", {
          thinking: { content: "t", signature: "sig-1" },
          tool_calls: [
            { id: "call_a", name: "get_weather", args: { city: "Oslo" } },
            { id: "call_b", name: "get_time", args: {} },
          ],
        }),
        {
          role: Role.USER,
          parts: [
            { kind: PartKind.TOOL_RESULT, tool_call_id: "call_a", content: "Sunny" },
            { kind: PartKind.TOOL_RESULT, tool_call_id: "call_b", content: "", error: "timeout" },
          ],
        },
      ],
      [{ name: "get_weather", description: "Weather", parameters: { type: "object" } }],
      { model: "gemini-2.5-flash" },
    );

    expect(body).toEqual({
      systemInstruction: { role: "user", parts: [{ text: "Sys" }] },
      contents: [
        { role: "user", parts: [{ text: "Hi" }] },
        {
          role: "model",
          parts: [
            { text: "Calling" },
            { functionCall: { name: "get_weather", args: { city: "Oslo" } }, thoughtSignature: "sig-1" },
            { functionCall: { name: "get_time", args: {} } },
          ],
        },
        {
          role: "user",
          parts: [
            { functionResponse: { name: "get_weather", response: { content: "Sunny" } } },
            { functionResponse: { name: "get_time", response: { error: "timeout", content: "" } } },
          ],
        },
      ],
      tools: [
        {
          functionDeclarations: [
            { name: "get_weather", description: "Weather", parameters: { type: "object" } },
          ],
        },
      ],
      generationConfig: {},
    });
  });

  it("falls back to the call id for a result with no matching call", () => {
    const body = translateRequest([createToolResultMessage("orphan", "x")], [], { model: "m" });

    expect(body.contents).toEqual([
      { role: "user", parts: [{ functionResponse: { name: "orphan", response: { content: "x" } } }] },
    ]);
  });

  it("sends inline images as inlineData and references as fileData", () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    const body = translateRequest(
      [
        {
          role: Role.USER,
          parts: [
            { kind: PartKind.FILE, data: png },
            { kind: PartKind.FILE, uri: "gs://bucket/cat.webp", media_type: "image/webp" },
          ],
        },
      ],
      [],
      { model: "m" },
    );

    expect(body.contents[0]?.parts).toEqual([
      { inlineData: { mimeType: "image/png", data: "iVBORw0KGgo=" } },
      { fileData: { mimeType: "image/webp", fileUri: "gs://bucket/cat.webp" } },
    ]);
  });

  it("builds the generation config", () => {
    const body = translateRequest([createUserMessage("x")], [], {
      model: "m",
      max_tokens: 100,
      temperature: 0,
      thinking: { enabled: true, budget_tokens: 512 },
    });

    expect(body.generationConfig).toEqual({
      maxOutputTokens: 100,
      thinkingConfig: { includeThoughts: true, thinkingBudget: 512 },
    });
  });

  it("maps structured output to a response schema", () => {
    const ordered = translateRequest([createUserMessage("x")], [], {
      model: "m",
      structured_output: {
        format: "json",
        schema: { type: "object", properties: { a: {}, b: {} } },
        property_ordering: ["b", "a"],
      },
    });
    const choice = translateRequest([createUserMessage("x")], [], {
      model: "m",
      structured_output: { format: "enum", enum: ["red", "green"] },
    });

    expect(ordered.generationConfig).toEqual({
      responseMimeType: "application/json",
      responseSchema: { type: "object", properties: { a: {}, b: {} }, propertyOrdering: ["b", "a"] },
    });
    expect(choice.generationConfig).toEqual({
      responseMimeType: "text/x.enum",
      responseSchema: { type: "string", enum: ["red", "green"] },
    });
  });
});

// ---------------------------------------------------------------------------
// Part decoding
// ---------------------------------------------------------------------------

describe("GeminiPartDecoder", () => {
  it("numbers synthetic call ids per response", () => {
    const decoder = new GeminiPartDecoder();

    const first = decoder.decode({ functionCall: { name: "a", args: {} } });
    const second = decoder.decode({ functionCall: { name: "b" } });

    expect([...first, ...second]).toEqual([
      { type: StreamEventType.TOOL_CALL, tool_call: { id: "call_0", name: "a", args: {} } },
      { type: StreamEventType.TOOL_CALL, tool_call: { id: "call_1", name: "b", args: {} } },
    ]);
  });

  it("completes open thinking when answer text starts", () => {
    const decoder = new GeminiPartDecoder();

    const events = [
      ...decoder.decode({ text: "Hmm", thought: true, thoughtSignature: "sig" }),
      ...decoder.decode({ text: "Answer" }),
      ...decoder.finish(),
    ];

    expect(events).toEqual([
      { type: StreamEventType.THINKING, text: "Hmm" },
      { type: StreamEventType.THINKING_COMPLETE, content: "Hmm", signature: "sig" },
      { type: StreamEventType.TEXT, text: "Answer" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Stream translation
// ---------------------------------------------------------------------------

describe("translateStream", () => {
  it("treats thought-flagged text after a function call as answer text", async () => {
    const events = await collect(
      translateStream(
        mockSSEStream([
          sse(response([{ text: "Let me think", thought: true }])),
          sse(response([{ functionCall: { name: "lookup", args: { q: "x" } }, thoughtSignature: "sig-2" }])),
          sse(response([{ text: "Done.", thought: true }], 42)),
        ]),
      ),
    );

    expect(events).toEqual([
      { type: StreamEventType.THINKING, text: "Let me think" },
      { type: StreamEventType.THINKING_COMPLETE, content: "Let me think", signature: "sig-2" },
      { type: StreamEventType.TOOL_CALL, tool_call: { id: "call_0", name: "lookup", args: { q: "x" } } },
      { type: StreamEventType.TEXT, text: "Done." },
      { type: StreamEventType.DONE, tokens_used: 42 },
    ]);
  });

  it("completes thinking left open at the end", async () => {
    const events = await collect(
      translateStream(mockSSEStream([sse(response([{ text: "only thoughts", thought: true }], 5))])),
    );

    expect(events.slice(1)).toEqual([
      { type: StreamEventType.THINKING_COMPLETE, content: "only thoughts", signature: "" },
      { type: StreamEventType.DONE, tokens_used: 5 },
    ]);
  });

  it("ends with ERROR on an error payload", async () => {
    const events = await collect(
      translateStream(
        mockSSEStream([
          sse(response([{ text: "partial" }])),
          sse({ error: { code: 429, message: "Quota exceeded" } }),
          sse(response([{ text: "late" }])),
        ]),
      ),
    );

    expect(events).toHaveLength(2);
    const last = events[1];
    expect(last?.type === StreamEventType.ERROR && last.error.message).toBe("Quota exceeded");
  });
});

// ---------------------------------------------------------------------------
// Response translation
// ---------------------------------------------------------------------------

describe("translateResponse", () => {
  it("collects thinking, text and usage", () => {
    const result = translateResponse(
      response([{ text: "hmm", thought: true, thoughtSignature: "s" }, { text: "Answer" }], 7),
    );

    expect(result).toEqual({
      text: "Answer",
      tool_calls: [],
      tokens_used: 7,
      thinking: { content: "hmm", signature: "s" },
    });
  });

  it("throws ContentFilterError for a blocked prompt", () => {
    expect(() => translateResponse({ promptFeedback: { blockReason: "SAFETY" } })).toThrow(
      new ContentFilterError("Prompt blocked: SAFETY", { provider: "gemini" }),
    );
  });
});

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

describe("GeminiAdapter", () => {
  it("round-trips a single user text message", async () => {
    const transport = new FakeTransport([{ body: response([{ text: "Hello there" }], 9) }]);
    const gemini = new GeminiAdapter({ apiKey: "test-secret", transport, logger: silentLogger });

    const result = await gemini.complete([createUserMessage("Hello there")], [], { model: "gemini-2.5-flash" });

    expect(result).toEqual({ text: "Hello there", tool_calls: [], tokens_used: 9 });
    const request = transport.requests[0];
    expect(request?.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent",
    );
    expect(request?.headers["x-goog-api-key"]).toBe("test-secret");
  });

  it("streams from the SSE endpoint", async () => {
    const transport = new FakeTransport([
      { body: sseBody([sse(response([{ text: "Hel" }])), sse(response([{ text: "lo" }], 3))]) },
    ]);
    const gemini = new GeminiAdapter({
      apiKey: "test-secret",
      baseUrl: "https://gemini.example.test/",
      transport,
      logger: silentLogger,
    });

    const events = await collect(gemini.stream([createUserMessage("Hi")], [], { model: "gemini-2.5-pro" }));

    expect(events).toEqual([
      { type: StreamEventType.TEXT, text: "Hel" },
      { type: StreamEventType.TEXT, text: "lo" },
      { type: StreamEventType.DONE, tokens_used: 3 },
    ]);
    expect(transport.requests[0]?.url).toBe(
      "https://gemini.example.test/v1beta/models/gemini-2.5-pro:streamGenerateContent?alt=sse",
    );
  });
});
