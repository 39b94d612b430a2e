import { describe, it, expect } from "vitest";
import {
  PartKind,
  Role,
  createAgentMessage,
  createSystemMessage,
  createToolResultMessage,
  createUserMessage,
  getMessageText,
  getMessageThinking,
  getMessageToolCalls,
  getMessageToolResults,
} from "../../src/types/index.js";

describe("message factories", () => {
  it("creates system and user text messages", () => {
    expect(createSystemMessage("Be brief.")).toEqual({
      role: Role.SYSTEM,
      parts: [{ kind: PartKind.TEXT, text: "Be brief." }],
    });
    expect(createUserMessage("Hi").role).toBe(Role.USER);
  });

  it("orders agent parts as thinking, text, tool calls", () => {
    const msg = createAgentMessage("Checking.", {
      thinking: { content: "plan", signature: "sig" },
      tool_calls: [{ id: "42", name: "get_weather", args: { city: "Paris" } }],
    });

    expect(msg.parts.map((p) => p.kind)).toEqual([
      PartKind.THINKING,
      PartKind.TEXT,
      PartKind.TOOL_CALL,
    ]);
    expect(getMessageThinking(msg)).toEqual({ content: "plan", signature: "sig" });
    expect(getMessageToolCalls(msg)).toEqual([
      { id: "42", name: "get_weather", args: { city: "Paris" } },
    ]);
  });

  it("omits an empty text part", () => {
    expect(createAgentMessage("").parts).toEqual([]);
  });

  it("creates a tool result with an optional error", () => {
    const ok = createToolResultMessage("42", "sunny");
    const failed = createToolResultMessage("43", "", "timeout");

    expect(getMessageToolResults(ok)).toEqual([
      { kind: PartKind.TOOL_RESULT, tool_call_id: "42", content: "sunny" },
    ]);
    expect(getMessageToolResults(failed)[0]?.error).toBe("timeout");
  });

  it("concatenates text parts", () => {
    expect(
      getMessageText({
        role: Role.USER,
        parts: [
          { kind: PartKind.TEXT, text: "a" },
          { kind: PartKind.TOOL_RESULT, tool_call_id: "1", content: "x" },
          { kind: PartKind.TEXT, text: "b" },
        ],
      }),
    ).toBe("ab");
  });
});
