import { describe, it, expect } from "vitest";
import {
  getArray,
  getBoolean,
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseToolArguments,
  tryParseJSON,
} from "../../src/utils/json.js";

describe("JSON narrowing", () => {
  const doc: unknown = {
    name: "x",
    count: 3,
    flag: false,
    nested: { ok: true },
    list: [1, 2],
    nan: Number.NaN,
  };

  it("distinguishes records from arrays and null", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("text")).toBe(false);
  });

  it("reads typed fields and rejects mismatches", () => {
    expect(getString(doc, "name")).toBe("x");
    expect(getString(doc, "count")).toBeUndefined();
    expect(getNumber(doc, "count")).toBe(3);
    expect(getNumber(doc, "nan")).toBeUndefined();
    expect(getBoolean(doc, "flag")).toBe(false);
    expect(getRecord(doc, "nested")).toEqual({ ok: true });
    expect(getRecord(doc, "list")).toBeUndefined();
    expect(getArray(doc, "list")).toEqual([1, 2]);
    expect(getArray(doc, "missing")).toEqual([]);
  });

  it("returns undefined for anything read off a non-object", () => {
    expect(getString(undefined, "name")).toBeUndefined();
    expect(getArray("text", "list")).toEqual([]);
  });

  it("tryParseJSON returns undefined on bad input", () => {
    expect(tryParseJSON('{"a":1}')).toEqual({ a: 1 });
    expect(tryParseJSON("{")).toBeUndefined();
  });
});

describe("parseToolArguments", () => {
  it("parses an object", () => {
    expect(parseToolArguments('{"city":"Paris"}')).toEqual({ city: "Paris" });
  });

  it("treats empty or blank input as no arguments", () => {
    expect(parseToolArguments("")).toEqual({});
    expect(parseToolArguments("  ")).toEqual({});
  });

  it("keeps unparseable or non-object text under _raw", () => {
    expect(parseToolArguments('{"city":')).toEqual({ _raw: '{"city":' });
    expect(parseToolArguments("[1,2]")).toEqual({ _raw: "[1,2]" });
  });
});
