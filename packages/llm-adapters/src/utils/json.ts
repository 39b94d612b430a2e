/**
 * Narrowing helpers for untrusted JSON payloads.
 *
 * Vendor responses arrive as `unknown`; decoders read fields through these
 * instead of casting.
 */

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function getRecord(obj: unknown, key: string): JsonObject | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return isRecord(value) ? value : undefined;
}

export function getString(obj: unknown, key: string): string | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function getNumber(obj: unknown, key: string): number | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(obj: unknown, key: string): boolean | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return typeof value === "boolean" ? value : undefined;
}

export function getArray(obj: unknown, key: string): unknown[] {
  if (!isRecord(obj)) return [];
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/** `JSON.parse` that returns `undefined` instead of throwing. */
export function tryParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse accumulated tool-call argument text.
 *
 * Empty input means no arguments. Text that does not parse to a JSON object
 * is kept verbatim under a single `_raw` key so the call still goes through.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === "") return {};
  const parsed = tryParseJSON(raw);
  return isRecord(parsed) ? parsed : { _raw: raw };
}
