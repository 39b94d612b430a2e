/**
 * Newline-delimited JSON stream parser.
 *
 * Each non-blank line is one complete JSON document. Lines that do not parse
 * are logged and skipped; a stream of partial garbage never aborts the
 * decode.
 */

import type { Logger } from "../logger.js";
import { readText } from "./reader.js";
import { tryParseJSON } from "./json.js";

/**
 * Parse a ReadableStream of bytes as NDJSON, yielding one value per line.
 */
export async function* parseNDJSONStream(
  stream: ReadableStream<Uint8Array>,
  options?: { signal?: AbortSignal; logger?: Logger },
): AsyncIterableIterator<unknown> {
  let buffer = "";

  function* drain(lines: string[]): Generator<unknown> {
    for (const raw of lines) {
      const line = raw.trim();
      if (line === "") continue;
      const parsed = tryParseJSON(line);
      if (parsed === undefined) {
        options?.logger?.debug("Skipping malformed NDJSON line", {
          length: line.length,
        });
        continue;
      }
      yield parsed;
    }
  }

  for await (const chunk of readText(stream, options?.signal)) {
    buffer += chunk;
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    yield* drain(lines);
  }

  yield* drain([buffer]);
}
