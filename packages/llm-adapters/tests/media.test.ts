import { describe, it, expect } from "vitest";
import {
  DEFAULT_MEDIA_TYPE,
  IMAGE_SIZE_LIMITS,
  detectMediaType,
  fits,
  isImageMediaType,
  prepareImageUri,
  prepareInlineImage,
} from "../src/media/index.js";
import { PartKind, ProviderType, type FilePart } from "../src/types/index.js";
import { capturingLogger } from "./helpers.js";

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);
const GIF = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);
const WEBP = new Uint8Array([0x52, 0x49, 0x46, 0x46, 1, 2, 3, 4, 0x57, 0x45, 0x42, 0x50]);

function file(data: Uint8Array, media_type?: string): FilePart {
  return { kind: PartKind.FILE, data, ...(media_type ? { media_type } : {}) };
}

describe("detectMediaType", () => {
  it("recognizes the four signatures", () => {
    expect(detectMediaType(PNG)).toBe("image/png");
    expect(detectMediaType(JPEG)).toBe("image/jpeg");
    expect(detectMediaType(GIF)).toBe("image/gif");
    expect(detectMediaType(WEBP)).toBe("image/webp");
  });

  it("falls back for unknown or short input", () => {
    expect(detectMediaType(new Uint8Array([1, 2, 3]))).toBe(DEFAULT_MEDIA_TYPE);
    expect(detectMediaType(new Uint8Array([0x89, 0x50]))).toBe(DEFAULT_MEDIA_TYPE);
    expect(detectMediaType(new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x41, 0x56, 0x49, 0x20]))).toBe(
      DEFAULT_MEDIA_TYPE,
    );
  });
});

describe("limits", () => {
  it("uses 5 MiB for anthropic and 20 MiB elsewhere", () => {
    expect(IMAGE_SIZE_LIMITS).toEqual({
      anthropic: 5 * 1024 * 1024,
      openai: 20 * 1024 * 1024,
      gemini: 20 * 1024 * 1024,
      ollama: 20 * 1024 * 1024,
    });
  });

  it("fits is inclusive", () => {
    expect(fits(new Uint8Array(4), 4)).toBe(true);
    expect(fits(new Uint8Array(5), 4)).toBe(false);
  });

  it("isImageMediaType ignores case", () => {
    expect(isImageMediaType("IMAGE/PNG")).toBe(true);
    expect(isImageMediaType("application/pdf")).toBe(false);
  });
});

describe("prepareInlineImage", () => {
  it("detects the type and base64-encodes", () => {
    expect(prepareInlineImage(file(JPEG), ProviderType.OPENAI)).toEqual({
      media_type: "image/jpeg",
      data: "/9j/4A==",
    });
  });

  it("keeps a declared media type", () => {
    expect(prepareInlineImage(file(PNG, "image/x-custom"), ProviderType.GEMINI)?.media_type).toBe(
      "image/x-custom",
    );
  });

  it("drops non-images with a warning", () => {
    const { logger, lines } = capturingLogger();

    expect(prepareInlineImage(file(PNG, "application/pdf"), ProviderType.OLLAMA, logger)).toBeUndefined();
    expect(lines.map((l) => [l.level, l.msg])).toEqual([["warn", "Dropping non-image file part"]]);
  });

  it("drops an image over the vendor limit", () => {
    const { logger, lines } = capturingLogger();
    const big = new Uint8Array(5 * 1024 * 1024 + 1);
    big.set(PNG);

    expect(prepareInlineImage(file(big), ProviderType.ANTHROPIC, logger)).toBeUndefined();
    expect(prepareInlineImage(file(big), ProviderType.OPENAI, logger)?.media_type).toBe("image/png");
    expect(lines.filter((l) => l.msg === "Dropping oversized image")).toHaveLength(1);
  });
});

describe("prepareImageUri", () => {
  it("assumes an image when no type is given", () => {
    expect(prepareImageUri({ kind: PartKind.FILE, uri: "gs://bucket/cat" }, ProviderType.GEMINI)).toEqual({
      uri: "gs://bucket/cat",
      media_type: DEFAULT_MEDIA_TYPE,
    });
  });

  it("drops a non-image reference", () => {
    expect(
      prepareImageUri(
        { kind: PartKind.FILE, uri: "https://example.test/a.pdf", media_type: "application/pdf" },
        ProviderType.OPENAI,
      ),
    ).toBeUndefined();
  });
});
