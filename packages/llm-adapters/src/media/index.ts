/**
 * Media normalizer.
 *
 * Detects image types from magic numbers and applies each vendor's inline
 * size limit. File parts that are not images, or too large, are dropped
 * from the encoded request (with a warning) instead of failing the call.
 */

import { ProviderType, type FilePart } from "../types/index.js";
import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Used when the bytes match no known signature. */
export const DEFAULT_MEDIA_TYPE = "image/jpeg";

const MiB = 1024 * 1024;

/** Largest inline image each vendor accepts, in bytes. */
export const IMAGE_SIZE_LIMITS = {
  [ProviderType.ANTHROPIC]: 5 * MiB,
  [ProviderType.OPENAI]: 20 * MiB,
  [ProviderType.GEMINI]: 20 * MiB,
  [ProviderType.OLLAMA]: 20 * MiB,
} as const satisfies Record<ProviderType, number>;

interface Signature {
  media_type: string;
  /** Byte values; `undefined` matches any byte. */
  bytes: ReadonlyArray<number | undefined>;
}

const SIGNATURES: readonly Signature[] = [
  { media_type: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { media_type: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
  { media_type: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  // "RIFF" <size> "WEBP"
  {
    media_type: "image/webp",
    bytes: [0x52, 0x49, 0x46, 0x46, undefined, undefined, undefined, undefined, 0x57, 0x45, 0x42, 0x50],
  },
];

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

function matches(bytes: Uint8Array, signature: Signature): boolean {
  if (bytes.length < signature.bytes.length) return false;
  return signature.bytes.every(
    (expected, i) => expected === undefined || bytes[i] === expected,
  );
}

/** Image MIME type of `bytes`, or DEFAULT_MEDIA_TYPE when inconclusive. */
export function detectMediaType(bytes: Uint8Array): string {
  return SIGNATURES.find((sig) => matches(bytes, sig))?.media_type ?? DEFAULT_MEDIA_TYPE;
}

export function isImageMediaType(mediaType: string): boolean {
  return mediaType.toLowerCase().startsWith("image/");
}

/** Whether `bytes` is within `limit` bytes. */
export function fits(bytes: Uint8Array, limit: number): boolean {
  return bytes.length <= limit;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

// ---------------------------------------------------------------------------
// Per-part preparation
// ---------------------------------------------------------------------------

export interface InlineImage {
  readonly media_type: string;
  /** Base64-encoded bytes. */
  readonly data: string;
}

/**
 * Resolve an inline (byte-carrying) file part for `provider`.
 *
 * Returns `undefined` when the part must be dropped.
 */
export function prepareInlineImage(
  part: FilePart,
  provider: ProviderType,
  logger?: Logger,
): InlineImage | undefined {
  if (!part.data) return undefined;

  const mediaType = part.media_type ?? detectMediaType(part.data);
  if (!isImageMediaType(mediaType)) {
    logger?.warn("Dropping non-image file part", { provider, media_type: mediaType });
    return undefined;
  }

  const limit = IMAGE_SIZE_LIMITS[provider];
  if (!fits(part.data, limit)) {
    logger?.warn("Dropping oversized image", {
      provider,
      media_type: mediaType,
      size: part.data.length,
      limit,
    });
    return undefined;
  }

  return { media_type: mediaType, data: toBase64(part.data) };
}

/**
 * Resolve a URI file part. Only images are kept; a part without a media
 * type is assumed to be one.
 */
export function prepareImageUri(
  part: FilePart,
  provider: ProviderType,
  logger?: Logger,
): { uri: string; media_type: string } | undefined {
  if (part.uri === undefined) return undefined;

  const mediaType = part.media_type ?? DEFAULT_MEDIA_TYPE;
  if (!isImageMediaType(mediaType)) {
    logger?.warn("Dropping non-image file reference", { provider, media_type: mediaType });
    return undefined;
  }
  return { uri: part.uri, media_type: mediaType };
}
