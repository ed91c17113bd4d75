/**
 * Base64 data URIs for inline audio delivery.
 */

import type { AudioPayload } from "./types";

/** Ceiling of the voice platform's SSML audio payload, in characters. */
export const DEFAULT_INLINE_MAX_CHARS = 100_000;

const DATA_URI_PATTERN = /^data:([^;,]+);base64,([A-Za-z0-9+/]*={0,2})$/;

export function encodeDataUri(payload: AudioPayload): string {
  return `data:${payload.mimeType};base64,${payload.bytes.toString("base64")}`;
}

/** Length of encodeDataUri(payload) without building the string. */
export function dataUriLength(payload: AudioPayload): number {
  const base64Length = Math.ceil(payload.bytes.length / 3) * 4;
  return `data:${payload.mimeType};base64,`.length + base64Length;
}

/** Inverse of encodeDataUri. Throws on anything that is not a base64 data URI. */
export function decodeDataUri(uri: string): AudioPayload {
  const match = DATA_URI_PATTERN.exec(uri);
  if (!match) throw new Error("Not a base64 data URI");
  return { mimeType: match[1], bytes: Buffer.from(match[2], "base64") };
}
