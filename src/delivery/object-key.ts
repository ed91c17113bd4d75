/**
 * Object keys and public URLs for remote audio delivery.
 */

import * as crypto from "crypto";
import type { StorageConfig } from "./types";

const EXTENSIONS: Record<string, string> = {
  "audio/mpeg": "mp3",
  "audio/mp3": "mp3",
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/ogg": "ogg",
  "audio/webm": "webm",
};

export function extensionForMimeType(mimeType: string): string {
  return EXTENSIONS[mimeType.toLowerCase()] ?? "bin";
}

/**
 * Fresh key per call: `<prefix>/<epochMs>_<uuid>.<ext>`.
 * The UUID keeps concurrent requests (and retried uploads) from overwriting each other.
 */
export function buildObjectKey(prefix: string, mimeType: string, now: number = Date.now()): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, "");
  const name = `${now}_${crypto.randomUUID()}.${extensionForMimeType(mimeType)}`;
  return trimmed ? `${trimmed}/${name}` : name;
}

/** Virtual-hosted style S3 URL; the bucket must already allow public reads. */
export function publicObjectUrl(storage: StorageConfig, key: string): string {
  const path = key.split("/").map(encodeURIComponent).join("/");
  return `https://${storage.bucketIdentifier}.s3.${storage.region}.amazonaws.com/${path}`;
}
