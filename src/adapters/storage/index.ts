/**
 * Blob-store factory. No StorageConfig means no remote delivery at all.
 */

import type { RemoteStorage, StorageConfig } from "../../delivery/types";
import { S3BlobStore } from "./s3";

export type { IBlobStore, PutObjectInput } from "./types";
export { S3BlobStore } from "./s3";

export function createRemoteStorage(config: StorageConfig | null): RemoteStorage | null {
  if (config === null) return null;
  return { config, store: new S3BlobStore(config) };
}
