/**
 * Blob-store adapter types.
 * The destination must already allow public reads; provisioning that is an operational concern.
 */

export interface PutObjectInput {
  key: string;
  body: Buffer;
  contentType: string;
}

export interface IBlobStore {
  /** Write one object; rejects on any store failure or when the signal aborts. */
  putObject(input: PutObjectInput, signal?: AbortSignal): Promise<void>;
}
