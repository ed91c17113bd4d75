/**
 * Amazon S3 blob store for remote audio delivery.
 * Objects are written with a public-read ACL so the voice platform can fetch them by URL.
 */

import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StorageConfig } from "../../delivery/types";
import type { IBlobStore, PutObjectInput } from "./types";

export class S3BlobStore implements IBlobStore {
  private readonly client: S3Client;

  constructor(
    private readonly config: StorageConfig,
    client?: S3Client
  ) {
    this.client = client ?? new S3Client({ region: config.region });
  }

  async putObject(input: PutObjectInput, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucketIdentifier,
        Key: input.key,
        Body: input.body,
        ContentType: input.contentType,
        ACL: "public-read",
      }),
      { abortSignal: signal }
    );
  }
}
