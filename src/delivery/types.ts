/**
 * Audio delivery types: what the resolver consumes and what it hands to the SSML builder.
 */

import type { AudioPayload } from "../adapters/tts/types";
import type { IBlobStore } from "../adapters/storage/types";

export type { AudioPayload } from "../adapters/tts/types";

/** One utterance to voice. Both fields must be non-empty after trimming. */
export interface SynthesisRequest {
  readonly text: string;
  /** Engine voice name, e.g. en-CA-LiamNeural. */
  readonly voiceId: string;
}

export type DeliveryKind = "InlineDataUri" | "RemoteUrl";

/** Value placed in the src attribute of an SSML audio tag. */
export type DeliveryReference =
  | { readonly kind: "InlineDataUri"; readonly value: string }
  | { readonly kind: "RemoteUrl"; readonly value: string };

/** Public-read bucket destination. Absent (null) disables remote delivery entirely. */
export interface StorageConfig {
  readonly bucketIdentifier: string;
  readonly region: string;
  /** Key prefix without trailing slash (e.g. "tts"). */
  readonly keyPrefix: string;
}

/** Storage destination plus the client that writes to it. */
export interface RemoteStorage {
  readonly config: StorageConfig;
  readonly store: IBlobStore;
}

/**
 * What to do when the upload fails:
 * - fallback: continue with inline delivery (still bounded by the data URI ceiling)
 * - strict: fail the request with DeliveryError("UploadFailed")
 */
export type UploadFailurePolicy = "fallback" | "strict";

export interface ResolveOptions {
  /** Host deadline; passed to both the engine and the upload. */
  signal?: AbortSignal;
}
