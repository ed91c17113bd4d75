export type {
  AudioPayload,
  DeliveryKind,
  DeliveryReference,
  RemoteStorage,
  ResolveOptions,
  StorageConfig,
  SynthesisRequest,
  UploadFailurePolicy,
} from "./types";
export { AudioDeliveryResolver } from "./resolver";
export type { AudioDeliveryResolverConfig } from "./resolver";
export { DeliveryError, SynthesisError, isAudioDeliveryError } from "./errors";
export type { DeliveryFailureReason } from "./errors";
export { DEFAULT_INLINE_MAX_CHARS, dataUriLength, decodeDataUri, encodeDataUri } from "./data-uri";
export { buildObjectKey, extensionForMimeType, publicObjectUrl } from "./object-key";
