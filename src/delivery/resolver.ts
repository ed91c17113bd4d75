/**
 * AudioDeliveryResolver: synthesizes one utterance and decides how the voice platform gets the audio.
 *
 * Flow (strictly sequential, no retries):
 *   validate -> engine.synthesize -> [upload to bucket -> RemoteUrl] -> inline data URI -> InlineDataUri
 *
 * Remote delivery is attempted only when a RemoteStorage is supplied. An upload failure either falls
 * back to inline delivery or fails the request, per UploadFailurePolicy. Inline delivery is bounded by
 * the platform's SSML payload ceiling; oversized audio fails with PayloadTooLarge, never truncated.
 */

import type pino from "pino";
import type { ITTS } from "../adapters/tts/types";
import { logger as defaultLogger, logDelivery, logTtsCall } from "../logging";
import { recordDeliveryMetrics, type DeliveryMetrics } from "../metrics";
import { DEFAULT_INLINE_MAX_CHARS, dataUriLength, encodeDataUri } from "./data-uri";
import { DeliveryError, SynthesisError, errorMessage } from "./errors";
import { buildObjectKey, publicObjectUrl } from "./object-key";
import type {
  AudioPayload,
  DeliveryReference,
  RemoteStorage,
  ResolveOptions,
  SynthesisRequest,
  UploadFailurePolicy,
} from "./types";

export interface AudioDeliveryResolverConfig {
  tts: ITTS;
  /** Bucket destination; null keeps every response inline. */
  storage: RemoteStorage | null;
  uploadFailurePolicy?: UploadFailurePolicy;
  /** Max length of the whole data URI (default 100,000 characters). */
  inlineMaxChars?: number;
  logger?: pino.Logger;
}

export class AudioDeliveryResolver {
  private readonly tts: ITTS;
  private readonly storage: RemoteStorage | null;
  private readonly uploadFailurePolicy: UploadFailurePolicy;
  private readonly inlineMaxChars: number;
  private readonly log: pino.Logger;

  constructor(config: AudioDeliveryResolverConfig) {
    this.tts = config.tts;
    this.storage = config.storage;
    this.uploadFailurePolicy = config.uploadFailurePolicy ?? "fallback";
    this.inlineMaxChars = config.inlineMaxChars ?? DEFAULT_INLINE_MAX_CHARS;
    this.log = config.logger ?? defaultLogger;
  }

  async resolve(request: SynthesisRequest, options: ResolveOptions = {}): Promise<DeliveryReference> {
    const startedAt = Date.now();
    const text = request.text.trim();
    const voiceId = request.voiceId.trim();
    if (!text) throw new SynthesisError("Text cannot be empty");
    if (!voiceId) throw new SynthesisError("Voice id cannot be empty");

    const metrics: DeliveryMetrics = { voiceId };
    const payload = await this.synthesize(text, voiceId, options.signal, metrics);

    let reference: DeliveryReference;
    if (this.storage === null) {
      reference = this.inline(payload);
    } else {
      reference = await this.deliverRemote(this.storage, payload, options.signal, metrics);
    }

    metrics.mode = reference.kind;
    recordDeliveryMetrics(metrics);
    logDelivery(this.log, reference, Date.now() - startedAt);
    return reference;
  }

  private async synthesize(
    text: string,
    voiceId: string,
    signal: AbortSignal | undefined,
    metrics: DeliveryMetrics
  ): Promise<AudioPayload> {
    const startedAt = Date.now();
    let payload: AudioPayload;
    try {
      payload = await this.tts.synthesize(text, { voiceName: voiceId, signal });
    } catch (err) {
      throw new SynthesisError(`Speech synthesis failed: ${errorMessage(err)}`, { cause: err });
    }
    metrics.synthesisLatencyMs = Date.now() - startedAt;
    metrics.audioBytes = payload.bytes.length;
    if (payload.bytes.length === 0) throw new SynthesisError("Speech synthesis returned no audio");

    logTtsCall(this.log, voiceId, text.length, payload.bytes.length, metrics.synthesisLatencyMs);
    return payload;
  }

  private async deliverRemote(
    storage: RemoteStorage,
    payload: AudioPayload,
    signal: AbortSignal | undefined,
    metrics: DeliveryMetrics
  ): Promise<DeliveryReference> {
    const key = buildObjectKey(storage.config.keyPrefix, payload.mimeType);
    const startedAt = Date.now();
    try {
      await storage.store.putObject({ key, body: payload.bytes, contentType: payload.mimeType }, signal);
      metrics.uploadLatencyMs = Date.now() - startedAt;
      return { kind: "RemoteUrl", value: publicObjectUrl(storage.config, key) };
    } catch (err) {
      metrics.uploadLatencyMs = Date.now() - startedAt;
      const message = `Audio upload to ${storage.config.bucketIdentifier} failed: ${errorMessage(err)}`;
      // Once the host deadline has passed there is no point inlining either.
      if (this.uploadFailurePolicy === "strict" || signal?.aborted) {
        throw new DeliveryError("UploadFailed", message, { cause: err });
      }
      this.log.warn({ event: "UPLOAD_FALLBACK", key, err: errorMessage(err) }, "Upload failed; delivering inline");
      metrics.uploadFellBack = true;
      return this.inline(payload);
    }
  }

  private inline(payload: AudioPayload): DeliveryReference {
    const length = dataUriLength(payload);
    if (length > this.inlineMaxChars) {
      throw new DeliveryError(
        "PayloadTooLarge",
        `Audio data URI is ${length} characters; the limit is ${this.inlineMaxChars}. Configure S3_BUCKET for remote delivery.`
      );
    }
    return { kind: "InlineDataUri", value: encodeDataUri(payload) };
  }
}
