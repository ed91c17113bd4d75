/**
 * Per-request delivery metrics.
 * Latencies and the chosen delivery mode are logged as one event; the last snapshot is kept for diagnostics.
 */

import { logger } from "../logging";
import type { DeliveryKind } from "../delivery/types";

export interface DeliveryMetrics {
  /** Engine call duration (ms). */
  synthesisLatencyMs?: number;
  /** Blob-store write duration (ms); absent when no upload was attempted. */
  uploadLatencyMs?: number;
  /** Delivery mode that produced the reference. */
  mode?: DeliveryKind;
  /** Size of the synthesized audio. */
  audioBytes?: number;
  /** Upload failed and the audio was inlined instead. */
  uploadFellBack?: boolean;
  voiceId?: string;
}

// Diagnostics only: the resolver writes it and nothing reads it to make a delivery decision.
let lastDeliveryMetrics: DeliveryMetrics = {};

export function recordDeliveryMetrics(metrics: DeliveryMetrics): void {
  lastDeliveryMetrics = { ...metrics };
  logger.info(
    {
      event: "DELIVERY_METRICS",
      synthesis_latency_ms: metrics.synthesisLatencyMs,
      upload_latency_ms: metrics.uploadLatencyMs,
      mode: metrics.mode,
      audio_bytes: metrics.audioBytes,
      upload_fell_back: metrics.uploadFellBack,
      voice_id: metrics.voiceId,
    },
    "Delivery latency"
  );
}

export function getLastDeliveryMetrics(): DeliveryMetrics {
  return { ...lastDeliveryMetrics };
}
