/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (Edge, Google Cloud, Azure, stub).
 */

/** Encoded audio as returned by an engine. */
export interface AudioPayload {
  bytes: Buffer;
  /** e.g. audio/mpeg */
  mimeType: string;
}

export interface VoiceOptions {
  /** Voice name or id (provider-specific), e.g. en-CA-LiamNeural. */
  voiceName: string;
  /** Language code (e.g. en-CA). Derived from the voice name when omitted. */
  languageCode?: string;
  /** Cancels the engine call when the host request runs out of time. */
  signal?: AbortSignal;
}

/**
 * TTS adapter interface: text in, one encoded audio payload out.
 * Throws on any engine failure; retries, if any, are the engine client's business.
 */
export interface ITTS {
  synthesize(text: string, options: VoiceOptions): Promise<AudioPayload>;
}

/** MP3 profile accepted by Alexa SSML <audio> (48 kbps, 24 kHz). */
export const ALEXA_MP3_FORMAT = "audio-24khz-48kbitrate-mono-mp3";

export const MP3_MIME_TYPE = "audio/mpeg";

/** "en-CA-LiamNeural" -> "en-CA". Falls back to en-US for names without a locale prefix. */
export function languageCodeFromVoice(voiceName: string): string {
  const match = /^([a-z]{2,3}-[A-Z]{2})-/.exec(voiceName);
  return match ? match[1] : "en-US";
}

/**
 * Settle with the engine promise, or reject with the signal's reason once aborted.
 * For clients that take no AbortSignal; the underlying call is left to finish on its own.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Synthesis aborted");
}
