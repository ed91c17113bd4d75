/**
 * Stub TTS adapters, no network.
 * StubTTS returns a zero-filled "MP3" of fixed size and is only chosen by TTS_PROVIDER=stub.
 */

import type { AudioPayload, ITTS, VoiceOptions } from "./types";
import { MP3_MIME_TYPE } from "./types";

export class StubTTS implements ITTS {
  constructor(private readonly byteLength = 1024) {}

  async synthesize(_text: string, options: VoiceOptions): Promise<AudioPayload> {
    options.signal?.throwIfAborted();
    return { bytes: Buffer.alloc(this.byteLength), mimeType: MP3_MIME_TYPE };
  }
}

/** Engine selected without its credentials: every call fails, so the skill answers in the platform voice. */
export class UnavailableTTS implements ITTS {
  constructor(private readonly reason: string) {}

  async synthesize(): Promise<AudioPayload> {
    throw new Error(this.reason);
  }
}
