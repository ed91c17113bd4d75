/**
 * Microsoft Edge online TTS adapter (no API key).
 * Neural voices such as en-CA-LiamNeural, rendered straight to Alexa's MP3 profile.
 */

import { EdgeTTS } from "@andresaya/edge-tts";
import type { AudioPayload, ITTS, VoiceOptions } from "./types";
import { ALEXA_MP3_FORMAT, MP3_MIME_TYPE, raceAbort } from "./types";

export class EdgeNeuralTTS implements ITTS {
  async synthesize(text: string, options: VoiceOptions): Promise<AudioPayload> {
    const tts = new EdgeTTS();
    // The client opens its own websocket per call and has no cancellation hook.
    await raceAbort(tts.synthesize(text, options.voiceName, { outputFormat: ALEXA_MP3_FORMAT }), options.signal);
    return { bytes: tts.toBuffer(), mimeType: MP3_MIME_TYPE };
  }
}
