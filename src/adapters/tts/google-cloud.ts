/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * Both request MP3 at 24 kHz so the result plays in an SSML audio tag.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import type { AudioPayload, ITTS, VoiceOptions } from "./types";
import { MP3_MIME_TYPE, languageCodeFromVoice, raceAbort } from "./types";

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const SAMPLE_RATE_HZ = 24000;

export interface GoogleCloudTTSConfig {
  apiKey: string;
}

function synthesizeRequest(text: string, options: VoiceOptions) {
  return {
    input: { text },
    voice: { name: options.voiceName, languageCode: options.languageCode ?? languageCodeFromVoice(options.voiceName) },
    audioConfig: { audioEncoding: "MP3" as const, sampleRateHertz: SAMPLE_RATE_HZ },
  };
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options: VoiceOptions): Promise<AudioPayload> {
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(synthesizeRequest(text, options)),
      signal: options.signal,
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data = (await response.json()) as { audioContent?: string };
    const b64 = data.audioContent;
    if (!b64) return { bytes: Buffer.alloc(0), mimeType: MP3_MIME_TYPE };
    return { bytes: Buffer.from(b64, "base64"), mimeType: MP3_MIME_TYPE };
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(client?: TextToSpeechClient) {
    this.client = client ?? new TextToSpeechClient();
  }

  async synthesize(text: string, options: VoiceOptions): Promise<AudioPayload> {
    const [response] = await raceAbort(this.client.synthesizeSpeech(synthesizeRequest(text, options)), options.signal);
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return { bytes: Buffer.alloc(0), mimeType: MP3_MIME_TYPE };
    return { bytes: Buffer.from(content), mimeType: MP3_MIME_TYPE };
  }
}
