/**
 * Azure Cognitive Services Text-to-Speech adapter (optional).
 * Uses REST API with subscription key.
 */

import { escapeSsml } from "../../skill/ssml";
import type { AudioPayload, ITTS, VoiceOptions } from "./types";
import { ALEXA_MP3_FORMAT, MP3_MIME_TYPE, languageCodeFromVoice } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options: VoiceOptions): Promise<AudioPayload> {
    const languageCode = options.languageCode ?? languageCodeFromVoice(options.voiceName);
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": ALEXA_MP3_FORMAT,
      },
      body: `<speak version='1.0' xml:lang='${languageCode}'><voice name='${escapeSsml(options.voiceName)}'>${escapeSsml(text)}</voice></speak>`,
      signal: options.signal,
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const arrayBuffer = await response.arrayBuffer();
    return { bytes: Buffer.from(arrayBuffer), mimeType: MP3_MIME_TYPE };
  }
}

