/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { logger } from "../../logging";
import type { ITTS } from "./types";
import { StubTTS, UnavailableTTS } from "./stub";
import { EdgeNeuralTTS } from "./edge";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";

export type { AudioPayload, ITTS, VoiceOptions } from "./types";
export { languageCodeFromVoice, raceAbort } from "./types";
export { StubTTS, UnavailableTTS } from "./stub";
export { EdgeNeuralTTS } from "./edge";
export { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
export { AzureTTS } from "./azure";

export function createTTS(config: AppConfig): ITTS {
  const { provider, googleApiKey, azureKey, azureRegion } = config.tts;
  if (provider === "edge") return new EdgeNeuralTTS();
  if (provider === "google") {
    if (googleApiKey) return new GoogleCloudTTS({ apiKey: googleApiKey });
    return new GoogleCloudTTSADC();
  }
  if (provider === "azure") {
    if (azureKey && azureRegion) return new AzureTTS({ key: azureKey, region: azureRegion });
    const reason = "Azure TTS is not configured: AZURE_TTS_KEY and AZURE_TTS_REGION are required";
    logger.error({ event: "TTS_CONFIG", provider }, reason);
    return new UnavailableTTS(reason);
  }
  return new StubTTS();
}
