/**
 * SpeechSynthesizer: turns response text into output speech for the skill.
 * Neural audio when delivery succeeds; the platform's own voice when synthesis or delivery fails.
 */

import type pino from "pino";
import type { AudioDeliveryResolver } from "../delivery/resolver";
import { DeliveryError, isAudioDeliveryError, type SynthesisError } from "../delivery/errors";
import { logger as defaultLogger, logError, previewText } from "../logging";
import { audioTag, plainSpeech } from "./ssml";

export type SpeechMode = "neural" | "fallback";

export interface SynthesizedSpeech {
  /** SSML body for responseBuilder.speak / reprompt. */
  ssml: string;
  /** Text for the companion app card. */
  cardText: string;
  mode: SpeechMode;
}

export interface SpeakOptions {
  signal?: AbortSignal;
  /** Say and show the failure reason when falling back (setup diagnostics). */
  showError?: boolean;
}

/** The part of the resolver the skill needs; tests pass stubs. */
export type DeliveryResolver = Pick<AudioDeliveryResolver, "resolve">;

/** Spoken form of a failure: the error kind only. Messages can name buckets or engines and stay on the card. */
function spokenErrorLabel(err: SynthesisError | DeliveryError): string {
  return err instanceof DeliveryError ? `${err.name} ${err.reason}` : err.name;
}

export class SpeechSynthesizer {
  private readonly log: pino.Logger;

  constructor(
    private readonly resolver: DeliveryResolver,
    private readonly voiceId: string,
    log?: pino.Logger
  ) {
    this.log = log ?? defaultLogger;
  }

  async speak(text: string, options: SpeakOptions = {}): Promise<SynthesizedSpeech> {
    try {
      const reference = await this.resolver.resolve({ text, voiceId: this.voiceId }, { signal: options.signal });
      return { ssml: audioTag(reference), cardText: text, mode: "neural" };
    } catch (err) {
      if (!isAudioDeliveryError(err)) throw err;
      logError(this.log, err, { event: "SPEECH_FALLBACK", voiceId: this.voiceId, textPreview: previewText(text) });
      if (options.showError) {
        return {
          ssml: plainSpeech(`${text}. Error: ${spokenErrorLabel(err)}`),
          cardText: `${text} - ERROR: ${err.name}: ${err.message}`,
          mode: "fallback",
        };
      }
      return { ssml: plainSpeech(text), cardText: text, mode: "fallback" };
    }
  }
}
