/**
 * Skill assembly: wires config -> engine + storage -> resolver -> speech -> ask-sdk skill.
 */

import { SkillBuilders } from "ask-sdk-core";
import type { AppConfig } from "../config";
import { createRemoteStorage } from "../adapters/storage";
import { createTTS } from "../adapters/tts";
import { AudioDeliveryResolver } from "../delivery";
import { createErrorHandler, createRequestHandlers, type SkillDependencies } from "./handlers";
import { SpeechSynthesizer } from "./speech";

export { SpeechSynthesizer } from "./speech";
export type { DeliveryResolver, SpeakOptions, SpeechMode, SynthesizedSpeech } from "./speech";
export { audioTag, escapeSsml, plainSpeech } from "./ssml";
export { deadlineMs, deadlineSignal, remainingTimeMs } from "./deadline";
export * from "./handlers";

export function createSkillBuilder(deps: SkillDependencies) {
  const builder = SkillBuilders.custom()
    .addRequestHandlers(...createRequestHandlers(deps))
    .addErrorHandlers(createErrorHandler(deps));
  if (deps.skill.skillId) builder.withSkillId(deps.skill.skillId);
  return builder;
}

/** Dependencies for the configured engine, bucket and voice. */
export function createSkillDependencies(config: AppConfig): SkillDependencies {
  const resolver = new AudioDeliveryResolver({
    tts: createTTS(config),
    storage: createRemoteStorage(config.delivery.storage),
    uploadFailurePolicy: config.delivery.uploadFailurePolicy,
    inlineMaxChars: config.delivery.inlineMaxChars,
  });
  return {
    speech: new SpeechSynthesizer(resolver, config.tts.voice),
    skill: config.skill,
    timeouts: config.timeouts,
  };
}
