/**
 * Lambda entry point: load config once per cold start and export the ask-sdk handler.
 * Set the Lambda handler to `main.handler`.
 */

import { loadConfig } from "./config";
import { logger } from "./logging";
import { createSkillBuilder, createSkillDependencies } from "./skill";

const config = loadConfig();

logger.info(
  {
    event: "SKILL_INIT",
    ttsProvider: config.tts.provider,
    voice: config.tts.voice,
    remoteDelivery: config.delivery.storage !== null,
    uploadFailurePolicy: config.delivery.uploadFailurePolicy,
  },
  "Skill initialized"
);

export const handler = createSkillBuilder(createSkillDependencies(config)).lambda();
