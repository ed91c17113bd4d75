/**
 * Alexa request handlers. Every spoken line goes through SpeechSynthesizer, so the skill answers
 * in the configured neural voice and degrades to Alexa's own voice on failure.
 */

import { getIntentName, getRequestType } from "ask-sdk-core";
import type { ErrorHandler, HandlerInput, RequestHandler } from "ask-sdk-core";
import type { Response } from "ask-sdk-model";
import type { AppConfig } from "../config";
import { logger, logError } from "../logging";
import { deadlineSignal } from "./deadline";
import type { SpeechSynthesizer, SynthesizedSpeech } from "./speech";

export const HELP_TEXT = "Ask me to motivate you!";
export const GOODBYE_TEXT = "Goodbye for now!";
export const FALLBACK_TEXT = "Sorry; I can't help with that. Only you can help you. You can ask me to motivate you.";
export const FALLBACK_REPROMPT = "Ask me to say something.";
export const ERROR_TEXT = "Sorry, there was a problem. Please try again!";

export interface SkillDependencies {
  speech: SpeechSynthesizer;
  skill: AppConfig["skill"];
  timeouts: AppConfig["timeouts"];
}

function isRequestType(input: HandlerInput, type: string): boolean {
  return getRequestType(input.requestEnvelope) === type;
}

function isIntent(input: HandlerInput, ...names: string[]): boolean {
  return isRequestType(input, "IntentRequest") && names.includes(getIntentName(input.requestEnvelope));
}

function respond(input: HandlerInput, skillName: string, speech: SynthesizedSpeech, endSession: boolean): Response {
  return input.responseBuilder
    .speak(speech.ssml)
    .withSimpleCard(skillName, speech.cardText)
    .withShouldEndSession(endSession)
    .getResponse();
}

export function createRequestHandlers(deps: SkillDependencies): RequestHandler[] {
  const { speech, skill, timeouts } = deps;
  const signalFor = (input: HandlerInput) => deadlineSignal(input.context, timeouts);

  const launch: RequestHandler = {
    canHandle: (input) => isRequestType(input, "LaunchRequest"),
    async handle(input) {
      const synth = await speech.speak(skill.responseText, {
        signal: signalFor(input),
        showError: skill.showSynthesisErrors,
      });
      return respond(input, skill.name, synth, true);
    },
  };

  const motivate: RequestHandler = {
    canHandle: (input) => isIntent(input, "MotivateIntent"),
    async handle(input) {
      const synth = await speech.speak(skill.responseText, { signal: signalFor(input) });
      return respond(input, skill.name, synth, true);
    },
  };

  const help: RequestHandler = {
    canHandle: (input) => isIntent(input, "AMAZON.HelpIntent"),
    async handle(input) {
      const synth = await speech.speak(HELP_TEXT, { signal: signalFor(input), showError: skill.showSynthesisErrors });
      return respond(input, skill.name, synth, false);
    },
  };

  const cancelAndStop: RequestHandler = {
    canHandle: (input) => isIntent(input, "AMAZON.CancelIntent", "AMAZON.StopIntent"),
    async handle(input) {
      const synth = await speech.speak(GOODBYE_TEXT, { signal: signalFor(input) });
      return respond(input, skill.name, synth, true);
    },
  };

  // Only raised in en-US; harmless elsewhere.
  const fallback: RequestHandler = {
    canHandle: (input) => isIntent(input, "AMAZON.FallbackIntent"),
    async handle(input) {
      const signal = signalFor(input);
      const synth = await speech.speak(FALLBACK_TEXT, { signal });
      const reprompt = await speech.speak(FALLBACK_REPROMPT, { signal });
      return input.responseBuilder.speak(synth.ssml).reprompt(reprompt.ssml).getResponse();
    },
  };

  const sessionEnded: RequestHandler = {
    canHandle: (input) => isRequestType(input, "SessionEndedRequest"),
    handle(input) {
      logger.info({ event: "SESSION_ENDED" }, "Session ended");
      return input.responseBuilder.getResponse();
    },
  };

  return [launch, motivate, help, cancelAndStop, fallback, sessionEnded];
}

export function createErrorHandler(deps: SkillDependencies): ErrorHandler {
  return {
    canHandle: () => true,
    async handle(input, error) {
      logError(logger, error, { event: "SKILL_ERROR", requestType: getRequestType(input.requestEnvelope) });
      const synth = await deps.speech.speak(ERROR_TEXT, { signal: deadlineSignal(input.context, deps.timeouts) });
      return input.responseBuilder.speak(synth.ssml).reprompt(synth.ssml).getResponse();
    },
  };
}
