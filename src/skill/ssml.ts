/**
 * SSML fragments for Alexa output speech.
 * ask-sdk's responseBuilder.speak() adds the surrounding <speak> element itself.
 */

import type { DeliveryReference } from "../delivery/types";

export function escapeSsml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** `<audio src="..."/>` pointing at remote or inline audio. */
export function audioTag(reference: DeliveryReference): string {
  return `<audio src="${escapeSsml(reference.value)}"/>`;
}

/** Text for the platform's built-in voice. */
export function plainSpeech(text: string): string {
  return escapeSsml(text);
}
