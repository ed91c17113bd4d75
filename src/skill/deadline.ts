/**
 * Request deadline derived from the host (Lambda) context, handed to synthesis and upload as an AbortSignal.
 */

import type { AppConfig } from "../config";

/** Lambda's context.getRemainingTimeInMillis(), when the host provides one. */
export function remainingTimeMs(hostContext: unknown): number | undefined {
  if (typeof hostContext !== "object" || hostContext === null) return undefined;
  if (!("getRemainingTimeInMillis" in hostContext)) return undefined;
  const getRemaining = hostContext.getRemainingTimeInMillis;
  if (typeof getRemaining !== "function") return undefined;
  const remaining: unknown = getRemaining.call(hostContext);
  return typeof remaining === "number" && Number.isFinite(remaining) ? remaining : undefined;
}

/** Budget in ms: the configured cap, shortened to what the host has left minus the margin. */
export function deadlineMs(hostContext: unknown, timeouts: AppConfig["timeouts"]): number {
  const remaining = remainingTimeMs(hostContext);
  const budget =
    remaining === undefined ? timeouts.synthesisTimeoutMs : Math.min(timeouts.synthesisTimeoutMs, remaining - timeouts.marginMs);
  return Math.max(1, budget);
}

export function deadlineSignal(hostContext: unknown, timeouts: AppConfig["timeouts"]): AbortSignal {
  return AbortSignal.timeout(deadlineMs(hostContext, timeouts));
}
