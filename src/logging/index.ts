/**
 * Structured logging for the skill backend.
 * Logs synthesis, delivery decisions and errors with timestamps. JSON output for CloudWatch.
 * Pretty printing (pino-pretty) is used only for local runs, never when AWS_LAMBDA_FUNCTION_NAME is set.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info)
 *   LOG_FILE    - If set, also append all logs to this path (creates dirs if needed). Local debugging only.
 */

import pino from "pino";
import type { DeliveryReference } from "../delivery/types";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

/** Pretty output for local runs only; Jest, production and Lambda get plain JSON lines on stdout. */
export function prettyByDefault(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.AWS_LAMBDA_FUNCTION_NAME) return false;
  return env.NODE_ENV !== "production" && env.NODE_ENV !== "test";
}

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL),
  pretty: prettyByDefault(),
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Short, log-safe preview of spoken text. */
export function previewText(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Log TTS call (summary only). */
export function logTtsCall(log: pino.Logger, voiceId: string, textLength: number, audioBytes: number, durationMs?: number): void {
  log.info({ event: "TTS_CALL", voiceId, textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log the delivery decision; data URIs are never logged, only their length. */
export function logDelivery(log: pino.Logger, reference: DeliveryReference, durationMs?: number): void {
  const detail = reference.kind === "RemoteUrl" ? { url: reference.value } : { dataUriLength: reference.value.length };
  log.info({ event: "AUDIO_DELIVERY", kind: reference.kind, durationMs, ...detail }, "Audio delivery resolved");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, errName: err.name, stack: err.stack, ...context }, "Error");
}
