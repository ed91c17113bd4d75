/**
 * Env-based configuration for the skill backend.
 * Load from .env.local (or process.env / Lambda environment). Do not commit secrets.
 * Read once at cold start; the resulting object is frozen and passed explicitly to factories.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { DEFAULT_INLINE_MAX_CHARS } from "../delivery/data-uri";
import type { StorageConfig, UploadFailurePolicy } from "../delivery/types";

// Load .env.local from project root when present
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type TtsProvider = "edge" | "google" | "azure" | "stub";

const TTS_PROVIDERS: readonly TtsProvider[] = ["edge", "google", "azure", "stub"];
const UPLOAD_FAILURE_POLICIES: readonly UploadFailurePolicy[] = ["fallback", "strict"];

export const DEFAULT_VOICE = "en-CA-LiamNeural";
export const DEFAULT_RESPONSE_TEXT = "Keep going, you've got this!";

export interface AppConfig {
  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    voice: string;
    googleApiKey?: string;
    azureKey?: string;
    azureRegion?: string;
  };

  /** Audio delivery: remote bucket (null = inline only) and inline limits */
  delivery: {
    storage: StorageConfig | null;
    uploadFailurePolicy: UploadFailurePolicy;
    /** Max data URI length accepted by the voice platform's SSML payload. */
    inlineMaxChars: number;
  };

  /** Deadline handling for synthesis + upload */
  timeouts: {
    /** Hard cap for one synthesize-and-deliver round. */
    synthesisTimeoutMs: number;
    /** Kept free of the host's remaining time to build and return the response. */
    marginMs: number;
  };

  /** Alexa skill surface */
  skill: {
    name: string;
    responseText: string;
    /** When set, requests for other skill ids are rejected. */
    skillId?: string;
    /** Add error details to launch/help fallbacks (diagnostics while setting up). */
    showSynthesisErrors: boolean;
  };
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

function getEnvInt(env: Env, key: string, defaultValue: number, min = 0): number {
  const v = getEnv(env, key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const v = getEnv(env, key)?.toLowerCase();
  if (v == null) return defaultValue;
  return v === "true" || v === "1" || v === "on";
}

function getEnvChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
  const v = getEnv(env, key)?.toLowerCase();
  return choices.find((c) => c === v) ?? defaultValue;
}

/** Bucket and region are both required; either one missing disables remote delivery. */
function loadStorageConfig(env: Env): StorageConfig | null {
  const bucketIdentifier = getEnv(env, "S3_BUCKET");
  const region = getEnv(env, "S3_REGION") ?? getEnv(env, "AWS_REGION");
  if (!bucketIdentifier || !region) return null;
  return Object.freeze({
    bucketIdentifier,
    region,
    keyPrefix: (getEnv(env, "S3_KEY_PREFIX") ?? "tts").replace(/^\/+|\/+$/g, ""),
  });
}

/**
 * Build config from environment variables.
 * TTS_PROVIDER selects the engine (edge, google, azure, stub); S3_BUCKET + S3_REGION enable remote delivery.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    tts: {
      provider: getEnvChoice(env, "TTS_PROVIDER", TTS_PROVIDERS, "edge"),
      voice: getEnv(env, "TTS_VOICE") ?? DEFAULT_VOICE,
      googleApiKey: getEnv(env, "GOOGLE_CLOUD_TTS_API_KEY"),
      azureKey: getEnv(env, "AZURE_TTS_KEY"),
      azureRegion: getEnv(env, "AZURE_TTS_REGION"),
    },
    delivery: {
      storage: loadStorageConfig(env),
      uploadFailurePolicy: getEnvChoice(env, "UPLOAD_FAILURE_POLICY", UPLOAD_FAILURE_POLICIES, "fallback"),
      inlineMaxChars: getEnvInt(env, "INLINE_AUDIO_MAX_CHARS", DEFAULT_INLINE_MAX_CHARS, 1),
    },
    timeouts: {
      synthesisTimeoutMs: getEnvInt(env, "SYNTHESIS_TIMEOUT_MS", 7000, 1),
      marginMs: getEnvInt(env, "TIMEOUT_MARGIN_MS", 500),
    },
    skill: {
      name: getEnv(env, "SKILL_NAME") ?? "Custom TTS Voice",
      responseText: getEnv(env, "RESPONSE_TEXT") ?? DEFAULT_RESPONSE_TEXT,
      skillId: getEnv(env, "SKILL_ID"),
      showSynthesisErrors: getEnvBool(env, "SHOW_SYNTHESIS_ERRORS", true),
    },
  };
  return deepFreeze(config);
}

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  Object.freeze(obj);
  return obj;
}
