/**
 * Unit tests for config loading.
 */

import { DEFAULT_RESPONSE_TEXT, DEFAULT_VOICE, loadConfig } from "../../../src/config";

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.tts.provider).toBe("edge");
    expect(config.tts.voice).toBe(DEFAULT_VOICE);
    expect(config.delivery).toEqual({ storage: null, uploadFailurePolicy: "fallback", inlineMaxChars: 100_000 });
    expect(config.timeouts).toEqual({ synthesisTimeoutMs: 7000, marginMs: 500 });
    expect(config.skill.name).toBe("Custom TTS Voice");
    expect(config.skill.responseText).toBe(DEFAULT_RESPONSE_TEXT);
    expect(config.skill.showSynthesisErrors).toBe(true);
  });

  it("enables remote delivery only with both bucket and region", () => {
    expect(loadConfig({ S3_BUCKET: "test-bucket" }).delivery.storage).toBeNull();
    expect(loadConfig({ S3_REGION: "us-east-1" }).delivery.storage).toBeNull();
    expect(loadConfig({ S3_BUCKET: "test-bucket", S3_REGION: "us-east-1" }).delivery.storage).toEqual({
      bucketIdentifier: "test-bucket",
      region: "us-east-1",
      keyPrefix: "tts",
    });
  });

  it("takes the Lambda region when S3_REGION is unset", () => {
    const storage = loadConfig({ S3_BUCKET: "test-bucket", AWS_REGION: "ca-central-1", S3_KEY_PREFIX: "/voice/" })
      .delivery.storage;
    expect(storage).toEqual({ bucketIdentifier: "test-bucket", region: "ca-central-1", keyPrefix: "voice" });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ S3_BUCKET: "  ", S3_REGION: "us-east-1" }).delivery.storage).toBeNull();
    expect(loadConfig({ TTS_VOICE: "" }).tts.voice).toBe(DEFAULT_VOICE);
  });

  it("parses enums case-insensitively and falls back on unknown values", () => {
    expect(loadConfig({ TTS_PROVIDER: "Azure", UPLOAD_FAILURE_POLICY: "STRICT" }).tts.provider).toBe("azure");
    expect(loadConfig({ UPLOAD_FAILURE_POLICY: "STRICT" }).delivery.uploadFailurePolicy).toBe("strict");
    expect(loadConfig({ TTS_PROVIDER: "polly", UPLOAD_FAILURE_POLICY: "maybe" }).tts.provider).toBe("edge");
    expect(loadConfig({ UPLOAD_FAILURE_POLICY: "maybe" }).delivery.uploadFailurePolicy).toBe("fallback");
  });

  it("ignores invalid numbers", () => {
    const config = loadConfig({ INLINE_AUDIO_MAX_CHARS: "lots", SYNTHESIS_TIMEOUT_MS: "0", TIMEOUT_MARGIN_MS: "250" });
    expect(config.delivery.inlineMaxChars).toBe(100_000);
    expect(config.timeouts).toEqual({ synthesisTimeoutMs: 7000, marginMs: 250 });
  });

  it("parses skill settings", () => {
    const config = loadConfig({ SKILL_NAME: "Coach", SKILL_ID: "amzn1.ask.skill.test", SHOW_SYNTHESIS_ERRORS: "false" });
    expect(config.skill).toEqual({
      name: "Coach",
      responseText: DEFAULT_RESPONSE_TEXT,
      skillId: "amzn1.ask.skill.test",
      showSynthesisErrors: false,
    });
  });

  it("returns a frozen config", () => {
    const config = loadConfig({ S3_BUCKET: "test-bucket", S3_REGION: "us-east-1" });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.delivery)).toBe(true);
    expect(Object.isFrozen(config.delivery.storage)).toBe(true);
  });
});
