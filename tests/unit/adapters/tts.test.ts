/**
 * Unit tests for TTS adapters (stub, Edge, Azure, Google REST, factory).
 */

import {
  AzureTTS,
  EdgeNeuralTTS,
  GoogleCloudTTS,
  StubTTS,
  UnavailableTTS,
  createTTS,
  languageCodeFromVoice,
  raceAbort,
} from "../../../src/adapters/tts";
import { loadConfig } from "../../../src/config";
import { AudioDeliveryResolver } from "../../../src/delivery/resolver";
import { SpeechSynthesizer } from "../../../src/skill/speech";

const mockEdgeSynthesize = jest.fn();

jest.mock("@andresaya/edge-tts", () => ({
  EdgeTTS: class {
    synthesize(...args: unknown[]) {
      return mockEdgeSynthesize(...args);
    }
    toBuffer() {
      return Buffer.from("edge-audio");
    }
  },
}));

const VOICE = { voiceName: "en-CA-LiamNeural" };

afterEach(() => {
  jest.restoreAllMocks();
  mockEdgeSynthesize.mockReset();
});

describe("StubTTS", () => {
  it("returns a silent mp3-typed buffer of the configured size", async () => {
    const result = await new StubTTS(16).synthesize("Hello", VOICE);
    expect(result.mimeType).toBe("audio/mpeg");
    expect(result.bytes.equals(Buffer.alloc(16))).toBe(true);
  });

  it("rejects when the signal already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("deadline"));
    await expect(new StubTTS().synthesize("Hello", { ...VOICE, signal: controller.signal })).rejects.toThrow("deadline");
  });
});

describe("languageCodeFromVoice", () => {
  it("takes the locale prefix of neural voice names", () => {
    expect(languageCodeFromVoice("en-CA-LiamNeural")).toBe("en-CA");
    expect(languageCodeFromVoice("fil-PH-BlessicaNeural")).toBe("fil-PH");
  });

  it("defaults to en-US", () => {
    expect(languageCodeFromVoice("Joanna")).toBe("en-US");
  });
});

describe("raceAbort", () => {
  it("resolves with the wrapped promise when not aborted", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it("rejects with the abort reason while the wrapped promise is pending", async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => {}), controller.signal);
    controller.abort(new Error("deadline"));
    await expect(pending).rejects.toThrow("deadline");
  });
});

describe("EdgeNeuralTTS", () => {
  it("requests Alexa's mp3 profile for the given voice", async () => {
    mockEdgeSynthesize.mockResolvedValue(undefined);
    const result = await new EdgeNeuralTTS().synthesize("Keep going, you've got this!", VOICE);
    expect(mockEdgeSynthesize).toHaveBeenCalledWith("Keep going, you've got this!", "en-CA-LiamNeural", {
      outputFormat: "audio-24khz-48kbitrate-mono-mp3",
    });
    expect(result.mimeType).toBe("audio/mpeg");
    expect(result.bytes.toString()).toBe("edge-audio");
  });

  it("stops waiting when the signal aborts", async () => {
    mockEdgeSynthesize.mockReturnValue(new Promise(() => {}));
    const controller = new AbortController();
    const pending = new EdgeNeuralTTS().synthesize("Hello", { ...VOICE, signal: controller.signal });
    controller.abort(new Error("deadline"));
    await expect(pending).rejects.toThrow("deadline");
  });
});

describe("AzureTTS", () => {
  it("posts SSML for the voice and returns the mp3 body", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("azure-audio", { status: 200 }));
    const tts = new AzureTTS({ key: "test-key", region: "eastus" });

    const result = await tts.synthesize("Keep going, you've got this!", VOICE);

    expect(result.bytes.toString()).toBe("azure-audio");
    expect(result.mimeType).toBe("audio/mpeg");
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://eastus.tts.speech.microsoft.com/cognitiveservices/v1");
    expect(init?.headers).toEqual({
      "Ocp-Apim-Subscription-Key": "test-key",
      "Content-Type": "application/ssml+xml",
      "X-Microsoft-OutputFormat": "audio-24khz-48kbitrate-mono-mp3",
    });
    expect(init?.body).toBe(
      "<speak version='1.0' xml:lang='en-CA'><voice name='en-CA-LiamNeural'>Keep going, you&apos;ve got this!</voice></speak>"
    );
  });

  it("throws on a non-ok response", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("", { status: 401, statusText: "Unauthorized" }));
    await expect(new AzureTTS({ key: "test-key", region: "eastus" }).synthesize("Hi", VOICE)).rejects.toThrow(
      "Azure TTS failed: 401 Unauthorized"
    );
  });
});

describe("GoogleCloudTTS", () => {
  it("decodes audioContent from the REST response", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response(JSON.stringify({ audioContent: Buffer.from("google-audio").toString("base64") })));

    const result = await new GoogleCloudTTS({ apiKey: "test-key" }).synthesize("Hi", VOICE);

    expect(result.bytes.toString()).toBe("google-audio");
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://texttospeech.googleapis.com/v1/text:synthesize?key=test-key");
    expect(JSON.parse(String(init?.body))).toEqual({
      input: { text: "Hi" },
      voice: { name: "en-CA-LiamNeural", languageCode: "en-CA" },
      audioConfig: { audioEncoding: "MP3", sampleRateHertz: 24000 },
    });
  });

  it("returns empty audio when the response has no content", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("{}"));
    const result = await new GoogleCloudTTS({ apiKey: "test-key" }).synthesize("Hi", VOICE);
    expect(result.bytes.length).toBe(0);
  });
});

describe("createTTS", () => {
  it("defaults to the Edge adapter", () => {
    expect(createTTS(loadConfig({}))).toBeInstanceOf(EdgeNeuralTTS);
  });

  it("returns StubTTS when provider is stub", () => {
    expect(createTTS(loadConfig({ TTS_PROVIDER: "stub" }))).toBeInstanceOf(StubTTS);
  });

  it("uses the Google REST adapter when an API key is set", () => {
    expect(createTTS(loadConfig({ TTS_PROVIDER: "google", GOOGLE_CLOUD_TTS_API_KEY: "test-key" }))).toBeInstanceOf(
      GoogleCloudTTS
    );
  });

  it("uses Azure only with both key and region", () => {
    expect(createTTS(loadConfig({ TTS_PROVIDER: "azure", AZURE_TTS_KEY: "test-key" }))).toBeInstanceOf(UnavailableTTS);
    expect(createTTS(loadConfig({ TTS_PROVIDER: "azure", AZURE_TTS_REGION: "eastus" }))).toBeInstanceOf(UnavailableTTS);
    expect(
      createTTS(loadConfig({ TTS_PROVIDER: "azure", AZURE_TTS_KEY: "test-key", AZURE_TTS_REGION: "eastus" }))
    ).toBeInstanceOf(AzureTTS);
  });
});

describe("UnavailableTTS", () => {
  it("fails every call with its reason", async () => {
    await expect(new UnavailableTTS("not configured").synthesize()).rejects.toThrow("not configured");
  });

  it("makes a misconfigured Azure provider fall back to the platform voice", async () => {
    const tts = createTTS(loadConfig({ TTS_PROVIDER: "azure" }));
    const resolver = new AudioDeliveryResolver({ tts, storage: null });
    const speech = new SpeechSynthesizer(resolver, "en-CA-LiamNeural");

    const result = await speech.speak("Hi", { showError: true });

    expect(result).toEqual({
      ssml: "Hi. Error: SynthesisError",
      cardText:
        "Hi - ERROR: SynthesisError: Speech synthesis failed: Azure TTS is not configured: AZURE_TTS_KEY and AZURE_TTS_REGION are required",
      mode: "fallback",
    });
  });
});
