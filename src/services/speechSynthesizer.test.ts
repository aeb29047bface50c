import OpenAI from "openai";
import { LruCache, OpenAISpeechSynthesizer, isTtsVoice } from "./speechSynthesizer";

// Mock OpenAI
jest.mock("openai");

const MockedOpenAI = OpenAI as jest.MockedClass<typeof OpenAI>;

describe("LruCache", () => {
  it("drops the least recently used entry", () => {
    const cache = new LruCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
    expect(cache.size).toBe(2);
  });
});

describe("isTtsVoice", () => {
  it("accepts known voices only", () => {
    expect(isTtsVoice("nova")).toBe(true);
    expect(isTtsVoice("robot")).toBe(false);
  });
});

describe("OpenAISpeechSynthesizer", () => {
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "log").mockImplementation(() => {});

    mockCreate = jest.fn().mockResolvedValue({
      arrayBuffer: async () => Uint8Array.from(Buffer.from("mp3 bytes")).buffer,
    });
    MockedOpenAI.mockImplementation(
      () =>
        ({
          audio: {
            speech: {
              create: mockCreate,
            },
          },
        }) as unknown as OpenAI
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("synthesizes mp3 with the configured voice", async () => {
    const synthesizer = new OpenAISpeechSynthesizer("test-api-key", { voice: "alloy" });

    const result = await synthesizer.synthesize("Correct!");

    expect(result.format).toBe("mp3");
    expect(result.audio.toString()).toBe("mp3 bytes");
    expect(mockCreate).toHaveBeenCalledWith(
      { model: "tts-1", voice: "alloy", input: "Correct!" },
      { timeout: 8000, maxRetries: 0 }
    );
  });

  it("serves repeated phrases from the cache", async () => {
    const synthesizer = new OpenAISpeechSynthesizer("test-api-key");

    await synthesizer.synthesize("Correct!");
    await synthesizer.synthesize("Correct!");

    expect(mockCreate).toHaveBeenCalledTimes(1);
  });
});
