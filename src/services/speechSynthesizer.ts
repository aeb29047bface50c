import OpenAI from "openai";
import { withTimeout } from "./timeout";

export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type TtsVoice = (typeof TTS_VOICES)[number];

export function isTtsVoice(value: string): value is TtsVoice {
  return TTS_VOICES.some((voice) => voice === value);
}

export interface SynthesizedAudio {
  audio: Buffer;
  format: "mp3";
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<SynthesizedAudio>;
}

/**
 * Small LRU map: reads refresh an entry, inserts past capacity drop the
 * least recently used one.
 */
export class LruCache<V> {
  private entries = new Map<string, V>();
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface SynthesizerOptions {
  model?: string;
  voice?: TtsVoice;
  timeoutMs?: number;
  cacheSize?: number;
}

/**
 * OpenAISpeechSynthesizer turns text into mp3 with OpenAI TTS.
 * Repeated phrases ("Correct!") are served from the cache.
 */
export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  private client: OpenAI;
  private model: string;
  private voice: TtsVoice;
  private timeoutMs: number;
  private cache: LruCache<Buffer>;

  constructor(apiKey?: string, options: SynthesizerOptions = {}) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = options.model ?? "tts-1";
    this.voice = options.voice ?? "nova";
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.cache = new LruCache(options.cacheSize ?? 100);
  }

  async synthesize(text: string): Promise<SynthesizedAudio> {
    const key = `${this.voice}:${text}`;
    const cached = this.cache.get(key);
    if (cached) {
      return { audio: cached, format: "mp3" };
    }

    const response = await withTimeout(
      this.client.audio.speech.create(
        { model: this.model, voice: this.voice, input: text },
        { timeout: this.timeoutMs, maxRetries: 0 }
      ),
      this.timeoutMs,
      "Speech synthesis"
    );
    const audio = Buffer.from(await response.arrayBuffer());
    console.log(`[TTS] Synthesized ${text.length} chars, audio size: ${audio.length} bytes`);

    this.cache.set(key, audio);
    return { audio, format: "mp3" };
  }
}
