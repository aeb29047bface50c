import OpenAI, { toFile } from "openai";
import { QuizError } from "../domain/errors";
import { withTimeout } from "./timeout";

export const SUPPORTED_AUDIO_FORMATS = ["mp3", "mp4", "mpeg", "mpga", "m4a", "wav", "webm", "ogg"] as const;

export type AudioFormat = (typeof SUPPORTED_AUDIO_FORMATS)[number];

export const DEFAULT_MAX_AUDIO_BYTES = 25 * 1024 * 1024;

export interface AudioInput {
  bytes: Buffer;
  filename: string;
  mimeType?: string;
}

export interface TranscriptionRequest {
  audio: AudioInput;
  language?: string; // ISO 639-1 hint
  prompt?: string; // context that biases recognition
}

export interface Transcriber {
  transcribe(request: TranscriptionRequest): Promise<string>;
}

function isAudioFormat(value: string): value is AudioFormat {
  return SUPPORTED_AUDIO_FORMATS.some((format) => format === value);
}

/**
 * Audio format from the file extension, or the MIME subtype when the
 * filename has none.
 */
export function audioFormat(audio: AudioInput): AudioFormat | null {
  const extension = audio.filename.includes(".")
    ? audio.filename.split(".").pop()?.toLowerCase() ?? ""
    : "";
  if (isAudioFormat(extension)) return extension;

  const subtype = audio.mimeType?.split("/")[1]?.split(";")[0]?.trim().toLowerCase() ?? "";
  if (subtype === "x-m4a") return "m4a";
  if (subtype === "x-wav" || subtype === "wave") return "wav";
  return isAudioFormat(subtype) ? subtype : null;
}

/**
 * Reject audio we know the transcription service will not take.
 */
export function validateAudio(audio: AudioInput, maxBytes: number = DEFAULT_MAX_AUDIO_BYTES): AudioFormat {
  if (audio.bytes.length === 0) {
    throw new QuizError("INVALID_INPUT", "Audio is empty");
  }
  if (audio.bytes.length > maxBytes) {
    throw new QuizError("AUDIO_TOO_LARGE", `Audio exceeds ${maxBytes} bytes`, {
      size: audio.bytes.length,
      maxBytes,
    });
  }
  const format = audioFormat(audio);
  if (!format) {
    throw new QuizError("UNSUPPORTED_AUDIO", "Unsupported audio format", {
      filename: audio.filename,
      supported: [...SUPPORTED_AUDIO_FORMATS],
    });
  }
  return format;
}

/**
 * OpenAITranscriber sends audio to Whisper.
 */
export class OpenAITranscriber implements Transcriber {
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;

  constructor(apiKey?: string, model: string = "whisper-1", timeoutMs: number = 15000) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    const { audio } = request;
    const started = Date.now();

    const transcription = await withTimeout(
      this.client.audio.transcriptions.create(
        {
          file: await toFile(audio.bytes, audio.filename),
          model: this.model,
          language: request.language,
          prompt: request.prompt,
        },
        { timeout: this.timeoutMs, maxRetries: 0 }
      ),
      this.timeoutMs,
      "Transcription"
    );

    console.log(`[Transcriber] ${audio.bytes.length} bytes transcribed in ${Date.now() - started}ms`);
    return transcription.text.trim();
  }
}
