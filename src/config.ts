import path from "path";
import { TtlMode } from "./domain/session";
import { TtsVoice, isTtsVoice } from "./services/speechSynthesizer";
import { DEFAULT_MAX_AUDIO_BYTES } from "./services/transcriber";

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  openaiApiKey?: string;
  chatModel: string;
  transcribeModel: string;
  ttsModel: string;
  ttsVoice: TtsVoice;
  questionsFile: string;
  sessionTtlSeconds: number;
  ttlMode: TtlMode;
  sweepIntervalMs: number;
  lockWaitMs: number;
  lockCeilingMs: number;
  transcribeTimeoutMs: number;
  intentTimeoutMs: number;
  judgeTimeoutMs: number;
  retrievalTimeoutMs: number;
  ttsTimeoutMs: number;
  maxAudioBytes: number;
}

type Env = Record<string, string | undefined>;

function positiveNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[Config] Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function text(env: Env, key: string, fallback: string): string {
  return env[key]?.trim() || fallback;
}

/**
 * Read configuration from the environment. Every key is optional.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const ttlModeRaw = text(env, "SESSION_TTL_MODE", "sliding");
  let ttlMode: TtlMode = "sliding";
  if (ttlModeRaw === "fixed" || ttlModeRaw === "sliding") {
    ttlMode = ttlModeRaw;
  } else {
    console.warn(`[Config] Ignoring invalid SESSION_TTL_MODE="${ttlModeRaw}", using sliding`);
  }

  const voiceRaw = text(env, "TTS_VOICE", "nova");
  let ttsVoice: TtsVoice = "nova";
  if (isTtsVoice(voiceRaw)) {
    ttsVoice = voiceRaw;
  } else {
    console.warn(`[Config] Ignoring unknown TTS_VOICE="${voiceRaw}", using nova`);
  }

  const corsOrigins = text(env, "CORS_ORIGINS", "http://localhost:5173,http://localhost:3000")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return Object.freeze({
    port: positiveNumber(env, "API_PORT", 3002),
    corsOrigins,
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    chatModel: text(env, "OPENAI_CHAT_MODEL", "gpt-4o-mini"),
    transcribeModel: text(env, "OPENAI_TRANSCRIBE_MODEL", "whisper-1"),
    ttsModel: text(env, "OPENAI_TTS_MODEL", "tts-1"),
    ttsVoice,
    questionsFile: text(env, "QUESTIONS_FILE", path.join(__dirname, "../data/questions.json")),
    sessionTtlSeconds: positiveNumber(env, "SESSION_TTL_MINUTES", 30) * 60,
    ttlMode,
    sweepIntervalMs: positiveNumber(env, "SESSION_SWEEP_SECONDS", 300) * 1000,
    lockWaitMs: positiveNumber(env, "LOCK_WAIT_MS", 5000),
    lockCeilingMs: positiveNumber(env, "LOCK_CEILING_MS", 45000),
    transcribeTimeoutMs: positiveNumber(env, "TRANSCRIBE_TIMEOUT_MS", 15000),
    intentTimeoutMs: positiveNumber(env, "INTENT_TIMEOUT_MS", 6000),
    judgeTimeoutMs: positiveNumber(env, "JUDGE_TIMEOUT_MS", 6000),
    retrievalTimeoutMs: positiveNumber(env, "RETRIEVAL_TIMEOUT_MS", 3000),
    ttsTimeoutMs: positiveNumber(env, "TTS_TIMEOUT_MS", 8000),
    maxAudioBytes: positiveNumber(env, "MAX_AUDIO_BYTES", DEFAULT_MAX_AUDIO_BYTES),
  });
}
