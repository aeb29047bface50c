import fs from "fs";
import path from "path";
import os from "os";
import { execFileSync } from "child_process";
import { record } from "node-record-lpcm16";

const MIN_SPEECH_BYTES = 1000;
const MAX_RECORDING_MS = 30000;

/**
 * Record from the microphone until the speaker pauses, for at most
 * MAX_RECORDING_MS. Resolves null when nothing audible was captured.
 */
export function recordAnswer(): Promise<Buffer | null> {
  console.log("\n🎤 Listening... (speak now, stops when you pause)");

  return new Promise((resolve) => {
    const recording = record({
      sampleRate: 16000,
      channels: 1,
      audioType: "wav",
      recorder: "sox",
      endOnSilence: true,
      silence: "2.0", // seconds of silence before stopping
      thresholdStart: 0.5,
      thresholdEnd: 0.5,
    });

    const chunks: Buffer[] = [];
    const stream = recording.stream();
    const limit = setTimeout(() => recording.stop(), MAX_RECORDING_MS);

    stream.on("data", (chunk: Buffer) => chunks.push(chunk));

    stream.on("end", () => {
      clearTimeout(limit);
      const audio = Buffer.concat(chunks);
      if (audio.length < MIN_SPEECH_BYTES) {
        console.log("No speech detected. Please try again.\n");
        resolve(null);
        return;
      }
      resolve(audio);
    });

    stream.on("error", (err: Error) => {
      clearTimeout(limit);
      console.error("Recording error:", err.message);
      resolve(null);
    });
  });
}

/**
 * Play mp3 audio with afplay (macOS) or sox's play. Text is always shown,
 * so a missing player only costs the sound.
 */
export function playAudio(audio: Buffer): void {
  const tempFile = path.join(os.tmpdir(), `trivia-speech-${Date.now()}.mp3`);
  fs.writeFileSync(tempFile, audio);

  try {
    for (const player of ["afplay", "play"]) {
      try {
        execFileSync(player, [tempFile], { stdio: "ignore" });
        return;
      } catch {
        continue;
      }
    }
    console.warn("(No audio player found: install sox or use macOS afplay)");
  } finally {
    fs.unlinkSync(tempFile);
  }
}
