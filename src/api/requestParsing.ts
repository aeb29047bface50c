import { invalidInput } from "../domain/errors";
import { isRecord, isStringArray } from "../domain/guards";
import { AudioInput } from "../services/transcriber";

/**
 * Helpers for reading untyped request input. Each returns undefined when
 * the field is absent and throws INVALID_INPUT when it has the wrong type.
 */

export function bodyOf(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) {
    throw invalidInput("Request body must be a JSON object");
  }
  return body;
}

export function optionalStringField(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw invalidInput(`${key} must be a string`);
  }
  return value;
}

export function requiredStringField(body: Record<string, unknown>, key: string): string {
  const value = optionalStringField(body, key);
  if (value === undefined) {
    throw invalidInput(`${key} is required`);
  }
  return value;
}

export function optionalNumberField(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalidInput(`${key} must be a number`);
  }
  return value;
}

export function optionalStringArrayField(body: Record<string, unknown>, key: string): string[] | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (!isStringArray(value)) {
    throw invalidInput(`${key} must be an array of strings`);
  }
  return value;
}

/**
 * Query flags: "true" or "1" mean yes, anything else no.
 */
export function queryFlag(value: unknown): boolean {
  return value === "true" || value === "1";
}

export function queryNumber(value: unknown, key: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw invalidInput(`${key} must be a number`);
  }
  return parsed;
}

/**
 * Decode base64 audio. Accepts a data URL prefix.
 */
export function decodeAudio(value: string): Buffer {
  const payload = value.includes(",") && value.startsWith("data:") ? value.slice(value.indexOf(",") + 1) : value;
  const bytes = Buffer.from(payload, "base64");
  if (bytes.length === 0) {
    throw invalidInput("audio must be non-empty base64 data");
  }
  return bytes;
}

/**
 * The parts of a multipart upload the transcriber needs.
 */
export interface UploadedAudio {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
}

/**
 * Audio from a multipart file when one was sent, otherwise from the
 * base64 "audio" field of the body.
 */
export function audioFromRequest(file: UploadedAudio | undefined, body: Record<string, unknown>): AudioInput {
  if (file) {
    if (file.buffer.length === 0) {
      throw invalidInput("audio file is empty");
    }
    return {
      bytes: file.buffer,
      filename: file.originalname || "recording.webm",
      mimeType: file.mimetype || undefined,
    };
  }
  return {
    bytes: decodeAudio(requiredStringField(body, "audio")),
    filename: optionalStringField(body, "filename") ?? "recording.webm",
    mimeType: optionalStringField(body, "mime_type"),
  };
}
