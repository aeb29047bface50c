/**
 * Typed failures surfaced to callers. Each code maps to exactly one
 * HTTP status so the API layer never has to guess.
 */

export type QuizErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_INPUT"
  | "SESSION_NOT_FOUND"
  | "SESSION_EXPIRED"
  | "PARTICIPANT_NOT_FOUND"
  | "QUESTION_NOT_FOUND"
  | "NO_QUESTION_TO_RATE"
  | "INVALID_PHASE"
  | "SESSION_BUSY"
  | "AUDIO_TOO_LARGE"
  | "UNSUPPORTED_AUDIO"
  | "TRANSCRIPTION_FAILED"
  | "QUESTION_UNAVAILABLE"
  | "SERVICE_UNAVAILABLE"
  | "OPERATION_TIMEOUT";

const STATUS_BY_CODE: Record<QuizErrorCode, number> = {
  INVALID_CONFIG: 400,
  INVALID_INPUT: 400,
  SESSION_NOT_FOUND: 404,
  SESSION_EXPIRED: 404,
  PARTICIPANT_NOT_FOUND: 404,
  QUESTION_NOT_FOUND: 404,
  NO_QUESTION_TO_RATE: 404,
  INVALID_PHASE: 409,
  SESSION_BUSY: 429,
  AUDIO_TOO_LARGE: 413,
  UNSUPPORTED_AUDIO: 422,
  TRANSCRIPTION_FAILED: 422,
  QUESTION_UNAVAILABLE: 503,
  SERVICE_UNAVAILABLE: 503,
  OPERATION_TIMEOUT: 503,
};

export class QuizError extends Error {
  public readonly code: QuizErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: QuizErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "QuizError";
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export function isQuizError(error: unknown, code?: QuizErrorCode): error is QuizError {
  return error instanceof QuizError && (code === undefined || error.code === code);
}

// Factories

export function invalidConfig(message: string, details?: Record<string, unknown>): QuizError {
  return new QuizError("INVALID_CONFIG", message, details);
}

export function invalidInput(message: string, details?: Record<string, unknown>): QuizError {
  return new QuizError("INVALID_INPUT", message, details);
}

export function sessionNotFound(sessionId: string): QuizError {
  return new QuizError("SESSION_NOT_FOUND", "Session not found", { sessionId });
}

export function sessionExpired(sessionId: string): QuizError {
  return new QuizError("SESSION_EXPIRED", "Session has expired", { sessionId });
}

export function participantNotFound(sessionId: string, participantId: string): QuizError {
  return new QuizError("PARTICIPANT_NOT_FOUND", "Participant not found", {
    sessionId,
    participantId,
  });
}

export function questionNotFound(questionId: string): QuizError {
  return new QuizError("QUESTION_NOT_FOUND", "Question not found", { questionId });
}

export function invalidPhase(sessionId: string, phase: string, expected: string[]): QuizError {
  return new QuizError("INVALID_PHASE", `Session is ${phase}, expected ${expected.join(" or ")}`, {
    sessionId,
    phase,
  });
}

export function sessionBusy(sessionId: string, waitedMs: number): QuizError {
  return new QuizError("SESSION_BUSY", "Session is busy with another request, retry shortly", {
    sessionId,
    waitedMs,
  });
}
