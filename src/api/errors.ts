import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { QuizError, isQuizError } from "../domain/errors";
import { isRecord } from "../domain/guards";

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

/**
 * Map anything thrown by a handler to a status and a JSON body.
 * body-parser reports its own failures as errors with a `type`,
 * multer as a MulterError with a `code`.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (isQuizError(error)) {
    return { status: error.statusCode, body: { error: error.toJSON() } };
  }

  if (error instanceof multer.MulterError) {
    const details = error.field ? { field: error.field } : undefined;
    const mapped =
      error.code === "LIMIT_FILE_SIZE"
        ? new QuizError("AUDIO_TOO_LARGE", "Audio file is too large", details)
        : new QuizError("INVALID_INPUT", `Upload rejected: ${error.message}`, details);
    return { status: mapped.statusCode, body: { error: mapped.toJSON() } };
  }

  if (isRecord(error) && typeof error.type === "string") {
    if (error.type === "entity.too.large") {
      const tooLarge = new QuizError("AUDIO_TOO_LARGE", "Request body is too large");
      return { status: tooLarge.statusCode, body: { error: tooLarge.toJSON() } };
    }
    if (error.type === "entity.parse.failed") {
      const malformed = new QuizError("INVALID_INPUT", "Malformed JSON body");
      return { status: malformed.statusCode, body: { error: malformed.toJSON() } };
    }
  }

  return {
    status: 500,
    body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
  };
}

// Express recognises error middleware by its four parameters
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error(`[API] ${req.method} ${req.originalUrl} failed:`, error);
  } else {
    console.warn(`[API] ${req.method} ${req.originalUrl} -> ${status} ${body.error.code}`);
  }
  res.status(status).json(body);
}
