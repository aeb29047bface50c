import { Request, Response } from "express";
import multer from "multer";
import { errorHandler, toErrorResponse } from "./errors";
import { QuizError, sessionNotFound } from "../domain/errors";

describe("toErrorResponse", () => {
  it("uses the status of a QuizError", () => {
    expect(toErrorResponse(sessionNotFound("sess_1"))).toEqual({
      status: 404,
      body: { error: { code: "SESSION_NOT_FOUND", message: "Session not found", details: { sessionId: "sess_1" } } },
    });
  });

  it("omits empty details", () => {
    expect(toErrorResponse(new QuizError("SESSION_BUSY", "Busy")).body).toEqual({
      error: { code: "SESSION_BUSY", message: "Busy" },
    });
  });

  it("maps body-parser failures", () => {
    const tooLarge = Object.assign(new Error("request entity too large"), { type: "entity.too.large" });
    const malformed = Object.assign(new Error("Unexpected token"), { type: "entity.parse.failed" });

    expect(toErrorResponse(tooLarge)).toEqual({
      status: 413,
      body: { error: { code: "AUDIO_TOO_LARGE", message: "Request body is too large" } },
    });
    expect(toErrorResponse(malformed).body.error.code).toBe("INVALID_INPUT");
  });

  it("maps multer upload failures", () => {
    expect(toErrorResponse(new multer.MulterError("LIMIT_FILE_SIZE", "audio"))).toEqual({
      status: 413,
      body: { error: { code: "AUDIO_TOO_LARGE", message: "Audio file is too large", details: { field: "audio" } } },
    });
    expect(toErrorResponse(new multer.MulterError("LIMIT_UNEXPECTED_FILE", "recording"))).toEqual({
      status: 400,
      body: {
        error: { code: "INVALID_INPUT", message: "Upload rejected: Unexpected field", details: { field: "recording" } },
      },
    });
  });

  it("hides unexpected errors", () => {
    expect(toErrorResponse(new Error("secret stack detail"))).toEqual({
      status: 500,
      body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
    });
  });
});

describe("errorHandler", () => {
  const createResponse = () => {
    const res = {
      status: jest.fn(),
      json: jest.fn(),
    };
    res.status.mockReturnValue(res);
    return res;
  };

  const req = { method: "POST", originalUrl: "/api/v1/sessions/sess_1/input" } as unknown as Request;

  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("writes the mapped response", () => {
    const res = createResponse();

    errorHandler(new QuizError("INVALID_PHASE", "Session is finished"), req, res as unknown as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({ error: { code: "INVALID_PHASE", message: "Session is finished" } });
    expect(console.warn).toHaveBeenCalledWith("[API] POST /api/v1/sessions/sess_1/input -> 409 INVALID_PHASE");
  });

  it("logs server errors", () => {
    const res = createResponse();
    const error = new Error("boom");

    errorHandler(error, req, res as unknown as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(500);
    expect(console.error).toHaveBeenCalledWith("[API] POST /api/v1/sessions/sess_1/input failed:", error);
  });
});
