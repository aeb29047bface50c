import {
  audioFromRequest,
  bodyOf,
  decodeAudio,
  optionalNumberField,
  optionalStringArrayField,
  queryFlag,
  queryNumber,
  requiredStringField,
} from "./requestParsing";

describe("requestParsing", () => {
  it("treats a missing body as empty and rejects non-objects", () => {
    expect(bodyOf(undefined)).toEqual({});
    expect(() => bodyOf(["text"])).toThrow("Request body must be a JSON object");
  });

  it("checks field types", () => {
    const body = { text: "Paris", count: "3", ids: ["a", 1] };

    expect(requiredStringField(body, "text")).toBe("Paris");
    expect(() => requiredStringField(body, "missing")).toThrow("missing is required");
    expect(() => optionalNumberField(body, "count")).toThrow("count must be a number");
    expect(() => optionalStringArrayField(body, "ids")).toThrow("ids must be an array of strings");
  });

  it("reads query values", () => {
    expect(queryFlag("true")).toBe(true);
    expect(queryFlag("1")).toBe(true);
    expect(queryFlag("yes")).toBe(false);
    expect(queryNumber("2.5", "threshold")).toBe(2.5);
    expect(queryNumber(undefined, "threshold")).toBeUndefined();
    expect(() => queryNumber("", "threshold")).toThrow("threshold must be a number");
  });

  it("decodes base64 audio with or without a data URL prefix", () => {
    const encoded = Buffer.from("fake audio").toString("base64");

    expect(decodeAudio(encoded).toString()).toBe("fake audio");
    expect(decodeAudio(`data:audio/webm;base64,${encoded}`).toString()).toBe("fake audio");
    expect(() => decodeAudio("")).toThrow("audio must be non-empty base64 data");
  });

  describe("audioFromRequest", () => {
    it("prefers an uploaded file", () => {
      const file = { buffer: Buffer.from("webm bytes"), originalname: "answer.webm", mimetype: "audio/webm" };

      expect(audioFromRequest(file, { audio: "aWdub3JlZA==" })).toEqual({
        bytes: Buffer.from("webm bytes"),
        filename: "answer.webm",
        mimeType: "audio/webm",
      });
    });

    it("names an unnamed upload", () => {
      const file = { buffer: Buffer.from("webm bytes"), originalname: "", mimetype: "" };

      expect(audioFromRequest(file, {})).toEqual({
        bytes: Buffer.from("webm bytes"),
        filename: "recording.webm",
        mimeType: undefined,
      });
    });

    it("rejects an empty upload", () => {
      const file = { buffer: Buffer.alloc(0), originalname: "answer.webm", mimetype: "audio/webm" };

      expect(() => audioFromRequest(file, {})).toThrow("audio file is empty");
    });

    it("falls back to base64 in the body", () => {
      expect(audioFromRequest(undefined, { audio: "d2F2IGJ5dGVz", filename: "answer.wav" })).toEqual({
        bytes: Buffer.from("wav bytes"),
        filename: "answer.wav",
        mimeType: undefined,
      });
      expect(() => audioFromRequest(undefined, {})).toThrow("audio is required");
    });
  });
});
