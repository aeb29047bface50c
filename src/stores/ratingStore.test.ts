import fs from "fs";
import path from "path";
import { FileRatingStore } from "./ratingStore";
import { QuestionRating } from "../domain/rating";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

describe("FileRatingStore", () => {
  const DATA_DIR = path.join(__dirname, "../../data/ratings");

  const createRating = (overrides: Partial<QuestionRating> = {}): QuestionRating => ({
    id: "rating_1",
    questionId: "geo-1",
    rating: 4,
    createdAt: "2026-01-01T10:00:00.000Z",
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "warn").mockImplementation(() => {});
    mockFs.existsSync.mockReturnValue(true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("constructor", () => {
    it("creates data directory if it does not exist", () => {
      mockFs.existsSync.mockReturnValue(false);

      new FileRatingStore();

      expect(mockFs.mkdirSync).toHaveBeenCalledWith(DATA_DIR, { recursive: true });
    });

    it("does not create directory if it already exists", () => {
      new FileRatingStore();

      expect(mockFs.mkdirSync).not.toHaveBeenCalled();
    });
  });

  describe("save", () => {
    it("writes one file per rating", () => {
      const rating = createRating({ id: "rating_abc" });

      new FileRatingStore().save(rating);

      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        path.join(DATA_DIR, "rating_abc.json"),
        JSON.stringify(rating, null, 2)
      );
    });
  });

  describe("getAll", () => {
    it("returns ratings newest first", () => {
      mockFs.readdirSync.mockReturnValue(["1.json", "2.json"] as any);
      mockFs.readFileSync
        .mockReturnValueOnce(JSON.stringify(createRating({ id: "old", createdAt: "2026-01-01T10:00:00.000Z" })))
        .mockReturnValueOnce(JSON.stringify(createRating({ id: "new", createdAt: "2026-01-02T10:00:00.000Z" })));

      const ratings = new FileRatingStore().getAll();

      expect(ratings.map((r) => r.id)).toEqual(["new", "old"]);
    });

    it("skips unreadable and invalid files", () => {
      mockFs.readdirSync.mockReturnValue(["1.json", "2.json", "3.json", "notes.txt"] as any);
      mockFs.readFileSync
        .mockReturnValueOnce("not json")
        .mockReturnValueOnce(JSON.stringify({ id: "bad", questionId: "geo-1", rating: 9, createdAt: "2026-01-01" }))
        .mockReturnValueOnce(JSON.stringify(createRating()));

      const ratings = new FileRatingStore().getAll();

      expect(ratings).toHaveLength(1);
      expect(ratings[0].id).toBe("rating_1");
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("returns an empty list when the directory is missing", () => {
      const store = new FileRatingStore();
      mockFs.existsSync.mockReturnValue(false);

      expect(store.getAll()).toEqual([]);
      expect(mockFs.readdirSync).not.toHaveBeenCalled();
    });
  });

  describe("getByQuestionId", () => {
    it("filters by question", () => {
      mockFs.readdirSync.mockReturnValue(["1.json", "2.json"] as any);
      mockFs.readFileSync
        .mockReturnValueOnce(JSON.stringify(createRating({ id: "a", questionId: "geo-1" })))
        .mockReturnValueOnce(JSON.stringify(createRating({ id: "b", questionId: "sci-1" })));

      const ratings = new FileRatingStore().getByQuestionId("sci-1");

      expect(ratings.map((r) => r.id)).toEqual(["b"]);
    });
  });
});
