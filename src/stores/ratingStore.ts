import fs from "fs";
import path from "path";
import { QuestionRating, parseRating } from "../domain/rating";

const DATA_DIR = path.join(__dirname, "../../data/ratings");

export interface RatingStore {
  save(rating: QuestionRating): void;
  getByQuestionId(questionId: string): QuestionRating[];
  getAll(): QuestionRating[];
}

/**
 * FileRatingStore saves each rating as a separate file: {ratingId}.json
 */
export class FileRatingStore implements RatingStore {
  constructor() {
    if (!fs.existsSync(DATA_DIR)) {
      fs.mkdirSync(DATA_DIR, { recursive: true });
    }
  }

  /**
   * Save a rating to disk
   */
  save(rating: QuestionRating): void {
    const filePath = path.join(DATA_DIR, `${rating.id}.json`);
    fs.writeFileSync(filePath, JSON.stringify(rating, null, 2));
  }

  /**
   * Get all ratings for one question, newest first
   */
  getByQuestionId(questionId: string): QuestionRating[] {
    return this.getAll().filter((r) => r.questionId === questionId);
  }

  /**
   * Get all ratings, newest first
   */
  getAll(): QuestionRating[] {
    const ratings: QuestionRating[] = [];
    for (const file of this.listRatingFiles()) {
      const rating = this.loadFromFile(file);
      if (rating) {
        ratings.push(rating);
      }
    }
    return ratings.sort(
      (a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime()
    );
  }

  private listRatingFiles(): string[] {
    if (!fs.existsSync(DATA_DIR)) {
      return [];
    }
    return fs.readdirSync(DATA_DIR).filter((f) => f.endsWith(".json"));
  }

  private loadFromFile(filename: string): QuestionRating | null {
    try {
      const data = fs.readFileSync(path.join(DATA_DIR, filename), "utf-8");
      return parseRating(JSON.parse(data));
    } catch (error) {
      console.warn(`[RatingStore] Could not read ${filename}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
