import { randomBytes } from "crypto";
import { Rating, isRating } from "./intent";
import { isRecord, optionalString } from "./guards";

/**
 * A player's 1-5 opinion of a question, kept to spot weak questions.
 */
export interface QuestionRating {
  id: string;
  questionId: string;
  userId?: string;
  sessionId?: string;
  rating: Rating;
  feedbackText?: string;
  createdAt: string;
}

export function generateRatingId(): string {
  return `rating_${randomBytes(6).toString("hex")}`;
}

export function parseRating(raw: unknown): QuestionRating | null {
  if (!isRecord(raw)) return null;
  const id = optionalString(raw.id);
  const questionId = optionalString(raw.questionId);
  const createdAt = optionalString(raw.createdAt);
  const rating = raw.rating;
  if (!id || !questionId || !createdAt || !isRating(rating)) return null;
  return {
    id,
    questionId,
    userId: optionalString(raw.userId),
    sessionId: optionalString(raw.sessionId),
    rating,
    feedbackText: optionalString(raw.feedbackText),
    createdAt,
  };
}
