import { QuestionRating, generateRatingId } from "../domain/rating";
import { isRating } from "../domain/intent";
import { invalidInput } from "../domain/errors";
import { RatingStore } from "../stores/ratingStore";

export interface RatingSubmission {
  questionId: string;
  userId?: string;
  sessionId?: string;
  rating: number;
  feedbackText?: string;
}

export interface RatingSummary {
  questionId: string;
  average: number | null;
  count: number;
}

/**
 * RatingService records question ratings and answers simple quality
 * questions about them.
 */
export class RatingService {
  private store: RatingStore;
  private now: () => Date;

  constructor(store: RatingStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  submitRating(submission: RatingSubmission): QuestionRating {
    const { rating } = submission;
    if (!isRating(rating)) {
      throw invalidInput("Rating must be an integer from 1 to 5", { rating });
    }
    if (!submission.questionId.trim()) {
      throw invalidInput("Question id is required");
    }

    const record: QuestionRating = {
      id: generateRatingId(),
      questionId: submission.questionId,
      userId: submission.userId,
      sessionId: submission.sessionId,
      rating,
      feedbackText: submission.feedbackText?.trim() || undefined,
      createdAt: this.now().toISOString(),
    };
    this.store.save(record);
    console.log(`[Ratings] Question ${record.questionId} rated ${rating}`);
    return record;
  }

  getRatings(questionId: string): QuestionRating[] {
    return this.store.getByQuestionId(questionId);
  }

  getAverageRating(questionId: string): RatingSummary {
    const ratings = this.getRatings(questionId);
    if (ratings.length === 0) {
      return { questionId, average: null, count: 0 };
    }
    const total = ratings.reduce((sum, r) => sum + r.rating, 0);
    return { questionId, average: Math.round((total / ratings.length) * 100) / 100, count: ratings.length };
  }

  /**
   * Questions whose average rating is at or below the threshold, worst first
   */
  getLowRatedQuestions(threshold: number = 2.5, minRatings: number = 1): RatingSummary[] {
    const byQuestion = new Map<string, number[]>();
    for (const r of this.store.getAll()) {
      const list = byQuestion.get(r.questionId) ?? [];
      list.push(r.rating);
      byQuestion.set(r.questionId, list);
    }

    const summaries: RatingSummary[] = [];
    for (const [questionId, values] of byQuestion) {
      if (values.length < minRatings) continue;
      const average = Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 100) / 100;
      if (average <= threshold) {
        summaries.push({ questionId, average, count: values.length });
      }
    }
    return summaries.sort((a, b) => (a.average ?? 0) - (b.average ?? 0));
  }
}
