import { Difficulty, Question, difficultiesByDistance } from "../domain/question";
import { QuizError } from "../domain/errors";
import { QuestionFilters, QuestionStore } from "../stores/questionStore";
import { isTimeoutError, withTimeout } from "./timeout";

export interface SelectionCriteria {
  excludeIds: string[];
  difficulty: Difficulty;
  category?: string;
  excludedTopics: string[];
  preferredTopics: string[];
  previousTopic?: string;
}

export type RelaxationStep = "none" | "topics" | "difficulty" | "category";

export interface Selection {
  question: Question;
  relaxed: RelaxationStep;
}

interface Attempt {
  relaxed: RelaxationStep;
  filters: QuestionFilters;
}

/**
 * The order in which filters are given up when nothing matches:
 * excluded topics, then difficulty (closest first), then category.
 * Exclusion ids are never relaxed.
 */
export function relaxationLadder(criteria: SelectionCriteria): Attempt[] {
  const base = {
    excludeIds: criteria.excludeIds,
    preferredTopics: criteria.preferredTopics,
    previousTopic: criteria.previousTopic,
    limit: 1,
  };

  const attempts: Attempt[] = [
    {
      relaxed: "none",
      filters: {
        ...base,
        difficulty: criteria.difficulty,
        category: criteria.category,
        excludedTopics: criteria.excludedTopics,
      },
    },
  ];

  if (criteria.excludedTopics.length > 0) {
    attempts.push({
      relaxed: "topics",
      filters: { ...base, difficulty: criteria.difficulty, category: criteria.category },
    });
  }

  for (const difficulty of difficultiesByDistance(criteria.difficulty)) {
    if (difficulty === criteria.difficulty) continue;
    attempts.push({ relaxed: "difficulty", filters: { ...base, difficulty, category: criteria.category } });
  }

  if (criteria.category) {
    attempts.push({ relaxed: "category", filters: { ...base } });
  }

  return attempts;
}

/**
 * QuestionSelector picks the next question, relaxing filters step by step
 * until something matches. Each store call is bounded by a timeout.
 */
export class QuestionSelector {
  private store: QuestionStore;
  private timeoutMs: number;

  constructor(store: QuestionStore, timeoutMs: number = 3000) {
    this.store = store;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Returns null when the corpus has nothing left for this session.
   * With strict set, a failing or slow store raises QUESTION_UNAVAILABLE
   * instead of counting as an empty step. An aborted signal stops the
   * ladder with the abort reason.
   */
  async select(
    criteria: SelectionCriteria,
    options: { strict?: boolean; signal?: AbortSignal } = {}
  ): Promise<Selection | null> {
    for (const attempt of relaxationLadder(criteria)) {
      options.signal?.throwIfAborted();
      let found: Question[];
      try {
        found = await withTimeout(this.store.query(attempt.filters), this.timeoutMs, "Question retrieval");
      } catch (error) {
        const reason = isTimeoutError(error) ? "timed out" : error instanceof Error ? error.message : String(error);
        if (options.strict) {
          console.error(`[QuestionSelector] Retrieval failed: ${reason}`);
          throw new QuizError("QUESTION_UNAVAILABLE", "Could not retrieve a question", { reason });
        }
        console.warn(`[QuestionSelector] Retrieval ${reason} at relaxation step "${attempt.relaxed}"`);
        continue;
      }

      const question = found[0];
      if (question) {
        if (attempt.relaxed !== "none") {
          console.log(`[QuestionSelector] Relaxed ${attempt.relaxed} filter to find ${question.id}`);
        }
        return { question, relaxed: attempt.relaxed };
      }
    }
    return null;
  }
}
