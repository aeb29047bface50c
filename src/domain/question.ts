/**
 * A Question is an immutable trivia record owned by the question store.
 * Sessions only ever reference questions by id (the exclusion list) and
 * hold a copy of the one currently being asked.
 */

export type Difficulty = "easy" | "medium" | "hard";

export type QuestionType = "text" | "text_multichoice";

export type ChoiceLetter = "a" | "b" | "c" | "d";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

export const CHOICE_LETTERS: readonly ChoiceLetter[] = ["a", "b", "c", "d"];

export interface Question {
  id: string;
  question: string;
  type: QuestionType;
  possibleAnswers?: Record<ChoiceLetter, string>; // multichoice only
  correctAnswer: string; // answer text, or the option letter for multichoice
  alternativeAnswers: string[];
  difficulty: Difficulty;
  topic: string;
  category: string;
  explanation?: string;
}

/**
 * What clients get to see: everything except the answers.
 */
export interface PublicQuestion {
  id: string;
  question: string;
  type: QuestionType;
  possibleAnswers?: Record<ChoiceLetter, string>;
  difficulty: Difficulty;
  topic: string;
  category: string;
}

export function toPublicQuestion(question: Question): PublicQuestion {
  return {
    id: question.id,
    question: question.question,
    type: question.type,
    possibleAnswers: question.possibleAnswers,
    difficulty: question.difficulty,
    topic: question.topic,
    category: question.category,
  };
}

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === "string" && (DIFFICULTIES as readonly string[]).includes(value);
}

export function isChoiceLetter(value: unknown): value is ChoiceLetter {
  return typeof value === "string" && (CHOICE_LETTERS as readonly string[]).includes(value);
}

/**
 * Move one or more steps along easy < medium < hard.
 * Clamped at both ends, so "harder" on hard stays hard.
 */
export function stepDifficulty(current: Difficulty, delta: number): Difficulty {
  const index = DIFFICULTIES.indexOf(current);
  const next = Math.min(DIFFICULTIES.length - 1, Math.max(0, index + delta));
  return DIFFICULTIES[next];
}

/**
 * Difficulties ordered by distance from the target, nearest first.
 * Ties prefer the easier level.
 */
export function difficultiesByDistance(target: Difficulty): Difficulty[] {
  const targetIndex = DIFFICULTIES.indexOf(target);
  return [...DIFFICULTIES].sort(
    (a, b) =>
      Math.abs(DIFFICULTIES.indexOf(a) - targetIndex) -
        Math.abs(DIFFICULTIES.indexOf(b) - targetIndex) ||
      DIFFICULTIES.indexOf(a) - DIFFICULTIES.indexOf(b)
  );
}

/**
 * Human-readable correct answer ("b) Paris" for multichoice).
 */
export function displayCorrectAnswer(question: Question): string {
  if (question.type === "text_multichoice" && question.possibleAnswers) {
    const letter = question.correctAnswer.toLowerCase();
    if (isChoiceLetter(letter)) {
      return `${letter}) ${question.possibleAnswers[letter]}`;
    }
  }
  return question.correctAnswer;
}
