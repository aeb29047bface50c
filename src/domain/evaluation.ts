export type EvaluationKind =
  | "correct"
  | "partially_correct"
  | "partially_incorrect"
  | "incorrect"
  | "skipped";

// The kinds a judge is allowed to return
export type JudgedKind = Exclude<EvaluationKind, "skipped">;

export const JUDGED_KINDS: readonly JudgedKind[] = [
  "correct",
  "partially_correct",
  "partially_incorrect",
  "incorrect",
];

/**
 * Which step of the evaluator decided the result.
 * - exact: normalized match against the answer or an alternative
 * - choice: multiple-choice letter comparison
 * - judge: LLM verdict
 * - fallback: judge unavailable, timed out or unreadable
 * - none: nothing was evaluated (skip)
 */
export type EvaluationTier = "exact" | "choice" | "judge" | "fallback" | "none";

export interface EvaluationResult {
  kind: EvaluationKind;
  points: number;
  userAnswer: string;
  correctAnswer: string;
  tier: EvaluationTier;
  rationale?: string;
}

const POINTS: Record<EvaluationKind, number> = {
  correct: 1.0,
  partially_correct: 0.5,
  partially_incorrect: 0.25,
  incorrect: 0.0,
  skipped: 0.0,
};

export function pointsFor(kind: EvaluationKind): number {
  return POINTS[kind];
}

export function isJudgedKind(value: unknown): value is JudgedKind {
  return typeof value === "string" && (JUDGED_KINDS as readonly string[]).includes(value);
}
