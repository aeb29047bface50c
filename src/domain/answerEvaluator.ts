import { ChoiceLetter, Question, displayCorrectAnswer, isChoiceLetter, CHOICE_LETTERS } from "./question";
import { EvaluationResult, EvaluationTier, JudgedKind, pointsFor } from "./evaluation";
import { normalizeText } from "./textNormalization";
import { isTimeoutError, withTimeout } from "../services/timeout";

export interface JudgeRequest {
  questionText: string;
  correctAnswer: string;
  alternativeAnswers: string[];
  candidate: string;
}

export interface JudgeVerdict {
  kind: JudgedKind;
  rationale?: string;
}

/**
 * Second-tier grading for free-text answers that did not match exactly.
 * May reject; the evaluator turns every failure into a JudgeOutcome.
 */
export interface AnswerJudge {
  judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict>;
}

export type JudgeOutcome =
  | { status: "verdict"; kind: JudgedKind; rationale?: string }
  | { status: "timeout"; timeoutMs: number }
  | { status: "failed"; reason: string }
  | { status: "unavailable" };

/**
 * Anything other than a verdict grades as incorrect.
 */
export function resolveJudgeOutcome(outcome: JudgeOutcome): {
  kind: JudgedKind;
  tier: EvaluationTier;
  rationale?: string;
} {
  switch (outcome.status) {
    case "verdict":
      return { kind: outcome.kind, tier: "judge", rationale: outcome.rationale };
    case "timeout":
      return { kind: "incorrect", tier: "fallback", rationale: `Judge timed out after ${outcome.timeoutMs}ms` };
    case "failed":
      return { kind: "incorrect", tier: "fallback", rationale: `Judge failed: ${outcome.reason}` };
    case "unavailable":
      return { kind: "incorrect", tier: "fallback", rationale: "No judge configured" };
  }
}

/**
 * The option letter a multiple-choice answer refers to: "b", "B)", "option b",
 * or the option text itself.
 */
export function selectedChoice(candidate: string, question: Question): ChoiceLetter | null {
  const normalized = normalizeText(candidate);
  const match = /^(?:option |answer |letter )?([a-d])$/.exec(normalized);
  if (match && isChoiceLetter(match[1])) {
    return match[1];
  }
  if (question.possibleAnswers) {
    for (const letter of CHOICE_LETTERS) {
      if (normalizeText(question.possibleAnswers[letter]) === normalized) {
        return letter;
      }
    }
  }
  return null;
}

function correctChoice(question: Question): ChoiceLetter | null {
  const letter = question.correctAnswer.trim().toLowerCase();
  if (isChoiceLetter(letter)) {
    return letter;
  }
  return selectedChoice(question.correctAnswer, question);
}

/**
 * AnswerEvaluator grades an answer in two tiers:
 * 1. normalized exact match against the answer and its alternatives
 *    (multiple choice is decided here, right or wrong)
 * 2. an LLM judge for free text, bounded by a timeout
 */
export class AnswerEvaluator {
  private judge?: AnswerJudge;
  private timeoutMs: number;

  constructor(judge?: AnswerJudge, timeoutMs: number = 6000) {
    this.judge = judge;
    this.timeoutMs = timeoutMs;
  }

  async evaluate(candidate: string, question: Question, signal?: AbortSignal): Promise<EvaluationResult> {
    const userAnswer = candidate.trim();
    const correctAnswer = displayCorrectAnswer(question);

    if (!userAnswer) {
      return { kind: "skipped", points: pointsFor("skipped"), userAnswer, correctAnswer, tier: "none" };
    }

    if (question.type === "text_multichoice") {
      const chosen = selectedChoice(userAnswer, question);
      const kind = chosen !== null && chosen === correctChoice(question) ? "correct" : "incorrect";
      return { kind, points: pointsFor(kind), userAnswer, correctAnswer, tier: "choice" };
    }

    const normalized = normalizeText(userAnswer);
    const accepted = [question.correctAnswer, ...question.alternativeAnswers].map(normalizeText);
    if (accepted.includes(normalized)) {
      return { kind: "correct", points: pointsFor("correct"), userAnswer, correctAnswer, tier: "exact" };
    }

    const outcome = await this.runJudge({
      questionText: question.question,
      correctAnswer: question.correctAnswer,
      alternativeAnswers: question.alternativeAnswers,
      candidate: userAnswer,
    }, signal);
    if (outcome.status !== "verdict") {
      console.warn(`[Evaluator] Judge ${outcome.status} for question ${question.id}, grading as incorrect`);
    }

    const { kind, tier, rationale } = resolveJudgeOutcome(outcome);
    return { kind, points: pointsFor(kind), userAnswer, correctAnswer, tier, rationale };
  }

  private async runJudge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeOutcome> {
    if (!this.judge) {
      return { status: "unavailable" };
    }
    try {
      const verdict = await withTimeout(this.judge.judge(request, signal), this.timeoutMs, "Answer judging");
      return { status: "verdict", kind: verdict.kind, rationale: verdict.rationale };
    } catch (error) {
      if (isTimeoutError(error)) {
        return { status: "timeout", timeoutMs: error.timeoutMs };
      }
      return { status: "failed", reason: error instanceof Error ? error.message : String(error) };
    }
  }
}
