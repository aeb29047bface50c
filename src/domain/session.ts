import { randomBytes } from "crypto";
import { Difficulty, Question } from "./question";
import { EvaluationKind, EvaluationResult } from "./evaluation";

/**
 * A QuizSession is one complete quiz attempt. It lives only in memory and
 * disappears when it expires or is ended.
 *
 * Phases move forward only:
 *   idle -> asking -> awaiting_answer -> asking -> ... -> finished
 * asking: a question was selected and is being presented
 * awaiting_answer: the client fetched the question and is waiting on the player
 */
export type SessionPhase = "idle" | "asking" | "awaiting_answer" | "finished";

export type SessionMode = "single" | "multiplayer";

export type TtlMode = "fixed" | "sliding";

export interface Participant {
  id: string;
  userId?: string;
  displayName: string;
  score: number;
  answeredCount: number; // answers graded, skips excluded
  correctCount: number;
  lastAnswer?: string;
  lastResult?: EvaluationKind;
  isHost: boolean;
  joinedAt: string;
}

export interface QuizSession {
  id: string;
  userId?: string;
  mode: SessionMode;
  language: string;
  category?: string;
  participants: Participant[];

  maxQuestions: number;
  currentDifficulty: Difficulty;
  preferredTopics: string[];
  excludedTopics: string[];

  phase: SessionPhase;
  questionsAnswered: number;
  currentQuestion?: Question;
  lastQuestionId?: string; // most recently asked, kept after the quiz finishes for rating
  askedQuestionIds: string[]; // append-only
  clientExcludedIds: string[]; // history supplied by the client at start
  lastEvaluation?: EvaluationResult;

  createdAt: string;
  updatedAt: string;
  expiresAt: string;
  ttlSeconds: number;
}

export const ANSWERABLE_PHASES: readonly SessionPhase[] = ["asking", "awaiting_answer"];

const ALLOWED_TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  idle: ["asking", "finished"],
  asking: ["awaiting_answer", "asking", "finished"],
  awaiting_answer: ["asking", "finished"],
  finished: [],
};

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Move a session to a new phase, refusing anything that would regress.
 */
export function transition(session: QuizSession, to: SessionPhase): void {
  if (!canTransition(session.phase, to)) {
    throw new Error(`Illegal phase transition ${session.phase} -> ${to} for ${session.id}`);
  }
  session.phase = to;
}

export function isAnswerable(session: QuizSession): boolean {
  return ANSWERABLE_PHASES.includes(session.phase);
}

export function generateSessionId(): string {
  return `sess_${randomBytes(6).toString("hex")}`;
}

export function generateParticipantId(): string {
  return `p_${randomBytes(4).toString("hex")}`;
}

export function createParticipant(
  displayName: string,
  options: { userId?: string; isHost?: boolean; now?: Date } = {}
): Participant {
  return {
    id: generateParticipantId(),
    userId: options.userId,
    displayName,
    score: 0,
    answeredCount: 0,
    correctCount: 0,
    isHost: options.isHost ?? false,
    joinedAt: (options.now ?? new Date()).toISOString(),
  };
}

/**
 * The participant an input is attributed to: the named one, or the host.
 */
export function findParticipant(
  session: QuizSession,
  participantId?: string
): Participant | undefined {
  if (participantId) {
    return session.participants.find((p) => p.id === participantId);
  }
  return session.participants.find((p) => p.isHost) ?? session.participants[0];
}

/**
 * Apply a graded result to a participant. Points only ever add.
 */
export function recordResult(participant: Participant, evaluation: EvaluationResult): void {
  participant.score += Math.max(0, evaluation.points);
  participant.lastAnswer = evaluation.userAnswer;
  participant.lastResult = evaluation.kind;
  if (evaluation.kind !== "skipped") {
    participant.answeredCount += 1;
  }
  if (evaluation.kind === "correct") {
    participant.correctCount += 1;
  }
}

/**
 * Append to the exclusion list without ever duplicating an id.
 */
export function markAsked(session: QuizSession, questionId: string): void {
  if (!session.askedQuestionIds.includes(questionId)) {
    session.askedQuestionIds.push(questionId);
  }
}

export function addTopic(topics: string[], topic: string): boolean {
  const normalized = topic.trim().toLowerCase();
  if (!normalized || topics.includes(normalized)) {
    return false;
  }
  topics.push(normalized);
  return true;
}

export function totalScore(session: QuizSession): number {
  return session.participants.reduce((sum, p) => sum + p.score, 0);
}
