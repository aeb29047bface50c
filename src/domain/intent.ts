import { Difficulty } from "./question";
import { tokenSimilarity } from "./textNormalization";

/**
 * Intents extracted from a single utterance. One utterance can carry
 * several: "Paris, but too easy" is an answer plus a rating plus a
 * difficulty change.
 */

export type Rating = 1 | 2 | 3 | 4 | 5;

export type DifficultyChange =
  | { kind: "step"; delta: 1 | -1 }
  | { kind: "set"; level: Difficulty };

export type TopicAction = "exclude" | "prefer";

export type Intent =
  | { type: "answer"; text: string }
  | { type: "skip" }
  | { type: "quit" }
  | { type: "rating"; rating: Rating; feedback?: string }
  | { type: "difficulty"; change: DifficultyChange }
  | { type: "topic_preference"; action: TopicAction; topic: string };

export type IntentSource = "rules" | "llm" | "fallback";

export interface IntentBundle {
  intents: Intent[];
  source: IntentSource;
}

export const MAX_ANSWER_LENGTH = 100;
const QUESTION_ECHO_THRESHOLD = 0.7;

export function isRating(value: unknown): value is Rating {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 5;
}

/**
 * The bundle used when nothing smarter is available: the whole text is the answer.
 */
export function literalAnswerBundle(text: string): IntentBundle {
  const trimmed = text.trim();
  return {
    intents: trimmed ? [{ type: "answer", text: trimmed }] : [],
    source: "fallback",
  };
}

export function hasCommand(bundle: IntentBundle, command: "skip" | "quit"): boolean {
  return bundle.intents.some((intent) => intent.type === command);
}

/**
 * All answer fragments joined; empty string when there is none.
 */
export function answerText(bundle: IntentBundle): string {
  return bundle.intents
    .flatMap((intent) => (intent.type === "answer" ? [intent.text.trim()] : []))
    .filter((text) => text.length > 0)
    .join(", ");
}

/**
 * Answers that are too long or mostly repeat the question are transcription
 * contamination (the microphone picked up the question being read out).
 * They become a skip.
 */
export function guardAnswers(intents: Intent[], groundingQuestion?: string): Intent[] {
  let replaced = false;
  const guarded: Intent[] = [];

  for (const intent of intents) {
    if (intent.type !== "answer") {
      guarded.push(intent);
      continue;
    }
    const tooLong = intent.text.length > MAX_ANSWER_LENGTH;
    const echoesQuestion =
      !!groundingQuestion &&
      groundingQuestion.length > 10 &&
      tokenSimilarity(intent.text, groundingQuestion) > QUESTION_ECHO_THRESHOLD;

    if (tooLong || echoesQuestion) {
      console.warn(
        `[IntentParser] Discarding suspicious answer (${tooLong ? "too long" : "echoes question"}): ${intent.text.slice(0, 50)}`
      );
      if (!replaced) {
        guarded.push({ type: "skip" });
        replaced = true;
      }
      continue;
    }
    guarded.push(intent);
  }

  return guarded;
}

// ============================================
// Rule-based recognition
// ============================================

const SKIP_PHRASES = new Set([
  "skip",
  "pass",
  "next",
  "skip it",
  "skip this",
  "skip this one",
  "skip the question",
  "next question",
  "idk",
  "i don't know",
  "i dont know",
  "no idea",
  "dunno",
]);

const QUIT_PHRASES = new Set([
  "quit",
  "exit",
  "stop",
  "end",
  "end quiz",
  "end the quiz",
  "stop the quiz",
  "quit the quiz",
  "i'm done",
  "im done",
  "i am done",
]);

const FILLER_WORDS = new Set(["please", "thanks", "thank you", "ok", "okay", "um", "uh", "hmm"]);

const LEADING_CONNECTOR = /^(?:but|and|also|though|however|oh|well|so|um|uh|hmm)\s+/;

const CLAUSE_SEPARATOR = /\s*[;!?]+\s*|\s*[,.](?=\s|$)\s*|\s+but\s+/i;

const ANSWER_PREFIX = /^(?:the answer is|my answer is|i think it's|i think it is|i think|i guess|maybe)\s+/i;

const EXPLICIT_RATING = /\brate (?:this|it|that)?\s*(?:question\s*)?(?:a\s+)?([1-5])\b|^([1-5])\s*(?:\/|out of)\s*5$/;
const TOO_EASY = /\btoo (?:easy|simple)\b/;
const TOO_HARD = /\btoo (?:hard|difficult|tough)\b/;
const NEGATIVE =
  /\bboring\b|\b(?:bad|terrible|awful|stupid|dumb) question\b|\b(?:don't|do not|didn't) like (?:it|this|that)(?: one| question)?$|\bhate (?:it|this|that)(?: one| question)?$/;
const POSITIVE =
  /\b(?:great|good|nice|fun|cool|awesome|excellent|interesting) question\b|^(?:i )?(?:love|loved|like|liked) (?:it|this|that)(?: one| question)?$/;

const SET_DIFFICULTY = /\b(?:difficulty|level)\s+(?:to\s+)?(easy|medium|hard)\b/;
const HARDER = /\b(?:harder|more difficult|more challenging|tougher)\b/;
const EASIER = /\b(?:easier|simpler|less difficult)\b/;

const EXCLUDE_TOPIC =
  /^(?:no more|stop giving me|stop asking(?: me)? about|enough(?: of| with)?|avoid|i hate|i (?:don't|do not) like)\s+(.+)$/;
const PREFER_TOPIC = /^(?:i (?:like|love|enjoy)|more|give me(?: more)?|ask(?: me)? about|i want(?: more)?)\s+(.+)$/;

const TOPIC_NOISE = new Set(["", "question", "questions", "it", "this", "that", "please"]);

function cleanTopic(raw: string): string | null {
  const topic = raw
    .replace(/^(?:the|any|more)\s+/, "")
    .replace(/\s+(?:questions?|stuff|please|ones?)$/, "")
    .replace(/\s+(?:questions?|stuff)$/, "")
    .trim();
  return TOPIC_NOISE.has(topic) ? null : topic;
}

function splitClauses(utterance: string): string[] {
  return utterance
    .replace(/’/g, "'")
    .split(CLAUSE_SEPARATOR)
    .map((clause) => {
      let stripped = clause.trim();
      while (LEADING_CONNECTOR.test(stripped.toLowerCase())) {
        stripped = stripped.replace(/^\S+\s+/, "");
      }
      return stripped.trim();
    })
    .filter((clause) => clause.length > 0);
}

/**
 * Intents recognized in a single clause, or null when the clause is
 * (part of) the answer.
 */
function recognizeClause(clause: string): Intent[] | null {
  const lower = clause.toLowerCase();

  if (SKIP_PHRASES.has(lower)) return [{ type: "skip" }];
  if (QUIT_PHRASES.has(lower)) return [{ type: "quit" }];
  if (FILLER_WORDS.has(lower)) return [];

  const explicit = EXPLICIT_RATING.exec(lower);
  if (explicit) {
    const value = Number(explicit[1] ?? explicit[2]);
    return isRating(value) ? [{ type: "rating", rating: value }] : [];
  }
  if (TOO_EASY.test(lower)) {
    return [
      { type: "rating", rating: 1, feedback: clause },
      { type: "difficulty", change: { kind: "step", delta: 1 } },
    ];
  }
  if (TOO_HARD.test(lower)) {
    return [
      { type: "rating", rating: 1, feedback: clause },
      { type: "difficulty", change: { kind: "step", delta: -1 } },
    ];
  }
  if (NEGATIVE.test(lower)) return [{ type: "rating", rating: 1, feedback: clause }];
  if (POSITIVE.test(lower)) return [{ type: "rating", rating: 5, feedback: clause }];

  const absolute = SET_DIFFICULTY.exec(lower);
  if (absolute) {
    const level = absolute[1];
    if (level === "easy" || level === "medium" || level === "hard") {
      return [{ type: "difficulty", change: { kind: "set", level } }];
    }
  }
  if (HARDER.test(lower)) return [{ type: "difficulty", change: { kind: "step", delta: 1 } }];
  if (EASIER.test(lower)) return [{ type: "difficulty", change: { kind: "step", delta: -1 } }];

  const exclude = EXCLUDE_TOPIC.exec(lower);
  if (exclude) {
    const topic = cleanTopic(exclude[1]);
    if (topic) return [{ type: "topic_preference", action: "exclude", topic }];
  }
  const prefer = PREFER_TOPIC.exec(lower);
  if (prefer) {
    const topic = cleanTopic(prefer[1]);
    if (topic) return [{ type: "topic_preference", action: "prefer", topic }];
  }

  return null;
}

/**
 * Exact whole-utterance commands ("skip", "quit"). Used as the fast path
 * before any model call.
 */
export function matchCommand(utterance: string): Intent | null {
  const lower = utterance.trim().toLowerCase().replace(/[.!?]+$/, "").replace(/’/g, "'");
  if (SKIP_PHRASES.has(lower)) return { type: "skip" };
  if (QUIT_PHRASES.has(lower)) return { type: "quit" };
  return null;
}

/**
 * Deterministic intent extraction. Every clause that is not a recognized
 * command, rating, difficulty or topic phrase is treated as answer text.
 */
export function recognizeIntents(utterance: string): Intent[] {
  const intents: Intent[] = [];
  const answerParts: string[] = [];
  let answerPosition = -1;

  for (const clause of splitClauses(utterance)) {
    const recognized = recognizeClause(clause);
    if (recognized === null) {
      if (answerPosition === -1) answerPosition = intents.length;
      answerParts.push(clause.replace(ANSWER_PREFIX, "").trim());
      continue;
    }
    intents.push(...recognized);
  }

  if (answerParts.length > 0) {
    intents.splice(answerPosition, 0, { type: "answer", text: answerParts.join(", ") });
  }

  return intents;
}
