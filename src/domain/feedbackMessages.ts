import fs from "fs";
import path from "path";
import { EvaluationKind } from "./evaluation";
import { isRecord } from "./guards";

const MESSAGES_FILE = path.join(__dirname, "../../data/feedbackMessages.json");
const DEFAULT_LANGUAGE = "en";
const MAX_SPOKEN_ANSWER = 100;

interface LanguageMessages {
  verdicts: Partial<Record<EvaluationKind, string>>;
  withAnswer: Partial<Record<EvaluationKind, string>>;
}

let cache: Map<string, LanguageMessages> | null = null;

function readPhrases(value: unknown): Partial<Record<EvaluationKind, string>> {
  const phrases: Partial<Record<EvaluationKind, string>> = {};
  if (!isRecord(value)) return phrases;
  const kinds: EvaluationKind[] = ["correct", "incorrect", "partially_correct", "partially_incorrect", "skipped"];
  for (const kind of kinds) {
    const phrase = value[kind];
    if (typeof phrase === "string") phrases[kind] = phrase;
  }
  return phrases;
}

function loadMessages(): Map<string, LanguageMessages> {
  if (cache) return cache;

  cache = new Map();
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(MESSAGES_FILE, "utf-8"));
    if (isRecord(parsed)) {
      for (const [language, entry] of Object.entries(parsed)) {
        if (!isRecord(entry)) continue;
        cache.set(language, {
          verdicts: readPhrases(entry.verdicts),
          withAnswer: readPhrases(entry.withAnswer),
        });
      }
    }
  } catch (error) {
    console.error("[Feedback] Failed to load feedback messages:", error);
  }
  return cache;
}

function humanize(kind: EvaluationKind): string {
  const words = kind.replace(/_/g, " ");
  return words.charAt(0).toUpperCase() + words.slice(1) + ".";
}

function spokenAnswer(answer: string): string {
  const clean = answer.trim();
  return clean.length > MAX_SPOKEN_ANSWER ? clean.slice(0, MAX_SPOKEN_ANSWER - 3) + "..." : clean;
}

/** Short verdict like "Correct!" in the session language, English otherwise. */
export function verdictMessage(kind: EvaluationKind, language: string = DEFAULT_LANGUAGE): string {
  const messages = loadMessages();
  return (
    messages.get(language)?.verdicts[kind] ??
    messages.get(DEFAULT_LANGUAGE)?.verdicts[kind] ??
    humanize(kind)
  );
}

/** Verdict followed by the correct answer, as spoken after each question. */
export function feedbackWithAnswer(
  kind: EvaluationKind,
  answer: string,
  language: string = DEFAULT_LANGUAGE
): string {
  const messages = loadMessages();
  const template =
    messages.get(language)?.withAnswer[kind] ?? messages.get(DEFAULT_LANGUAGE)?.withAnswer[kind];
  if (!template) {
    return `${verdictMessage(kind, language)} The correct answer is ${spokenAnswer(answer)}.`;
  }
  // replacer function, so "$&" in an answer stays literal
  return template.replace("{answer}", () => spokenAnswer(answer));
}

export function supportedFeedbackLanguages(): string[] {
  return Array.from(loadMessages().keys());
}
