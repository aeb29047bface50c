import fs from "fs";
import path from "path";
import { ChoiceLetter, CHOICE_LETTERS, Difficulty, Question, isDifficulty } from "../domain/question";
import { isRecord, isStringArray, optionalString } from "../domain/guards";

const DEFAULT_QUESTIONS_FILE = path.join(__dirname, "../../data/questions.json");

export interface QuestionFilters {
  excludeIds: string[];
  difficulty?: Difficulty;
  category?: string;
  excludedTopics?: string[];
  preferredTopics?: string[]; // ranking only, never filters
  previousTopic?: string; // ranked last, for variety
  limit?: number;
}

/**
 * Where questions come from. Implementations may be remote, so every
 * call is async and bounded by the caller.
 */
export interface QuestionStore {
  query(filters: QuestionFilters): Promise<Question[]>;
  getById(questionId: string): Promise<Question | undefined>;
  count(): Promise<number>;
}

function matchesTopic(question: Question, topic: string): boolean {
  const wanted = topic.trim().toLowerCase();
  return question.topic.toLowerCase() === wanted || question.category.toLowerCase() === wanted;
}

function parseChoices(value: unknown): Record<ChoiceLetter, string> | undefined {
  if (!isRecord(value)) return undefined;
  const choices: Partial<Record<ChoiceLetter, string>> = {};
  for (const letter of CHOICE_LETTERS) {
    const text = optionalString(value[letter]);
    if (!text) return undefined;
    choices[letter] = text;
  }
  const { a, b, c, d } = choices;
  return a && b && c && d ? { a, b, c, d } : undefined;
}

/**
 * Validate one raw corpus entry. Returns null for anything malformed.
 */
export function parseQuestion(raw: unknown): Question | null {
  if (!isRecord(raw)) return null;

  const id = optionalString(raw.id);
  const text = optionalString(raw.question);
  const correctAnswer = optionalString(raw.correctAnswer);
  const topic = optionalString(raw.topic);
  const category = optionalString(raw.category);
  const difficulty = raw.difficulty;
  if (!id || !text || !correctAnswer || !topic || !category || !isDifficulty(difficulty)) {
    return null;
  }

  const alternativeAnswers = isStringArray(raw.alternativeAnswers) ? raw.alternativeAnswers : [];
  const explanation = optionalString(raw.explanation);

  if (raw.type === "text_multichoice") {
    const possibleAnswers = parseChoices(raw.possibleAnswers);
    if (!possibleAnswers) return null;
    return {
      id,
      question: text,
      type: "text_multichoice",
      possibleAnswers,
      correctAnswer,
      alternativeAnswers,
      difficulty,
      topic,
      category,
      explanation,
    };
  }

  return {
    id,
    question: text,
    type: "text",
    correctAnswer,
    alternativeAnswers,
    difficulty,
    topic,
    category,
    explanation,
  };
}

/**
 * InMemoryQuestionStore filters and ranks a fixed list of questions.
 */
export class InMemoryQuestionStore implements QuestionStore {
  protected questions: Question[];
  private random: () => number;

  constructor(questions: Question[], random: () => number = Math.random) {
    this.questions = questions;
    this.random = random;
  }

  async query(filters: QuestionFilters): Promise<Question[]> {
    const excluded = new Set(filters.excludeIds);
    const excludedTopics = filters.excludedTopics ?? [];
    const preferredTopics = filters.preferredTopics ?? [];
    const category = filters.category?.toLowerCase();

    const candidates = this.questions.filter(
      (q) =>
        !excluded.has(q.id) &&
        (!filters.difficulty || q.difficulty === filters.difficulty) &&
        (!category || q.category.toLowerCase() === category) &&
        !excludedTopics.some((topic) => matchesTopic(q, topic))
    );

    const ranked = candidates
      .map((question) => ({
        question,
        preferred: preferredTopics.some((topic) => matchesTopic(question, topic)) ? 1 : 0,
        fresh: filters.previousTopic && matchesTopic(question, filters.previousTopic) ? 0 : 1,
        shuffle: this.random(),
      }))
      .sort((a, b) => b.preferred - a.preferred || b.fresh - a.fresh || a.shuffle - b.shuffle)
      .map((entry) => entry.question);

    return filters.limit !== undefined ? ranked.slice(0, filters.limit) : ranked;
  }

  async getById(questionId: string): Promise<Question | undefined> {
    return this.questions.find((q) => q.id === questionId);
  }

  async count(): Promise<number> {
    return this.questions.length;
  }
}

/**
 * Read a question corpus file: either an array or { questions: [...] }.
 * Malformed entries and duplicate ids are skipped with a warning.
 */
export function loadQuestionFile(filePath: string): Question[] {
  if (!fs.existsSync(filePath)) {
    console.warn(`[QuestionStore] Question file not found: ${filePath}`);
    return [];
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const entries: unknown[] = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed) && Array.isArray(parsed.questions)
      ? parsed.questions
      : [];

  const questions: Question[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const question = parseQuestion(entry);
    if (!question) {
      console.warn("[QuestionStore] Skipping malformed question entry");
      continue;
    }
    if (seen.has(question.id)) {
      console.warn(`[QuestionStore] Skipping duplicate question id ${question.id}`);
      continue;
    }
    seen.add(question.id);
    questions.push(question);
  }
  return questions;
}

/**
 * JsonQuestionStore serves the question corpus from a JSON file,
 * loaded once at construction.
 */
export class JsonQuestionStore extends InMemoryQuestionStore {
  constructor(filePath: string = DEFAULT_QUESTIONS_FILE, random: () => number = Math.random) {
    super(loadQuestionFile(filePath), random);
    console.log(`[QuestionStore] Loaded ${this.questions.length} questions from ${path.basename(filePath)}`);
  }
}
