import { Question, PublicQuestion, isDifficulty, stepDifficulty, toPublicQuestion, displayCorrectAnswer, CHOICE_LETTERS } from "../domain/question";
import {
  ANSWERABLE_PHASES,
  Participant,
  QuizSession,
  SessionMode,
  addTopic,
  createParticipant,
  findParticipant,
  generateSessionId,
  isAnswerable,
  markAsked,
  recordResult,
  transition,
} from "../domain/session";
import { EvaluationResult, pointsFor } from "../domain/evaluation";
import { Intent, IntentBundle, Rating, answerText, hasCommand, isRating, literalAnswerBundle } from "../domain/intent";
import { IntentParser } from "../domain/intentParser";
import { AnswerEvaluator } from "../domain/answerEvaluator";
import { feedbackWithAnswer } from "../domain/feedbackMessages";
import {
  QuizError,
  invalidConfig,
  invalidInput,
  invalidPhase,
  participantNotFound,
} from "../domain/errors";
import { SessionStore } from "../stores/sessionStore";
import { QuestionSelector, SelectionCriteria } from "./questionSelector";
import { RatingService } from "./ratingService";
import { AudioInput, Transcriber, validateAudio, DEFAULT_MAX_AUDIO_BYTES } from "./transcriber";
import { SpeechSynthesizer } from "./speechSynthesizer";

export const MAX_QUESTIONS_LIMIT = 50;
export const MAX_INPUT_LENGTH = 1000;
const MAX_DISPLAY_NAME_LENGTH = 50;

export interface OrchestratorSettings {
  defaultTtlSeconds: number;
  maxAudioBytes: number;
}

export interface OrchestratorDeps {
  store: SessionStore;
  parser: IntentParser;
  evaluator: AnswerEvaluator;
  selector: QuestionSelector;
  ratings: RatingService;
  transcriber?: Transcriber; // voice input is refused without one
  synthesizer?: SpeechSynthesizer; // audio replies are omitted without one
  settings?: Partial<OrchestratorSettings>;
}

export interface CreateSessionOptions {
  maxQuestions?: number;
  difficulty?: string;
  language?: string;
  category?: string;
  ttlSeconds?: number;
  mode?: string;
  userId?: string;
  displayName?: string;
}

export interface StartOptions {
  excludedQuestionIds?: string[];
  audioReply?: boolean;
}

export interface InputOptions {
  text: string;
  participantId?: string;
  audioReply?: boolean;
}

export interface VoiceOptions {
  audio: AudioInput;
  participantId?: string;
  audioReply?: boolean;
}

export interface RateOptions {
  rating: number;
  participantId?: string;
  feedbackText?: string;
}

export interface AudioReply {
  format: "mp3";
  feedback?: Buffer;
  question?: Buffer;
}

export interface QuizResponse {
  success: boolean;
  message: string;
  session: QuizSession;
  currentQuestion: PublicQuestion | null;
  evaluation: EvaluationResult | null;
  feedbackReceived: string[];
  audio?: AudioReply;
}

export interface QuestionView {
  question: PublicQuestion;
  progress: { current: number; total: number };
}

interface PendingRating {
  questionId: string;
  rating: Rating;
  feedbackText?: string;
}

interface InputOutcome {
  session: QuizSession;
  message: string;
  evaluation: EvaluationResult;
  next: Question | null;
  feedbackReceived: string[];
  ratings: PendingRating[];
  raterId: string;
}

function raterId(session: QuizSession, participant?: Participant): string {
  return participant?.userId ?? participant?.id ?? session.userId ?? "anonymous";
}

function spokenQuestion(question: Question): string {
  if (question.type === "text_multichoice" && question.possibleAnswers) {
    const { possibleAnswers } = question;
    const options = CHOICE_LETTERS.map((letter) => `${letter}) ${possibleAnswers[letter]}`).join(". ");
    return `${question.question} ${options}.`;
  }
  return question.question;
}

/**
 * QuizOrchestrator runs the quiz: one call per player turn, each one
 * serialized per session through the store's lock.
 *
 * Inside the lock: parse intents, grade, update score and preferences,
 * pick the next question. Outside it: audio synthesis and rating writes,
 * which may fail without affecting the turn. Work abandoned at the lock
 * ceiling is cancelled through the lock's abort signal.
 */
export class QuizOrchestrator {
  private store: SessionStore;
  private parser: IntentParser;
  private evaluator: AnswerEvaluator;
  private selector: QuestionSelector;
  private ratings: RatingService;
  private transcriber?: Transcriber;
  private synthesizer?: SpeechSynthesizer;
  private settings: OrchestratorSettings;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.parser = deps.parser;
    this.evaluator = deps.evaluator;
    this.selector = deps.selector;
    this.ratings = deps.ratings;
    this.transcriber = deps.transcriber;
    this.synthesizer = deps.synthesizer;
    this.settings = {
      defaultTtlSeconds: 30 * 60,
      maxAudioBytes: DEFAULT_MAX_AUDIO_BYTES,
      ...deps.settings,
    };
  }

  get voiceEnabled(): boolean {
    return this.transcriber !== undefined;
  }

  // ============================================================
  // Session lifecycle
  // ============================================================

  createSession(options: CreateSessionOptions = {}): QuizSession {
    const maxQuestions = options.maxQuestions ?? 10;
    if (!Number.isInteger(maxQuestions) || maxQuestions < 1 || maxQuestions > MAX_QUESTIONS_LIMIT) {
      throw invalidConfig(`maxQuestions must be an integer from 1 to ${MAX_QUESTIONS_LIMIT}`, { maxQuestions });
    }

    const difficulty = options.difficulty ?? "medium";
    if (!isDifficulty(difficulty)) {
      throw invalidConfig("difficulty must be easy, medium or hard", { difficulty });
    }

    const ttlSeconds = options.ttlSeconds ?? this.settings.defaultTtlSeconds;
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
      throw invalidConfig("ttl must not be negative", { ttlSeconds });
    }

    const modeRaw = options.mode ?? "single";
    if (modeRaw !== "single" && modeRaw !== "multiplayer") {
      throw invalidConfig("mode must be single or multiplayer", { mode: modeRaw });
    }
    const mode: SessionMode = modeRaw;

    const now = this.store.now();
    const host = createParticipant(this.displayName(options.displayName ?? "Player"), {
      userId: options.userId,
      isHost: true,
      now,
    });

    let id = generateSessionId();
    while (this.store.get(id)) {
      id = generateSessionId();
    }

    const session: QuizSession = {
      id,
      userId: options.userId,
      mode,
      language: options.language?.trim().toLowerCase() || "en",
      category: options.category?.trim() || undefined,
      participants: [host],
      maxQuestions,
      currentDifficulty: difficulty,
      preferredTopics: [],
      excludedTopics: [],
      phase: "idle",
      questionsAnswered: 0,
      askedQuestionIds: [],
      clientExcludedIds: [],
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
      expiresAt: now.toISOString(),
      ttlSeconds,
    };
    this.store.applyTtl(session, ttlSeconds);
    this.store.put(session);

    console.log(`[Orchestrator] Created session ${session.id} (${mode}, ${maxQuestions} questions, ${difficulty})`);
    return structuredClone(session);
  }

  getSession(sessionId: string): QuizSession {
    return structuredClone(this.store.require(sessionId));
  }

  /**
   * Remove a session. Unknown or already expired ids are fine.
   */
  endSession(sessionId: string): void {
    if (this.store.delete(sessionId)) {
      console.log(`[Orchestrator] Ended session ${sessionId}`);
    }
  }

  async extendSession(sessionId: string, minutes: number): Promise<QuizSession> {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw invalidInput("minutes must be a positive number", { minutes });
    }
    const session = await this.store.withLock(sessionId, (draft) => {
      this.store.extend(draft, minutes * 60);
      return draft;
    });
    console.log(`[Orchestrator] Extended session ${sessionId} by ${minutes} minutes`);
    return structuredClone(session);
  }

  // ============================================================
  // Participants
  // ============================================================

  async addParticipant(
    sessionId: string,
    options: { displayName: string; userId?: string }
  ): Promise<Participant> {
    const displayName = this.displayName(options.displayName);

    const participant = await this.store.withLock(sessionId, (draft) => {
      if (draft.mode !== "multiplayer") {
        throw invalidInput("Only multiplayer sessions accept more participants", { sessionId });
      }
      if (draft.phase === "finished") {
        throw invalidPhase(sessionId, draft.phase, ["idle", ...ANSWERABLE_PHASES]);
      }
      const added = createParticipant(displayName, { userId: options.userId, now: this.store.now() });
      draft.participants.push(added);
      return added;
    });

    console.log(`[Orchestrator] ${participant.displayName} joined ${sessionId}`);
    return structuredClone(participant);
  }

  async removeParticipant(sessionId: string, participantId: string): Promise<void> {
    await this.store.withLock(sessionId, (draft) => {
      const index = draft.participants.findIndex((p) => p.id === participantId);
      if (index === -1) {
        throw participantNotFound(sessionId, participantId);
      }
      if (draft.participants.length === 1) {
        throw invalidInput("Cannot remove the last participant", { sessionId, participantId });
      }
      const [removed] = draft.participants.splice(index, 1);
      if (removed.isHost) {
        draft.participants[0].isHost = true;
      }
    });
    console.log(`[Orchestrator] Participant ${participantId} left ${sessionId}`);
  }

  // ============================================================
  // Quiz flow
  // ============================================================

  async start(sessionId: string, options: StartOptions = {}): Promise<QuizResponse> {
    const excluded = Array.from(new Set((options.excludedQuestionIds ?? []).map((id) => id.trim()).filter(Boolean)));

    const { session, question } = await this.store.withLock(sessionId, async (draft, signal) => {
      if (draft.phase !== "idle") {
        throw invalidPhase(sessionId, draft.phase, ["idle"]);
      }
      draft.clientExcludedIds = excluded;

      const selection = await this.selector.select(this.criteria(draft), { strict: true, signal });
      if (!selection) {
        throw new QuizError("QUESTION_UNAVAILABLE", "No questions available for these settings", { sessionId });
      }

      this.present(draft, selection.question);
      transition(draft, "asking");
      return { session: draft, question: selection.question };
    });

    console.log(`[Orchestrator] Started ${sessionId} with ${question.id}`);

    const audio = options.audioReply
      ? await this.synthesizeReply(sessionId, undefined, spokenQuestion(question))
      : undefined;

    return {
      success: true,
      message: "Quiz started",
      session: structuredClone(session),
      currentQuestion: toPublicQuestion(question),
      evaluation: null,
      feedbackReceived: [],
      audio,
    };
  }

  /**
   * The question being asked, plus progress. Marks it as delivered.
   */
  async getCurrentQuestion(sessionId: string): Promise<QuestionView> {
    return this.store.withLock(sessionId, (draft) => {
      const question = draft.currentQuestion;
      if (!question) {
        throw invalidPhase(sessionId, draft.phase, [...ANSWERABLE_PHASES]);
      }
      if (draft.phase === "asking") {
        transition(draft, "awaiting_answer");
      }
      return {
        question: toPublicQuestion(question),
        progress: { current: draft.questionsAnswered + 1, total: draft.maxQuestions },
      };
    });
  }

  async submitInput(sessionId: string, options: InputOptions): Promise<QuizResponse> {
    if (options.text.length > MAX_INPUT_LENGTH) {
      throw invalidInput(`Input must be at most ${MAX_INPUT_LENGTH} characters`);
    }

    const outcome = await this.store.withLock(sessionId, (draft, signal) =>
      this.processInput(draft, options, signal)
    );

    // Lock released; nothing below can affect the turn
    this.recordRatings(sessionId, outcome);

    let audio: AudioReply | undefined;
    if (options.audioReply) {
      const feedbackText = feedbackWithAnswer(
        outcome.evaluation.kind,
        outcome.evaluation.correctAnswer,
        outcome.session.language
      );
      audio = await this.synthesizeReply(
        sessionId,
        feedbackText,
        outcome.next ? spokenQuestion(outcome.next) : undefined
      );
    }

    return {
      success: true,
      message: outcome.message,
      session: structuredClone(outcome.session),
      currentQuestion: outcome.next ? toPublicQuestion(outcome.next) : null,
      evaluation: outcome.evaluation,
      feedbackReceived: outcome.feedbackReceived,
      audio,
    };
  }

  async submitVoice(sessionId: string, options: VoiceOptions): Promise<QuizResponse> {
    const session = this.store.require(sessionId);
    if (!isAnswerable(session)) {
      throw invalidPhase(sessionId, session.phase, [...ANSWERABLE_PHASES]);
    }

    const prompt = session.currentQuestion
      ? `Trivia quiz. The player is answering: ${session.currentQuestion.question}`
      : undefined;
    const transcript = await this.transcribe(options.audio, session.language, prompt);

    const response = await this.submitInput(sessionId, {
      text: transcript,
      participantId: options.participantId,
      audioReply: options.audioReply,
    });
    response.feedbackReceived = [`voice_input: ${transcript}`, ...response.feedbackReceived];
    return response;
  }

  /**
   * Validate and transcribe audio. Empty transcripts count as failures.
   */
  async transcribe(audio: AudioInput, language?: string, prompt?: string): Promise<string> {
    if (!this.transcriber) {
      throw new QuizError("SERVICE_UNAVAILABLE", "Voice input requires OPENAI_API_KEY");
    }
    validateAudio(audio, this.settings.maxAudioBytes);

    let transcript: string;
    try {
      transcript = (await this.transcriber.transcribe({ audio, language, prompt })).trim();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Orchestrator] Transcription failed: ${reason}`);
      throw new QuizError("TRANSCRIPTION_FAILED", "Could not transcribe audio", { reason });
    }

    if (!transcript) {
      throw new QuizError("TRANSCRIPTION_FAILED", "No speech detected in audio");
    }
    return transcript;
  }

  rateQuestion(sessionId: string, options: RateOptions): { success: true; message: string } {
    if (!isRating(options.rating)) {
      throw invalidInput("Rating must be an integer from 1 to 5", { rating: options.rating });
    }

    const session = this.store.require(sessionId);
    const participant = findParticipant(session, options.participantId);
    if (options.participantId && !participant) {
      throw participantNotFound(sessionId, options.participantId);
    }
    if (!session.lastQuestionId) {
      throw new QuizError("NO_QUESTION_TO_RATE", "No question to rate yet", { sessionId });
    }

    this.ratings.submitRating({
      questionId: session.lastQuestionId,
      userId: raterId(session, participant),
      sessionId,
      rating: options.rating,
      feedbackText: options.feedbackText,
    });
    return { success: true, message: "Rating submitted" };
  }

  // ============================================================
  // Turn processing (runs under the session lock)
  // ============================================================

  private async processInput(
    draft: QuizSession,
    options: InputOptions,
    signal: AbortSignal
  ): Promise<InputOutcome> {
    if (!isAnswerable(draft)) {
      throw invalidPhase(draft.id, draft.phase, [...ANSWERABLE_PHASES]);
    }
    const participant = findParticipant(draft, options.participantId);
    if (!participant) {
      throw participantNotFound(draft.id, options.participantId ?? "host");
    }
    const question = draft.currentQuestion;
    if (!question) {
      throw invalidPhase(draft.id, draft.phase, [...ANSWERABLE_PHASES]);
    }

    const bundle = await this.parse(draft.id, options.text, question.question, signal);
    const feedbackReceived: string[] = [];

    let evaluation: EvaluationResult;
    const answer = answerText(bundle);
    if (hasCommand(bundle, "skip") || !answer) {
      evaluation = {
        kind: "skipped",
        points: pointsFor("skipped"),
        userAnswer: answer,
        correctAnswer: displayCorrectAnswer(question),
        tier: "none",
      };
      feedbackReceived.push("skipped question");
    } else {
      evaluation = await this.evaluator.evaluate(answer, question, signal);
      feedbackReceived.push(`answer: ${evaluation.kind}`);
    }

    recordResult(participant, evaluation);
    draft.questionsAnswered += 1;
    draft.lastEvaluation = evaluation;
    markAsked(draft, question.id);

    const ratings: PendingRating[] = [];
    for (const intent of bundle.intents) {
      this.applyIntent(draft, question, intent, feedbackReceived, ratings);
    }

    const quit = hasCommand(bundle, "quit");
    if (quit || draft.questionsAnswered >= draft.maxQuestions) {
      this.finish(draft);
      if (quit) feedbackReceived.push("quiz ended");
      return {
        session: draft,
        message: quit ? "Quiz ended" : "Quiz completed!",
        evaluation,
        next: null,
        feedbackReceived,
        ratings,
        raterId: raterId(draft, participant),
      };
    }

    const selection = await this.selector.select(this.criteria(draft, question.topic), { signal });
    if (!selection) {
      console.warn(`[Orchestrator] No questions left for ${draft.id}, finishing early`);
      this.finish(draft);
      return {
        session: draft,
        message: "No more questions available",
        evaluation,
        next: null,
        feedbackReceived,
        ratings,
        raterId: raterId(draft, participant),
      };
    }

    this.present(draft, selection.question);
    transition(draft, "asking");
    return {
      session: draft,
      message: "Input processed",
      evaluation,
      next: selection.question,
      feedbackReceived,
      ratings,
      raterId: raterId(draft, participant),
    };
  }

  private applyIntent(
    draft: QuizSession,
    answered: Question,
    intent: Intent,
    feedbackReceived: string[],
    ratings: PendingRating[]
  ): void {
    switch (intent.type) {
      case "answer":
      case "skip":
      case "quit":
        // handled by the turn itself
        return;
      case "rating":
        ratings.push({ questionId: answered.id, rating: intent.rating, feedbackText: intent.feedback });
        feedbackReceived.push(`rating: ${intent.rating}`);
        return;
      case "difficulty": {
        const { change } = intent;
        if (change.kind === "step") {
          draft.currentDifficulty = stepDifficulty(answered.difficulty, change.delta);
          feedbackReceived.push(`difficulty: ${change.delta > 0 ? "harder" : "easier"}`);
        } else {
          draft.currentDifficulty = change.level;
          feedbackReceived.push(`difficulty: ${change.level}`);
        }
        return;
      }
      case "topic_preference":
        if (intent.action === "exclude") {
          addTopic(draft.excludedTopics, intent.topic);
          draft.preferredTopics = draft.preferredTopics.filter((t) => t !== intent.topic.trim().toLowerCase());
          feedbackReceived.push(`avoiding: ${intent.topic}`);
        } else {
          addTopic(draft.preferredTopics, intent.topic);
          draft.excludedTopics = draft.excludedTopics.filter((t) => t !== intent.topic.trim().toLowerCase());
          feedbackReceived.push(`preference: ${intent.topic}`);
        }
        return;
      default: {
        const unhandled: never = intent;
        throw new Error(`Unhandled intent ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async parse(
    sessionId: string,
    text: string,
    groundingQuestion: string,
    signal: AbortSignal
  ): Promise<IntentBundle> {
    try {
      return await this.parser.parse(text, groundingQuestion, signal);
    } catch (error) {
      console.warn(
        `[Orchestrator] Intent parser failed for ${sessionId}, treating input as the answer:`,
        error instanceof Error ? error.message : error
      );
      return literalAnswerBundle(text);
    }
  }

  private criteria(session: QuizSession, previousTopic?: string): SelectionCriteria {
    return {
      excludeIds: [
        ...session.askedQuestionIds,
        ...session.clientExcludedIds,
        ...(session.currentQuestion ? [session.currentQuestion.id] : []),
      ],
      difficulty: session.currentDifficulty,
      category: session.category,
      excludedTopics: session.excludedTopics,
      preferredTopics: session.preferredTopics,
      previousTopic,
    };
  }

  private present(session: QuizSession, question: Question): void {
    session.currentQuestion = question;
    session.lastQuestionId = question.id;
  }

  private finish(session: QuizSession): void {
    transition(session, "finished");
    session.currentQuestion = undefined;
    console.log(`[Orchestrator] Session ${session.id} finished after ${session.questionsAnswered} questions`);
  }

  private displayName(name: string): string {
    const trimmed = name.trim();
    if (!trimmed || trimmed.length > MAX_DISPLAY_NAME_LENGTH) {
      throw invalidInput(`Display name must be 1 to ${MAX_DISPLAY_NAME_LENGTH} characters`);
    }
    return trimmed;
  }

  // ============================================================
  // Best-effort extras (run after the lock is released)
  // ============================================================

  private recordRatings(sessionId: string, outcome: InputOutcome): void {
    for (const pending of outcome.ratings) {
      try {
        this.ratings.submitRating({ ...pending, userId: outcome.raterId, sessionId });
      } catch (error) {
        console.warn(
          `[Orchestrator] Could not record rating for ${pending.questionId}:`,
          error instanceof Error ? error.message : error
        );
      }
    }
  }

  private async synthesizeReply(
    sessionId: string,
    feedbackText?: string,
    questionText?: string
  ): Promise<AudioReply | undefined> {
    const synthesizer = this.synthesizer;
    if (!synthesizer) {
      return undefined;
    }

    const speak = async (text?: string): Promise<Buffer | undefined> => {
      if (!text) return undefined;
      try {
        return (await synthesizer.synthesize(text)).audio;
      } catch (error) {
        console.warn(
          `[Orchestrator] Audio synthesis failed for ${sessionId}:`,
          error instanceof Error ? error.message : error
        );
        return undefined;
      }
    };

    const [feedback, question] = await Promise.all([speak(feedbackText), speak(questionText)]);
    if (!feedback && !question) {
      return undefined;
    }
    return { format: "mp3", feedback, question };
  }
}
