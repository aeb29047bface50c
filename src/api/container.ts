import { AppConfig } from "../config";
import { IntentParser, RuleBasedIntentParser } from "../domain/intentParser";
import { LLMIntentParser } from "../domain/llmIntentParser";
import { AnswerEvaluator } from "../domain/answerEvaluator";
import { LLMJudge } from "../domain/llmJudge";
import { SessionStore } from "../stores/sessionStore";
import { JsonQuestionStore, QuestionStore } from "../stores/questionStore";
import { FileRatingStore, RatingStore } from "../stores/ratingStore";
import { QuestionSelector } from "../services/questionSelector";
import { RatingService } from "../services/ratingService";
import { OpenAITranscriber } from "../services/transcriber";
import { OpenAISpeechSynthesizer } from "../services/speechSynthesizer";
import { QuizOrchestrator } from "../services/quizOrchestrator";

export interface Container {
  config: Readonly<AppConfig>;
  sessions: SessionStore;
  questions: QuestionStore;
  ratings: RatingService;
  orchestrator: QuizOrchestrator;
}

export interface ContainerOverrides {
  questionStore?: QuestionStore;
  ratingStore?: RatingStore;
}

/**
 * Wire the service graph from configuration. Without an OpenAI key the
 * quiz still runs: rule-based parsing, exact-match grading, no voice.
 */
export function createContainer(config: Readonly<AppConfig>, overrides: ContainerOverrides = {}): Container {
  const apiKey = config.openaiApiKey;

  const sessions = new SessionStore({
    ttlMode: config.ttlMode,
    lockWaitMs: config.lockWaitMs,
    lockCeilingMs: config.lockCeilingMs,
  });

  const parser: IntentParser = apiKey
    ? new LLMIntentParser(apiKey, config.chatModel, config.intentTimeoutMs)
    : new RuleBasedIntentParser();

  const evaluator = new AnswerEvaluator(
    apiKey ? new LLMJudge(apiKey, config.chatModel, config.judgeTimeoutMs) : undefined,
    config.judgeTimeoutMs
  );

  const questionStore = overrides.questionStore ?? new JsonQuestionStore(config.questionsFile);
  const ratings = new RatingService(overrides.ratingStore ?? new FileRatingStore());

  if (!apiKey) {
    console.warn("[Container] OPENAI_API_KEY not set: rule-based parsing only, no voice or audio");
  }

  const orchestrator = new QuizOrchestrator({
    store: sessions,
    parser,
    evaluator,
    selector: new QuestionSelector(questionStore, config.retrievalTimeoutMs),
    ratings,
    transcriber: apiKey
      ? new OpenAITranscriber(apiKey, config.transcribeModel, config.transcribeTimeoutMs)
      : undefined,
    synthesizer: apiKey
      ? new OpenAISpeechSynthesizer(apiKey, {
          model: config.ttsModel,
          voice: config.ttsVoice,
          timeoutMs: config.ttsTimeoutMs,
        })
      : undefined,
    settings: {
      defaultTtlSeconds: config.sessionTtlSeconds,
      maxAudioBytes: config.maxAudioBytes,
    },
  });

  return { config, sessions, questions: questionStore, ratings, orchestrator };
}
