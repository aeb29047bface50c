import { PublicQuestion } from "../domain/question";
import { Participant, QuizSession, totalScore } from "../domain/session";
import { EvaluationResult } from "../domain/evaluation";
import { AudioReply, QuestionView, QuizResponse } from "../services/quizOrchestrator";
import { QuestionRating } from "../domain/rating";

// Wire format is snake_case; answers never leave the server before grading.

export function participantToJson(p: Participant) {
  return {
    participant_id: p.id,
    user_id: p.userId ?? null,
    display_name: p.displayName,
    score: p.score,
    answered_count: p.answeredCount,
    correct_count: p.correctCount,
    last_answer: p.lastAnswer ?? null,
    last_result: p.lastResult ?? null,
    is_host: p.isHost,
    joined_at: p.joinedAt,
  };
}

export function sessionToJson(session: QuizSession) {
  return {
    session_id: session.id,
    user_id: session.userId ?? null,
    mode: session.mode,
    language: session.language,
    category: session.category ?? null,
    phase: session.phase,
    max_questions: session.maxQuestions,
    current_difficulty: session.currentDifficulty,
    questions_answered: session.questionsAnswered,
    current_question_id: session.currentQuestion?.id ?? null,
    asked_question_ids: session.askedQuestionIds,
    preferred_topics: session.preferredTopics,
    excluded_topics: session.excludedTopics,
    participants: session.participants.map(participantToJson),
    total_score: totalScore(session),
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    expires_at: session.expiresAt,
    ttl_seconds: session.ttlSeconds,
  };
}

export function questionToJson(question: PublicQuestion) {
  return {
    id: question.id,
    question: question.question,
    type: question.type,
    possible_answers: question.possibleAnswers ?? null,
    difficulty: question.difficulty,
    topic: question.topic,
    category: question.category,
  };
}

export function evaluationToJson(evaluation: EvaluationResult) {
  return {
    user_answer: evaluation.userAnswer,
    result: evaluation.kind,
    points: evaluation.points,
    correct_answer: evaluation.correctAnswer,
    tier: evaluation.tier,
    rationale: evaluation.rationale ?? null,
  };
}

export function audioToJson(audio: AudioReply) {
  return {
    format: audio.format,
    ...(audio.feedback ? { feedback: audio.feedback.toString("base64") } : {}),
    ...(audio.question ? { question: audio.question.toString("base64") } : {}),
  };
}

export function quizResponseToJson(response: QuizResponse) {
  return {
    success: response.success,
    message: response.message,
    session: sessionToJson(response.session),
    current_question: response.currentQuestion ? questionToJson(response.currentQuestion) : null,
    evaluation: response.evaluation ? evaluationToJson(response.evaluation) : null,
    feedback_received: response.feedbackReceived,
    ...(response.audio ? { audio: audioToJson(response.audio) } : {}),
  };
}

export function questionViewToJson(view: QuestionView) {
  return {
    question: questionToJson(view.question),
    progress: view.progress,
  };
}

export function ratingToJson(rating: QuestionRating) {
  return {
    id: rating.id,
    question_id: rating.questionId,
    user_id: rating.userId ?? null,
    rating: rating.rating,
    feedback_text: rating.feedbackText ?? null,
    created_at: rating.createdAt,
  };
}
