import { Router } from "express";
import { invalidInput } from "../../domain/errors";
import { QuizOrchestrator } from "../../services/quizOrchestrator";
import {
  bodyOf,
  optionalNumberField,
  optionalStringArrayField,
  optionalStringField,
  queryFlag,
  queryNumber,
  requiredStringField,
} from "../requestParsing";
import { participantToJson, questionViewToJson, quizResponseToJson, sessionToJson } from "../serializers";

const MIN_TTL_MINUTES = 1;
const MAX_TTL_MINUTES = 120;

export function createSessionsRouter(orchestrator: QuizOrchestrator): Router {
  const router = Router();

  // POST /api/v1/sessions - Create a quiz session
  router.post("/", (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const ttlMinutes = optionalNumberField(body, "ttl_minutes");
      if (ttlMinutes !== undefined && (ttlMinutes < MIN_TTL_MINUTES || ttlMinutes > MAX_TTL_MINUTES)) {
        throw invalidInput(`ttl_minutes must be between ${MIN_TTL_MINUTES} and ${MAX_TTL_MINUTES}`);
      }

      const session = orchestrator.createSession({
        maxQuestions: optionalNumberField(body, "max_questions"),
        difficulty: optionalStringField(body, "difficulty"),
        language: optionalStringField(body, "language"),
        category: optionalStringField(body, "category"),
        mode: optionalStringField(body, "mode"),
        ttlSeconds: ttlMinutes !== undefined ? ttlMinutes * 60 : undefined,
        userId: optionalStringField(body, "user_id"),
        displayName: optionalStringField(body, "display_name"),
      });
      res.status(201).json(sessionToJson(session));
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/sessions/:id - Session snapshot
  router.get("/:id", (req, res, next) => {
    try {
      res.json(sessionToJson(orchestrator.getSession(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/sessions/:id - End a session (idempotent)
  router.delete("/:id", (req, res) => {
    orchestrator.endSession(req.params.id);
    res.status(204).send();
  });

  // POST /api/v1/sessions/:id/extend?minutes=N
  router.post("/:id/extend", async (req, res, next) => {
    try {
      const minutes = queryNumber(req.query.minutes, "minutes") ?? 30;
      const session = await orchestrator.extendSession(req.params.id, minutes);
      res.json(sessionToJson(session));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/sessions/:id/start?audio=true
  router.post("/:id/start", async (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const response = await orchestrator.start(req.params.id, {
        excludedQuestionIds: optionalStringArrayField(body, "excluded_question_ids"),
        audioReply: queryFlag(req.query.audio),
      });
      res.json(quizResponseToJson(response));
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/sessions/:id/question - Current question and progress
  router.get("/:id/question", async (req, res, next) => {
    try {
      res.json(questionViewToJson(await orchestrator.getCurrentQuestion(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/sessions/:id/input?audio=true - Submit a text utterance
  router.post("/:id/input", async (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const response = await orchestrator.submitInput(req.params.id, {
        text: requiredStringField(body, "input"),
        participantId: optionalStringField(body, "participant_id"),
        audioReply: queryFlag(req.query.audio),
      });
      res.json(quizResponseToJson(response));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/sessions/:id/rate - Rate the current or last question
  router.post("/:id/rate", (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const rating = optionalNumberField(body, "rating");
      if (rating === undefined) {
        throw invalidInput("rating is required");
      }
      res.json(
        orchestrator.rateQuestion(req.params.id, {
          rating,
          feedbackText: optionalStringField(body, "feedback_text"),
          participantId: optionalStringField(body, "participant_id"),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/sessions/:id/participants - Join a multiplayer session
  router.post("/:id/participants", async (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const participant = await orchestrator.addParticipant(req.params.id, {
        displayName: requiredStringField(body, "display_name"),
        userId: optionalStringField(body, "user_id"),
      });
      res.status(201).json(participantToJson(participant));
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/sessions/:id/participants/:participantId
  router.delete("/:id/participants/:participantId", async (req, res, next) => {
    try {
      await orchestrator.removeParticipant(req.params.id, req.params.participantId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
