import { Router } from "express";
import multer from "multer";
import { QuizOrchestrator } from "../../services/quizOrchestrator";
import { audioFromRequest, bodyOf, optionalStringField, queryFlag } from "../requestParsing";
import { quizResponseToJson } from "../serializers";

/**
 * Audio arrives either as a multipart "audio" file or as base64 in a JSON
 * body. Multipart files are held in memory and capped at maxAudioBytes.
 */
export function createVoiceRouter(orchestrator: QuizOrchestrator, maxAudioBytes: number): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxAudioBytes, files: 1 },
  });

  // POST /api/v1/voice/submit/:id - Spoken turn
  router.post("/submit/:id", upload.single("audio"), async (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const response = await orchestrator.submitVoice(req.params.id, {
        audio: audioFromRequest(req.file, body),
        participantId: optionalStringField(body, "participant_id"),
        audioReply: queryFlag(req.query.audio),
      });
      res.json(quizResponseToJson(response));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/voice/transcribe - Audio to text, no session involved
  router.post("/transcribe", upload.single("audio"), async (req, res, next) => {
    try {
      const body = bodyOf(req.body);
      const text = await orchestrator.transcribe(
        audioFromRequest(req.file, body),
        optionalStringField(body, "language")
      );
      res.json({ text });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
