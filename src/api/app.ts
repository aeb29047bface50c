import express from "express";
import cors from "cors";
import { Container } from "./container";
import { createSessionsRouter } from "./routes/sessions";
import { createVoiceRouter } from "./routes/voice";
import { createQuestionsRouter } from "./routes/questions";
import { errorHandler } from "./errors";

// Base64 inflates audio by a third; leave room for the other fields
function bodyLimit(maxAudioBytes: number): number {
  return Math.ceil((maxAudioBytes * 4) / 3) + 64 * 1024;
}

export function createApp(container: Container): express.Express {
  const { config, orchestrator, questions, ratings, sessions } = container;
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: bodyLimit(config.maxAudioBytes) }));

  // Routes
  app.use("/api/v1/sessions", createSessionsRouter(orchestrator));
  app.use("/api/v1/voice", createVoiceRouter(orchestrator, config.maxAudioBytes));
  app.use("/api/v1/questions", createQuestionsRouter(questions, ratings));

  // Health check
  app.get("/api/v1/health", (req, res) => {
    res.json({
      status: "ok",
      active_sessions: sessions.size(),
      voice_enabled: orchestrator.voiceEnabled,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((req, res) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
  });
  app.use(errorHandler);

  return app;
}
