import dotenv from "dotenv";
import { loadConfig } from "../config";
import { createContainer } from "./container";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const container = createContainer(config);
const app = createApp(container);

container.sessions.startSweeper(config.sweepIntervalMs);

// Start server
const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

// Graceful shutdown
function shutdown(signal: NodeJS.Signals): void {
  console.log(`${signal} received, shutting down gracefully...`);
  container.sessions.stopSweeper();
  server.close((error) => {
    if (error) {
      console.error("Error while closing the server:", error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

export default app;
