// Speech Feedback Service - Entry point
// Loads configuration, wires up all services and starts the server.

import "dotenv/config";
import { loadConfig, type AppConfig } from "./config.js";
import { createLogger, describeError, setLogLevel } from "./logger.js";
import { createAppServer } from "./server.js";
import { createServices, type Services } from "./services.js";

export const APP_NAME = "Speech Feedback Service";
export const APP_VERSION = "0.1.0";

const logger = createLogger("Init");

let config: AppConfig;
let services: Services;
try {
  config = loadConfig();
  setLogLevel(config.logLevel);
  services = createServices(config, logger);
} catch (err) {
  logger.error(`Startup failed: ${describeError(err)}`);
  process.exit(1);
}

const { pipeline, augmentationClient } = services;

// Warm the token cache; a failure here only means the first request authenticates.
if (augmentationClient) {
  augmentationClient.authenticate().then(
    () => logger.info("Augmentation service pre-authenticated"),
    (err: unknown) => logger.warn(`Augmentation pre-authentication failed: ${describeError(err)}`),
  );
}

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  pipeline,
  config,
  version: APP_VERSION,
  logger: createLogger("Server"),
});

server.listen(config.port).then(
  () => {
    logger.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logger.info(
      `Pipeline: upload → ffmpeg → ${config.transcription.provider} → metrics` +
        (augmentationClient ? " → augmentation" : ""),
    );
  },
  (err: unknown) => {
    logger.error(`Failed to start server: ${describeError(err)}`);
    services.close();
    process.exit(1);
  },
);

// ─── Graceful shutdown ──────────────────────────────────────────────────────────

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down...`);

  void server
    .close()
    .catch((err: unknown) => logger.error(`Error closing server: ${describeError(err)}`))
    .finally(() => {
      services.close();
      logger.info("Shutdown complete");
      process.exit(0);
    });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
