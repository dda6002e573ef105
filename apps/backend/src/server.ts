/**
 * Recognition backend server (entry point)
 *
 * Thin shell: context creation, startup and graceful shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";

const ctx = await createContext().catch((error: unknown) => {
  console.error("[startup] failed", error);
  process.exit(1);
});

const { logger, db, housekeeping, textRecognizer } = ctx;
const app = createApp(ctx);

const port = runtimeConfig.port;
const bindHost = process.env.BIND_HOST || "0.0.0.0";
const server = app.listen(port, bindHost, () => {
  logger.info({ port, host: bindHost }, "Recognition backend listening");
});

housekeeping.start();

const releaseResources = async () => {
  if (textRecognizer) {
    try {
      await textRecognizer.close();
      logger.info("Text recognizer closed");
    } catch (error) {
      logger.error({ err: error }, "Error closing text recognizer");
    }
  }
  db.close();
  logger.info("Database connection closed, graceful shutdown complete");
};

const shutdown = () => {
  if (ctx.isShuttingDown()) return;
  logger.info("Received termination signal, initiating graceful shutdown");
  ctx.setShuttingDown(true);

  housekeeping.stop();

  // In-flight recognitions finish before the server reports closed
  server.close(() => {
    logger.info("HTTP server closed");
    void releaseResources().then(() => process.exit(0));
  });

  setTimeout(() => {
    logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, runtimeConfig.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
