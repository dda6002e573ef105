/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { registerCatalogRoutes } from "../routes/catalog";
import { sendError } from "../routes/httpErrors";
import { registerRecognitionRoutes } from "../routes/recognition";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  registerRecognitionRoutes(app, ctx);
  registerCatalogRoutes(app, ctx);

  app.get("/health", (_req: Request, res: Response) => {
    const snapshot = ctx.catalog.isLoaded() ? ctx.catalog.current() : null;
    res.json({
      status: ctx.isShuttingDown() ? "draining" : "ok",
      catalog: {
        loaded: snapshot !== null,
        version: snapshot?.version ?? null,
        entries: snapshot?.entries.length ?? 0,
      },
      jobs: ctx.coordinator.size,
      pool: ctx.recognition.poolStats,
      ocr: ctx.textRecognizer?.isAvailable() ?? false,
    });
  });

  // Malformed JSON bodies and anything a router did not handle itself
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ success: false, error: { kind: "INVALID_REQUEST", message: "Malformed JSON body" } });
    }
    return sendError(res, err, ctx.logger);
  });

  return app;
}
