/**
 * Catalog Router
 *
 * POST /api/catalog/refresh   rebuild the in-memory snapshot from SQLite
 * GET  /api/drug/:id          drug detail with image file names
 * GET  /api/search/name       name lookup (?q=&limit=)
 * GET  /api/search/features   appearance lookup (?shape=&color=&label=&limit=)
 * GET  /api/statistics        catalog counts and colour/shape distributions
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { sendError } from "./httpErrors";
import { optionalText } from "./recognition";

export const drugIdParamSchema = z.coerce.number().int().positive();

export const nameSearchQuerySchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const featureSearchQuerySchema = z.object({
  shape: optionalText(64),
  color: optionalText(64),
  label: optionalText(64),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function registerCatalogRoutes(app: Express, ctx: AppContext): void {
  const { logger, catalog, catalogRepo } = ctx;

  /**
   * POST /api/catalog/refresh
   * On failure the previous snapshot keeps serving and 503 is returned.
   */
  app.post("/api/catalog/refresh", async (_req: Request, res: Response) => {
    const refreshed = await catalog.refresh();
    const snapshot = catalog.isLoaded() ? catalog.current() : null;
    const summary = { version: snapshot?.version ?? null, entries: snapshot?.entries.length ?? 0 };

    if (!refreshed) {
      return res.status(503).json({
        success: false,
        error: { kind: "CATALOG_UNAVAILABLE", message: "Catalog refresh failed; previous snapshot kept" },
        ...summary,
      });
    }
    logger.info(summary, "Catalog refreshed on request");
    return res.json({ success: true, ...summary });
  });

  app.get("/api/drug/:id", async (req: Request, res: Response) => {
    const parsedId = drugIdParamSchema.safeParse(req.params.id);
    if (!parsedId.success) {
      return res.status(400).json({ success: false, error: { kind: "INVALID_REQUEST", message: "id must be a positive integer" } });
    }

    try {
      const drug = await catalogRepo.getDrugById(parsedId.data);
      if (!drug) {
        return res.status(404).json({ success: false, error: { kind: "NOT_FOUND", message: `No drug with id ${parsedId.data}` } });
      }
      return res.json({ success: true, data: drug });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  app.get("/api/search/name", (req: Request, res: Response) => {
    try {
      const { q, limit } = nameSearchQuerySchema.parse(req.query);
      const results = catalogRepo.searchByName(q, limit);
      return res.json({ success: true, count: results.length, data: results });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  app.get("/api/search/features", (req: Request, res: Response) => {
    try {
      const criteria = featureSearchQuerySchema.parse(req.query);
      const results = catalogRepo.searchByFeatures(criteria);
      return res.json({ success: true, count: results.length, data: results });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  app.get("/api/statistics", (_req: Request, res: Response) => {
    try {
      return res.json({ success: true, data: catalogRepo.getStatistics() });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });
}
