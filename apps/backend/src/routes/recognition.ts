/**
 * Recognition Router
 *
 * POST /api/recognize            multipart upload, runs one recognition job
 * GET  /api/progress/:requestId  polling endpoint for a running job
 * POST /api/cancel               cooperative cancel by request_id
 */

import type { Express, NextFunction, Request, Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { InvalidImageError, InvalidRequestError, ShuttingDownError } from "../domain/errors";
import { RECOGNITION_MODES } from "../domain/job";
import { httpStatusFor, sendError } from "./httpErrors";

export const ALLOWED_IMAGE_MIMES = ["image/png", "image/jpeg", "image/jpg", "image/webp"];

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export const optionalText = (maxLength: number) =>
  z.preprocess(blankToUndefined, z.string().trim().max(maxLength).optional());

const modeSchema = z.enum(RECOGNITION_MODES);

export const recognizeFieldsSchema = z.object({
  mode: z.preprocess(blankToUndefined, modeSchema.optional()),
  // Older clients send the mode as "model"
  model: z.preprocess(blankToUndefined, modeSchema.optional()),
  top_k: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  shape: optionalText(64),
  color: optionalText(64),
  request_id: optionalText(128),
});

export const cancelBodySchema = z.object({
  request_id: z.string().trim().min(1).max(128),
});

export function registerRecognitionRoutes(app: Express, ctx: AppContext): void {
  const { logger, recognition, config } = ctx;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.uploadMaxBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (ALLOWED_IMAGE_MIMES.includes(file.mimetype)) {
        cb(null, true);
      } else {
        cb(new InvalidImageError("Only PNG, JPEG and WebP images are allowed"));
      }
    },
  }).single("image");

  const acceptUpload = (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (err: unknown) => {
      if (!err) return next();
      if (err instanceof multer.MulterError) {
        return sendError(res, new InvalidRequestError(`Upload rejected: ${err.message}`), logger);
      }
      return sendError(res, err, logger);
    });
  };

  /**
   * POST /api/recognize
   * Fields: image (file), mode|model, top_k, shape, color, request_id
   */
  app.post("/api/recognize", acceptUpload, async (req: Request, res: Response) => {
    if (ctx.isShuttingDown()) {
      return sendError(res, new ShuttingDownError(), logger);
    }
    if (!req.file) {
      return sendError(res, new InvalidRequestError("image file is required"), logger);
    }

    try {
      const fields = recognizeFieldsSchema.parse(req.body ?? {});
      const response = await recognition.recognize({
        image: req.file.buffer,
        mode: fields.mode ?? fields.model ?? "auto",
        topK: fields.top_k,
        filters: { shape: fields.shape, color: fields.color },
        requestId: fields.request_id,
      });

      const status = response.error ? httpStatusFor(response.error.kind) : 200;
      return res.status(status).json(response);
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  /**
   * GET /api/progress/:requestId
   */
  app.get("/api/progress/:requestId", (req: Request, res: Response) => {
    try {
      const progress = recognition.getProgress(req.params.requestId);
      return res.json({ success: true, requestId: req.params.requestId, ...progress });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  /**
   * POST /api/cancel
   * Body: { request_id }. Acknowledged only for pending or running jobs.
   */
  app.post("/api/cancel", (req: Request, res: Response) => {
    try {
      const { request_id } = cancelBodySchema.parse(req.body ?? {});
      const { acknowledged } = recognition.cancel(request_id);
      return res.json({
        success: true,
        requestId: request_id,
        acknowledged,
        ...(!acknowledged && { message: "not running or already finished" }),
      });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });
}
