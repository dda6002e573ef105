import type { Logger } from "pino";
import { ZodError } from "zod";
import { toErrorPayload, type ErrorKind } from "../domain/errors";

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  INVALID_IMAGE: 400,
  EMPTY_IMAGE: 400,
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  DUPLICATE_JOB: 409,
  CATALOG_UNAVAILABLE: 503,
  OCR_UNAVAILABLE: 503,
  SHUTTING_DOWN: 503,
  TIMEOUT: 504,
};

export const httpStatusFor = (kind: ErrorKind): number => STATUS_BY_KIND[kind] ?? 500;

/** Validation message for the first failing field, e.g. "top_k: Expected number, received nan". */
export const describeZodError = (error: ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
};

/** The part of an express Response that error replies use. */
export interface ErrorResponder {
  status(code: number): { json(body: unknown): unknown };
}

/**
 * Write an error response in the { success: false, error: { kind, message } }
 * shape. Unexpected errors are logged and reported as INTERNAL.
 */
export function sendError(res: ErrorResponder, error: unknown, logger: Logger): void {
  if (error instanceof ZodError) {
    res.status(400).json({ success: false, error: { kind: "INVALID_REQUEST", message: describeZodError(error) } });
    return;
  }

  const payload = toErrorPayload(error);
  const status = httpStatusFor(payload.kind);
  if (status >= 500) {
    logger.error({ err: error, kind: payload.kind }, "Request failed");
  }
  res.status(status).json({ success: false, error: payload });
}
