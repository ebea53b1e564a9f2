import type { NextFunction, Request, Response } from "express";
import { httpStatusFor, isIngestError } from "../lib/errors";

export interface ErrorBody {
  code: string;
  error: string;
}

/** Status and body for a failure; anything that is not an IngestError stays opaque. */
export function toErrorResponse(error: unknown, fallback: string): { status: number; body: ErrorBody } {
  if (isIngestError(error)) {
    return {
      status: httpStatusFor(error.code),
      body: { code: error.code, error: error.safeMessage },
    };
  }
  return { status: 500, body: { code: "INTERNAL_ERROR", error: fallback } };
}

export function sendError(res: Response, error: unknown, fallback: string) {
  const { status, body } = toErrorResponse(error, fallback);
  if (status >= 500) {
    console.error(`[http] ${body.code}:`, error);
  }
  res.status(status).json(body);
}

// Catches body-parser failures and anything a route forwards with next(err).
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(err);
    return;
  }
  sendError(res, err, "Internal server error");
}
