// src/middleware/responseHelper.ts
import type { Response } from "express";

/**
 * Response envelope: `{ ok: true, ...fields }` on success,
 * `{ ok: false, error, details? }` on failure.
 */
export type ApiSuccess<T extends object> = { ok: true } & T;

export interface ApiFailure {
  ok: false;
  error: string;
  details?: unknown;
}

export function sendSuccess<T extends object>(res: Response, body: T, statusCode: number = 200): Response {
  const payload: ApiSuccess<T> = { ok: true, ...body };
  return res.status(statusCode).json(payload);
}

export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  details?: unknown
): Response {
  const payload: ApiFailure = { ok: false, error };
  if (details !== undefined) {
    payload.details = details;
  }
  return res.status(statusCode).json(payload);
}

export function sendValidationError(res: Response, details: unknown): Response {
  return sendError(res, "Validation failed", 400, details);
}

export function sendServerError(res: Response, message: string = "Internal server error"): Response {
  return sendError(res, message, 500);
}
