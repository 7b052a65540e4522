// src/middleware/asyncHandler.ts
import type { Response, NextFunction, RequestHandler } from "express";
import type { AuthenticatedRequest } from "./auth";

/**
 * Wraps async route handlers so rejections reach the Express error handler.
 */
export function asyncHandler(
  fn: (req: AuthenticatedRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default asyncHandler;
