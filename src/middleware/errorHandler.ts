import type { Request, Response, NextFunction } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { AppError } from "../domain/errors";
import { sendError, sendServerError, sendValidationError } from "./responseHelper";

/**
 * Last middleware in the chain. Known errors map to their status; anything
 * else is logged and answered with a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    sendError(res, err.message, err.statusCode);
    return;
  }

  // Request-body schemas only; storage reads raise StorageError and land in the 500 branch
  if (err instanceof ZodError) {
    sendValidationError(
      res,
      err.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    );
    return;
  }

  if (err instanceof MulterError) {
    sendError(res, err.message, 400);
    return;
  }

  // express.json() rejects malformed bodies with a 400-typed error
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    sendError(res, "Malformed JSON body", 400);
    return;
  }

  console.error(`❌ SERVER ERROR ${req.method} ${req.originalUrl}:`, err);
  sendServerError(res);
}

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, `Not Found: ${req.method} ${req.path}`, 404);
}
