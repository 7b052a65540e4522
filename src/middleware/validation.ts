// src/middleware/validation.ts
// Input validation middleware using express-validator

import { body, validationResult } from "express-validator";
import type { Request, Response, NextFunction } from "express";
import { sendValidationError } from "./responseHelper";

/**
 * Validation error handler middleware
 * Returns 400 Bad Request with validation errors
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return sendValidationError(res, errors.array());
  }
  next();
}

/**
 * POST /register body
 * Password length is left to the account store, which knows the configured minimum.
 */
export const validateRegistration = [
  body("name")
    .isString()
    .trim()
    .isLength({ min: 1, max: 100 })
    .withMessage("Name must be between 1 and 100 characters"),

  body("email")
    .isString()
    .trim()
    .isEmail()
    .withMessage("Valid email required"),

  body("password")
    .isString()
    .withMessage("Password is required"),

  body("bowl_size")
    .optional()
    .isIn(["small", "medium", "large"])
    .withMessage("bowl_size must be small, medium or large"),

  body("target_weight")
    .optional()
    .isFloat({ gt: 0, max: 1000 })
    .withMessage("target_weight must be a positive number")
    .toFloat(),

  handleValidationErrors,
];

/**
 * POST /login body
 */
export const validateLogin = [
  body("email")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Email is required"),

  body("password")
    .isString()
    .withMessage("Password is required"),

  handleValidationErrors,
];
