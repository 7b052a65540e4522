/**
 * Account routes
 * Registration and login; login hands out the bearer token used everywhere else
 */

import { Router } from "express";
import { z } from "zod";
import { BowlSizeSchema } from "../schema";
import type { AppServices } from "../services";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { validateLogin, validateRegistration } from "../middleware/validation";

const registerSchema = z.object({
  name: z.string(),
  email: z.string(),
  password: z.string(),
  bowl_size: BowlSizeSchema.optional(),
  target_weight: z.number().positive().optional(),
});

const loginSchema = z.object({
  email: z.string(),
  password: z.string(),
});

export function createAuthRouter({ accounts, ledger, sessions }: AppServices): Router {
  const router = Router();

  /**
   * POST /register
   * Body: { name, email, password, bowl_size?, target_weight? }
   * Returns: { ok, msg }
   */
  router.post(
    "/register",
    validateRegistration,
    asyncHandler(async (req, res) => {
      const parsed = registerSchema.parse(req.body);

      const account = await accounts.register({
        name: parsed.name,
        email: parsed.email,
        password: parsed.password,
        bowlSize: parsed.bowl_size,
        targetWeight: parsed.target_weight,
      });

      console.log(`[auth] registered ${account.email}`);
      sendSuccess(res, { msg: "registered" }, 201);
    })
  );

  /**
   * POST /login
   * Body: { email, password }
   * Returns profile, goal, calibration, a bearer token and today's totals
   */
  router.post(
    "/login",
    validateLogin,
    asyncHandler(async (req, res) => {
      const parsed = loginSchema.parse(req.body);

      const account = await accounts.login(parsed.email, parsed.password);
      const token = sessions.issue(account.email);
      const today = await ledger.totalsForToday(account.email);

      sendSuccess(res, {
        email: account.email,
        name: account.name,
        goal: account.goal,
        calibration: account.calibration,
        profile: account.profile,
        token,
        tokenType: "Bearer",
        expiresIn: sessions.expiresIn,
        today,
      });
    })
  );

  return router;
}

export default createAuthRouter;
