import { Router } from "express";
import { z } from "zod";
import type { AppServices } from "../services";
import { asyncHandler } from "../middleware/asyncHandler";
import { getAccountEmail } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";

const goalFields = z.object({
  calories: z.number(),
  protein: z.number(),
  carbs: z.number(),
  fats: z.number(),
});

// Accepts both { goal: {...} } and the flat { calories, protein, carbs, fats }
const setGoalSchema = z.union([z.object({ goal: goalFields }), goalFields]);

const calibrateSchema = z.object({
  small: z.number(),
  medium: z.number(),
  large: z.number(),
});

/**
 * Goal and calibration routes. Mount behind authMiddleware.
 */
export function createGoalsRouter({ accounts, ledger }: AppServices): Router {
  const router = Router();

  // POST /set-goal: replaces the whole goal
  router.post(
    "/set-goal",
    asyncHandler(async (req, res) => {
      const email = getAccountEmail(req);
      const parsed = setGoalSchema.parse(req.body);
      const goalInput = "goal" in parsed ? parsed.goal : parsed;

      const goal = await accounts.setGoal(email, goalInput);
      const today = await ledger.totalsForToday(email);

      sendSuccess(res, { goal, today });
    })
  );

  // GET /get-goal
  router.get(
    "/get-goal",
    asyncHandler(async (req, res) => {
      const account = await accounts.getProfile(getAccountEmail(req));
      const today = await ledger.totalsForToday(account.email);

      sendSuccess(res, { goal: account.goal, calibration: account.calibration, today });
    })
  );

  // POST /calibrate: bowl-size factors used by /analyze
  router.post(
    "/calibrate",
    asyncHandler(async (req, res) => {
      const parsed = calibrateSchema.parse(req.body);
      const calibration = await accounts.setCalibration(getAccountEmail(req), parsed);

      sendSuccess(res, { calibration });
    })
  );

  return router;
}
