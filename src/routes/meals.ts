import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { BowlSizeSchema } from "../schema";
import type { AppServices } from "../services";
import { asyncHandler } from "../middleware/asyncHandler";
import { getAccountEmail } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";
import { sumMacros } from "../services/mealLedger";

// Multer instance for in-memory image uploads on /analyze
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 8 * 1024 * 1024 }, // 8 MB
});

const addMealSchema = z.object({
  name: z.string().max(200).optional(),
  macros: z.object({
    calories: z.number().nonnegative(),
    protein: z.number().nonnegative().default(0),
    carbs: z.number().nonnegative().default(0),
    fats: z.number().nonnegative().default(0),
  }),
});

// Multipart fields arrive as strings, so hints are coerced; blanks count as absent
const optionalAmount = z.preprocess(
  (v) => (v === "" || v === null ? undefined : v),
  z.coerce.number().nonnegative().optional()
);

const analyzeSchema = z.object({
  name: z.string().max(200).optional(),
  calories: optionalAmount,
  protein: optionalAmount,
  carbs: optionalAmount,
  fats: optionalAmount,
  image: z.string().optional(), // base64, optionally a data: URL
  bowl_size: BowlSizeSchema.optional(),
  portion: z.preprocess(
    (v) => (v === "" || v === null ? undefined : v),
    z.coerce.number().positive().max(1000).optional()
  ),
});

function decodeImage(encoded: string): Buffer {
  const base64 = encoded.replace(/^data:[^;]+;base64,/, "");
  return Buffer.from(base64, "base64");
}

/**
 * Meal logging routes. Mount behind authMiddleware.
 */
export function createMealsRouter({ accounts, ledger }: AppServices): Router {
  const router = Router();

  // POST /add-meal: { name?, macros: { calories, protein?, carbs?, fats? } }
  router.post(
    "/add-meal",
    asyncHandler(async (req, res) => {
      const parsed = addMealSchema.parse(req.body);
      const meal = await ledger.logMeal(getAccountEmail(req), parsed.name, parsed.macros);

      sendSuccess(res, { msg: "meal added", meal }, 201);
    })
  );

  // POST /analyze: JSON hints / base64 image, or multipart with an `image` file
  router.post(
    "/analyze",
    upload.single("image"),
    asyncHandler(async (req, res) => {
      const email = getAccountEmail(req);
      const parsed = analyzeSchema.parse(req.body);

      const image = req.file?.buffer ?? (parsed.image ? decodeImage(parsed.image) : undefined);

      const { meal, estimator } = await ledger.analyzeAndLog(email, {
        name: parsed.name,
        hints: {
          calories: parsed.calories,
          protein: parsed.protein,
          carbs: parsed.carbs,
          fats: parsed.fats,
        },
        bowlSize: parsed.bowl_size,
        portion: parsed.portion,
        image,
      });
      const today = await ledger.totalsForToday(email);

      sendSuccess(res, { meal, macros: meal.macros, estimator, today }, 201);
    })
  );

  // GET /today
  router.get(
    "/today",
    asyncHandler(async (req, res) => {
      const email = getAccountEmail(req);
      const goal = await accounts.getGoal(email);
      const date = ledger.today();
      const meals = await ledger.mealsForToday(email, date);

      sendSuccess(res, { date, totals: sumMacros(meals), goal, meals });
    })
  );

  // GET /history: newest first, no pagination
  router.get(
    "/history",
    asyncHandler(async (req, res) => {
      const meals = await ledger.history(getAccountEmail(req));
      sendSuccess(res, { meals });
    })
  );

  return router;
}

export default createMealsRouter;
