import { z } from "zod";

/**
 * Persisted shapes. Every backend parses what it reads through these so a
 * hand-edited data file or a stray row can't leak malformed values upward.
 */

export const BowlSizeSchema = z.enum(["small", "medium", "large"]);

export const GoalSchema = z.object({
  calories: z.number(),
  protein: z.number(),
  carbs: z.number(),
  fats: z.number(),
});

export const MacrosSchema = z.object({
  calories: z.number(),
  protein: z.number(),
  carbs: z.number(),
  fats: z.number(),
});

export const CalibrationSchema = z.object({
  small: z.number(),
  medium: z.number(),
  large: z.number(),
});

export const ProfileSchema = z.object({
  bowlSize: BowlSizeSchema.optional(),
  targetWeight: z.number().optional(),
});

export const AccountSchema = z.object({
  email: z.string(),
  name: z.string(),
  passwordHash: z.string(),
  goal: GoalSchema,
  calibration: CalibrationSchema.nullable().default(null),
  profile: ProfileSchema.default({}),
  created: z.string(),
});

export const EstimatorNameSchema = z.enum(["fixed-default", "calibrated-scale", "image-heuristic"]);

export const MealRecordSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  macros: MacrosSchema,
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/), // YYYY-MM-DD
  created: z.string(), // ISO
  source: z.enum(["manual", "analyze"]).default("manual"),
  estimator: EstimatorNameSchema.optional(),
});

export const DataFileSchema = z.object({
  users: z.record(AccountSchema).default({}),
  meals: z.array(MealRecordSchema).default([]),
});
