import { z } from "zod";
import {
  AccountSchema,
  BowlSizeSchema,
  CalibrationSchema,
  DataFileSchema,
  EstimatorNameSchema,
  GoalSchema,
  MacrosSchema,
  MealRecordSchema,
  ProfileSchema,
} from "../schema";

export type BowlSize = z.infer<typeof BowlSizeSchema>;
export type Goal = z.infer<typeof GoalSchema>;
export type Macros = z.infer<typeof MacrosSchema>;
export type Calibration = z.infer<typeof CalibrationSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type Account = z.infer<typeof AccountSchema>;
export type EstimatorName = z.infer<typeof EstimatorNameSchema>;
export type MealRecord = z.infer<typeof MealRecordSchema>;
export type DataFile = z.infer<typeof DataFileSchema>;

export type MealSource = MealRecord["source"];

/** Account as returned to clients: everything but the credential hash. */
export type PublicAccount = Omit<Account, "passwordHash">;

export interface DailyTotals {
  calories: number;
  protein: number;
  carbs: number;
  fats: number;
}
