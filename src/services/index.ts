import type { Storage } from "../db/storage";
import type { Env } from "../middleware/validateEnv";
import { SessionGate } from "../middleware/auth";
import { type Clock, systemClock } from "../utils/date";
import { AccountStore } from "./accountStore";
import { MealLedger } from "./mealLedger";
import type { MacroEstimator } from "./macroEstimator";

export interface AppServices {
  accounts: AccountStore;
  ledger: MealLedger;
  sessions: SessionGate;
}

export interface ServiceOptions {
  clock?: Clock;
  estimators?: readonly MacroEstimator[];
}

export function createServices(storage: Storage, env: Env, options: ServiceOptions = {}): AppServices {
  const clock = options.clock ?? systemClock;
  return {
    accounts: new AccountStore(storage, {
      minPasswordLength: env.MIN_PASSWORD_LENGTH,
      saltRounds: env.PASSWORD_SALT_ROUNDS,
      defaultGoal: {
        calories: env.DEFAULT_CALORIES_TARGET,
        protein: env.DEFAULT_PROTEIN_TARGET,
        carbs: env.DEFAULT_CARBS_TARGET,
        fats: env.DEFAULT_FAT_TARGET,
      },
      clock,
    }),
    ledger: new MealLedger(storage, { clock, estimators: options.estimators }),
    sessions: new SessionGate({ secret: env.JWT_SECRET, expiresIn: env.JWT_EXPIRES_IN, clock }),
  };
}

export { AccountStore, normalizeEmail, DEFAULT_GOAL } from "./accountStore";
export { MealLedger } from "./mealLedger";
export * from "./macroEstimator";
