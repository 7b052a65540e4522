import { v4 as uuid } from "uuid";
import type { Storage } from "../db/storage";
import { NotFoundError } from "../domain/errors";
import type { Account, BowlSize, DailyTotals, EstimatorName, Macros, MealRecord, MealSource } from "../domain/types";
import { type Clock, systemClock, toDateOnly, todayDateOnly } from "../utils/date";
import { normalizeEmail } from "./accountStore";
import { DEFAULT_ESTIMATORS, type MacroEstimator, estimateMacros } from "./macroEstimator";

export interface MealLedgerOptions {
  clock?: Clock;
  estimators?: readonly MacroEstimator[];
}

export interface AnalyzeInput {
  name?: string;
  hints: Partial<Macros>;
  bowlSize?: BowlSize;
  portion?: number;
  image?: Buffer;
}

export interface AnalyzeResult {
  meal: MealRecord;
  estimator: EstimatorName;
}

export function emptyTotals(): DailyTotals {
  return { calories: 0, protein: 0, carbs: 0, fats: 0 };
}

export function sumMacros(meals: MealRecord[]): DailyTotals {
  return meals.reduce((total, m) => {
    total.calories += Math.trunc(m.macros.calories);
    total.protein += m.macros.protein;
    total.carbs += m.macros.carbs;
    total.fats += m.macros.fats;
    return total;
  }, emptyTotals());
}

export class MealLedger {
  private readonly clock: Clock;
  private readonly estimators: readonly MacroEstimator[];

  constructor(private readonly storage: Storage, options: MealLedgerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.estimators = options.estimators ?? DEFAULT_ESTIMATORS;
  }

  async logMeal(email: string, name: string | undefined, macros: Macros): Promise<MealRecord> {
    const account = await this.requireAccount(email);
    return this.append(account, name, macros, "manual");
  }

  /**
   * Estimate macros with the first applicable estimator and log the result
   * like any other meal. Bowl size falls back to the account profile.
   */
  async analyzeAndLog(email: string, input: AnalyzeInput): Promise<AnalyzeResult> {
    const account = await this.requireAccount(email);
    const { macros, estimator } = estimateMacros(
      {
        hints: input.hints,
        bowlSize: input.bowlSize ?? account.profile.bowlSize,
        portion: input.portion,
        image: input.image,
        calibration: account.calibration,
      },
      this.estimators
    );
    const meal = await this.append(account, input.name, macros, "analyze", estimator);
    return { meal, estimator };
  }

  /** Current UTC date (YYYY-MM-DD) on the ledger's clock. */
  today(): string {
    return todayDateOnly(this.clock());
  }

  async mealsForToday(email: string, date: string = this.today()): Promise<MealRecord[]> {
    const account = await this.requireAccount(email);
    const meals = await this.storage.listMeals(account.email);
    return meals.filter((m) => m.date === date);
  }

  async totalsForToday(email: string): Promise<DailyTotals> {
    return sumMacros(await this.mealsForToday(email));
  }

  /**
   * Every meal the account ever logged, newest first.
   */
  async history(email: string): Promise<MealRecord[]> {
    const account = await this.requireAccount(email);
    const meals = await this.storage.listMeals(account.email);
    // Array.prototype.sort is stable, so same-instant meals keep insertion order
    return meals.sort((a, b) => (a.created < b.created ? 1 : a.created > b.created ? -1 : 0));
  }

  private async append(
    account: Account,
    name: string | undefined,
    macros: Macros,
    source: MealSource,
    estimator?: EstimatorName
  ): Promise<MealRecord> {
    const created = this.clock().toISOString();
    const meal: MealRecord = {
      id: `${account.email}_${created}_${uuid().slice(0, 8)}`,
      email: account.email,
      name: name?.trim() || "Meal",
      macros: {
        calories: Math.round(macros.calories),
        protein: macros.protein,
        carbs: macros.carbs,
        fats: macros.fats,
      },
      date: toDateOnly(created),
      created,
      source,
    };
    if (estimator) meal.estimator = estimator;

    await this.storage.insertMeal(meal);
    return meal;
  }

  private async requireAccount(email: string): Promise<Account> {
    const account = await this.storage.getAccount(normalizeEmail(email));
    if (!account) {
      throw new NotFoundError("User not found");
    }
    return account;
  }
}
