import { z } from "zod";
import type { Account, MealRecord } from "../domain/types";
import {
  CalibrationSchema,
  EstimatorNameSchema,
  GoalSchema,
  MacrosSchema,
  ProfileSchema,
} from "../schema";
import type { SqlClient } from "./pool";
import { parseStored, type Storage } from "./storage";

const UserRowSchema = z.object({
  email: z.string(),
  name: z.string(),
  password_hash: z.string(),
  goal: GoalSchema,
  calibration: CalibrationSchema.nullable(),
  profile: ProfileSchema.nullable(),
  created: z.string(),
});

const MealRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  macros: MacrosSchema,
  date: z.string(),
  created: z.string(),
  source: z.enum(["manual", "analyze"]),
  estimator: EstimatorNameSchema.nullable(),
});

function toAccount(row: unknown): Account {
  const r = parseStored(UserRowSchema, row, "nt_users row");
  return {
    email: r.email,
    name: r.name,
    passwordHash: r.password_hash,
    goal: r.goal,
    calibration: r.calibration,
    profile: r.profile ?? {},
    created: r.created,
  };
}

function toMeal(row: unknown): MealRecord {
  const r = parseStored(MealRowSchema, row, "nt_meals row");
  const meal: MealRecord = {
    id: r.id,
    email: r.email,
    name: r.name,
    macros: r.macros,
    date: r.date,
    created: r.created,
    source: r.source,
  };
  if (r.estimator) meal.estimator = r.estimator;
  return meal;
}

/**
 * `nt_users` / `nt_meals` tables (see migrate.ts). JSONB columns hold the
 * goal, calibration, profile and macros objects.
 */
export class PostgresStore implements Storage {
  constructor(private readonly db: SqlClient) {}

  async getAccount(email: string): Promise<Account | null> {
    const result = await this.db.query(
      `SELECT email, name, password_hash, goal, calibration, profile, created
       FROM nt_users
       WHERE email = $1`,
      [email]
    );
    return result.rows.length === 0 ? null : toAccount(result.rows[0]);
  }

  async insertAccount(account: Account): Promise<boolean> {
    const result = await this.db.query(
      `INSERT INTO nt_users (email, name, password_hash, goal, calibration, profile, created)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (email) DO NOTHING
       RETURNING email`,
      [
        account.email,
        account.name,
        account.passwordHash,
        JSON.stringify(account.goal),
        account.calibration ? JSON.stringify(account.calibration) : null,
        JSON.stringify(account.profile),
        account.created,
      ]
    );
    return result.rows.length > 0;
  }

  async updateAccount(account: Account): Promise<void> {
    await this.db.query(
      `UPDATE nt_users
       SET name = $2, password_hash = $3, goal = $4, calibration = $5, profile = $6
       WHERE email = $1`,
      [
        account.email,
        account.name,
        account.passwordHash,
        JSON.stringify(account.goal),
        account.calibration ? JSON.stringify(account.calibration) : null,
        JSON.stringify(account.profile),
      ]
    );
  }

  async insertMeal(meal: MealRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO nt_meals (id, email, name, macros, date, created, source, estimator)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        meal.id,
        meal.email,
        meal.name,
        JSON.stringify(meal.macros),
        meal.date,
        meal.created,
        meal.source,
        meal.estimator ?? null,
      ]
    );
  }

  async listMeals(email: string): Promise<MealRecord[]> {
    const result = await this.db.query(
      `SELECT id, email, name, macros, date, created, source, estimator
       FROM nt_meals
       WHERE email = $1
       ORDER BY seq ASC`,
      [email]
    );
    return result.rows.map(toMeal);
  }
}
