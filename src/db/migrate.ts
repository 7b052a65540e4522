import type { SqlClient } from "./pool";

export async function migrate(db: SqlClient): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS nt_users (
      email TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      password_hash TEXT NOT NULL,
      goal JSONB NOT NULL,
      calibration JSONB,
      profile JSONB NOT NULL DEFAULT '{}'::jsonb,
      created TEXT NOT NULL
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS nt_meals (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL,
      name TEXT NOT NULL,
      macros JSONB NOT NULL,
      date TEXT NOT NULL, -- YYYY-MM-DD, UTC
      created TEXT NOT NULL, -- ISO-8601, UTC
      source TEXT NOT NULL DEFAULT 'manual',
      estimator TEXT,
      seq BIGSERIAL
    );
  `);
  // Equality lookups by owner only; no foreign key to nt_users
  await db.query(`
    CREATE INDEX IF NOT EXISTS idx_nt_meals_email ON nt_meals(email);
  `);
}
