import "dotenv/config";
import { asSqlClient, createPool } from "../src/db/pool";
import { migrate } from "../src/db/migrate";

async function runMigrations() {
  const url = process.env.DATABASE_URL;
  if (!url) {
    console.error("DATABASE_URL missing: nothing to migrate");
    process.exit(1);
  }

  console.log("Starting database migration...\n");
  const pool = createPool(url);

  try {
    await migrate(asSqlClient(pool));
    console.log("✅ nt_users and nt_meals tables ready");
    await pool.end();
    process.exit(0);
  } catch (error) {
    console.error("Migration failed:", error);
    process.exit(1);
  }
}

void runMigrations();
