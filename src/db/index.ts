import type { Pool } from "pg";
import type { Env } from "../middleware/validateEnv";
import { InMemoryStore } from "../services/inMemoryStore";
import { JsonFileStore } from "./jsonFileStore";
import { migrate } from "./migrate";
import { asSqlClient, createPool } from "./pool";
import { PostgresStore } from "./postgresStore";
import type { Storage, StorageDriver } from "./storage";

export interface StorageHandle {
  storage: Storage;
  close(): Promise<void>;
}

/**
 * Build the backend named by STORAGE_DRIVER. Postgres tables are created on
 * first connect.
 */
export async function openStorage(env: Env): Promise<StorageHandle> {
  const driver: StorageDriver = env.STORAGE_DRIVER;
  switch (driver) {
    case "memory":
      return { storage: new InMemoryStore(), close: async () => undefined };

    case "file":
      console.log(`[storage] using JSON file ${env.DATA_FILE}`);
      return { storage: new JsonFileStore(env.DATA_FILE), close: async () => undefined };

    case "postgres": {
      if (!env.DATABASE_URL) {
        throw new Error("DATABASE_URL missing: Postgres not wired correctly");
      }
      const pool: Pool = createPool(env.DATABASE_URL);
      const client = asSqlClient(pool);
      await migrate(client);
      console.log("[storage] using postgres (nt_users, nt_meals)");
      return { storage: new PostgresStore(client), close: () => pool.end() };
    }
  }
}

export type { Storage, StorageDriver } from "./storage";
