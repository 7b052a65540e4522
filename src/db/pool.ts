import { Pool } from "pg";

/** Minimal query surface the postgres store needs; a `pg` Pool provides it. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    ssl: connectionString.includes("sslmode=require")
      ? { rejectUnauthorized: false }
      : undefined,
  });
}

export function asSqlClient(pool: Pool): SqlClient {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
  };
}
