import { Pool } from "pg";
import { drizzle, NodePgDatabase, NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import { PgDatabase } from "drizzle-orm/pg-core";

/** The pool-bound database or an open transaction. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT>;

export interface DbOptions {
  connectionString: string;
  ssl: boolean;
  max: number;
}

export interface DbHandle {
  pool: Pool;
  db: NodePgDatabase;
  close(): Promise<void>;
}

export function openDb(options: DbOptions): DbHandle {
  const pool = new Pool({
    connectionString: options.connectionString,
    // Hosted Postgres connection strings usually carry sslmode=require.
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
    max: options.max
  });
  const db = drizzle(pool);

  let closed = false;
  return {
    pool,
    db,
    async close() {
      if (closed) return;
      closed = true;
      await pool.end();
    }
  };
}
