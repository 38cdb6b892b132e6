/**
 * packages/db - DB connection helper
 *
 * Owns the `Pool` / `drizzle` initialization so apps only pass a connection string.
 * The returned `db` is bound to the schema.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema>;

export interface DbConnection {
  db: Db;
  /** Drain and close the pool */
  close: () => Promise<void>;
}

export function getDb(connectionString: string, maxConnections = 5): DbConnection {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString, max: maxConnections });
  const db = drizzle(pool, { schema });

  return {
    db,
    close: () => pool.end(),
  };
}
