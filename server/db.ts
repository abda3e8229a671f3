import pg from "pg";
import type { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export function createDatabase(databaseUrl: string): { pool: Pool; db: Database } {
  const pool = new pg.Pool({ connectionString: databaseUrl });
  pool.on("error", (err) => {
    console.error("[DB] Idle client error:", err);
  });
  const db = drizzle(pool, { schema });
  return { pool, db };
}
