import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "../shared/schema";
import { config } from "./config";

export type Database = NodePgDatabase<typeof schema>;

// No pool without DATABASE_URL; storage falls back to memory in that case
export const pool = config.databaseUrl && !config.useMemStorage
  ? new pg.Pool({ connectionString: config.databaseUrl })
  : undefined;

export const db: Database | undefined = pool ? drizzle(pool, { schema }) : undefined;

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
}
