import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
}

// Returns null without DATABASE_URL; callers fall back to in-memory storage
export function createDatabase(databaseUrl: string | undefined): DatabaseHandle | null {
  if (!databaseUrl) {
    console.warn(
      "⚠️  DATABASE_URL is not set.",
      "\n   Influencer recommendations and feedback use in-memory storage.",
    );
    return null;
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    options: "-c client_encoding=UTF8",
  });

  pool.on("error", (error) => {
    console.error("[DB] ❌ Idle client error:", error.message);
  });

  const db = drizzle(pool, { schema });
  console.log("[DB] ✅ Database pool created");
  return { pool, db };
}
