/**
 * packages/db - DB connection helper
 *
 * Builds the `Pool` + drizzle instance with the schema attached. The pool is
 * reachable as `db.$client` so the owner can end it on shutdown.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema> & { $client: Pool };

export function getDb(connectionString: string): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}

export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
