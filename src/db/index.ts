import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbOptions {
  /** Upper bound on pooled connections per process. */
  poolSize: number;
}

export function createDb(databaseUrl: string, options: DbOptions = { poolSize: 20 }) {
  const client = postgres(databaseUrl, {
    max: options.poolSize,
    idle_timeout: 30,
    connect_timeout: 5,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDb>["db"];
