import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "./schema.js";
import { loadConfig } from "../shared/config.js";

const config = loadConfig();
if (!config.databaseUrl) {
  throw new Error("DATABASE_URL is not set");
}

export const pool = new pg.Pool({ connectionString: config.databaseUrl });

export const db = drizzle(pool, { schema });

export type Database = typeof db;
