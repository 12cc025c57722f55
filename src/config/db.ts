import { Pool } from "pg";
import { logger } from "../logger";

export interface DatabaseSettings {
  connectionString?: string;
}

export function createPool({ connectionString }: DatabaseSettings): Pool {
  const pool = connectionString
    ? new Pool({ connectionString })
    : new Pool({
        host: process.env.PGHOST,
        port: process.env.PGPORT ? Number(process.env.PGPORT) : undefined,
        user: process.env.PGUSER,
        password: process.env.PGPASSWORD,
        database: process.env.PGDATABASE,
        ssl: process.env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    logger.error("db:pool_error", { error: error.message });
  });

  return pool;
}
