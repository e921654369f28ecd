import { Pool } from "pg";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database
    });
  }
  return pool;
}

export async function migrate(db: Pool): Promise<void> {
  const candidates = [
    join(process.cwd(), "src", "db", "migrations", "001_init.sql"),
    join(process.cwd(), "services", "pol-pipeline-service", "src", "db", "migrations", "001_init.sql")
  ];
  const sqlPath = candidates.find((candidate) => existsSync(candidate));
  if (!sqlPath) {
    throw new Error("Ledger migration 001_init.sql not found");
  }
  await db.query(readFileSync(sqlPath, "utf8"));
  logger.info({ traceId: "system" }, "Submission ledger migrations applied");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
