import { Pool } from "pg";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { config } from "../config";
import { logger } from "../logger";
import { SYSTEM_TRACE_ID } from "../trace/trace";

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

export async function migrate(): Promise<void> {
  if (config.useInMemoryStore) {
    logger.warn({ traceId: SYSTEM_TRACE_ID }, "In-memory ledger selected; processed items will not survive a restart");
    return;
  }
  const builtPath = join(__dirname, "migrations", "001_init.sql");
  const srcPath = join(process.cwd(), "services", "publishing-service", "src", "db", "migrations", "001_init.sql");
  const sqlPath = existsSync(builtPath) ? builtPath : srcPath;
  const sql = readFileSync(sqlPath, "utf8");
  await getDb().query(sql);
  logger.info({ traceId: SYSTEM_TRACE_ID }, "Database migrations applied");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
