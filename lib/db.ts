import { Pool, type PoolClient, type PoolConfig, type QueryResultRow } from "pg";

import { getConfig, type AppConfig } from "./config";
import { createLogger, errorFields } from "./logger";

export type DbQueryable = Pick<Pool, "query"> | PoolClient;

declare global {
  // eslint-disable-next-line no-var
  var __dailyVerseDbPool: Pool | undefined;
}

const log = createLogger("db");

/** Hosted databases get TLS; localhost does not unless DATABASE_SSL says so. */
export function sslOption(
  connectionString: string,
  mode: AppConfig["databaseSsl"],
): PoolConfig["ssl"] {
  const isLocal =
    connectionString.includes("localhost") || connectionString.includes("127.0.0.1");
  const useSsl =
    mode === "require" ||
    (mode === "auto" && (!isLocal || connectionString.includes("sslmode=require")));
  return useSsl ? { rejectUnauthorized: false } : undefined;
}

function getPool(): Pool {
  if (global.__dailyVerseDbPool) {
    return global.__dailyVerseDbPool;
  }

  const { databaseUrl, databaseSsl } = getConfig();
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: sslOption(databaseUrl, databaseSsl),
  });
  // an idle client dropped by the server must not take the process down
  pool.on("error", (error) => log.error("idle database client failed", errorFields(error)));

  global.__dailyVerseDbPool = pool;
  return pool;
}

export async function dbQuery<T extends QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client?: DbQueryable,
): Promise<T[]> {
  const executor = client ?? getPool();
  const result = await executor.query<T>(text, params);
  return result.rows;
}

export async function dbQueryOne<T extends QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client?: DbQueryable,
): Promise<T | null> {
  const rows = await dbQuery<T>(text, params, client);
  return rows[0] ?? null;
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const pool = getPool();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      log.error("rollback failed", errorFields(rollbackError));
    }
    throw error;
  } finally {
    client.release();
  }
}

/** Postgres SQLSTATE 23505. */
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "23505"
  );
}

export async function closePool(): Promise<void> {
  const pool = global.__dailyVerseDbPool;
  global.__dailyVerseDbPool = undefined;
  if (pool) {
    await pool.end();
  }
}
