import { Pool, type PoolClient, type PoolConfig, type QueryResult } from "pg";
import { config, type AppConfig } from "../config/env";

// Shared pg pool for PostgresAllergyRepository.
// Sessions are pinned to UTC so now() and CURRENT_DATE in SQL name the same
// calendar day the validators compute from the clock.

export type DatabaseSettings = AppConfig["database"];

const SLOW_QUERY_MS = 1000;

let pool: Pool | undefined;

export function poolConfigFor(settings: DatabaseSettings): PoolConfig {
  return {
    connectionString: settings.url,
    max: settings.poolMax,
    idleTimeoutMillis: settings.idleTimeoutMillis,
    connectionTimeoutMillis: settings.connectionTimeoutMillis,
    ssl: settings.ssl === false ? false : { rejectUnauthorized: settings.ssl.rejectUnauthorized },
    application_name: "allergy-catalog",
    options: "-c TimeZone=UTC",
  };
}

export function getDatabasePool(): Pool {
  if (!pool) {
    if (!config.database.url) {
      throw new Error("DATABASE_URL is not set; the Postgres repository cannot start.");
    }

    pool = new Pool(poolConfigFor(config.database));
    pool.on("error", (err: Error) => {
      console.error("[Allergies DB] Idle client error:", err.message);
    });
    console.log(`[Allergies DB] Pool ready (max ${config.database.poolMax} connections)`);
  }
  return pool;
}

function warnIfSlow(label: string, startedAt: number): void {
  const elapsed = Date.now() - startedAt;
  if (elapsed > SLOW_QUERY_MS) {
    console.warn(`[Allergies DB] Slow ${label} (${elapsed}ms)`);
  }
}

export async function query<T extends Record<string, unknown> = Record<string, unknown>>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const startedAt = Date.now();
  const result = await getDatabasePool().query<T>(text, params);
  warnIfSlow(`query: ${text.replace(/\s+/g, " ").trim().slice(0, 80)}`, startedAt);
  return result;
}

// Runs fn inside BEGIN/COMMIT on one client. The original error is rethrown
// even when the ROLLBACK itself fails.
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getDatabasePool().connect();
  const startedAt = Date.now();

  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      const detail = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
      console.error("[Allergies DB] Rollback failed:", detail);
    }
    throw err;
  } finally {
    client.release();
    warnIfSlow("transaction", startedAt);
  }
}

export async function closeDatabasePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = undefined;
  await closing.end();
  console.log("[Allergies DB] Pool closed");
}
