import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from "pg";

// Clinic database access. One pool per process, created on first use;
// nothing connects unless DATABASE_URL selects the PostgreSQL repositories.

let pool: Pool | undefined;

function envInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function poolConfig(): PoolConfig {
  return {
    connectionString: process.env.DATABASE_URL,
    max: envInt("DB_POOL_MAX", 10),
    idleTimeoutMillis: envInt("DB_IDLE_TIMEOUT", 30000),
    connectionTimeoutMillis: envInt("DB_CONNECT_TIMEOUT", 5000),
    ssl: process.env.DB_SSL === "false"
      ? false
      : { rejectUnauthorized: process.env.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
  };
}

export function getDatabasePool(): Pool {
  if (!pool) {
    pool = new Pool(poolConfig());
    pool.on("error", (err: Error) => {
      console.error("[Clinic DB] Idle client error:", err.message);
    });
    console.log("[Clinic DB] Pool ready");
  }
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const started = Date.now();
  const result = await getDatabasePool().query<T>(text, params);

  const elapsed = Date.now() - started;
  if (elapsed > envInt("DB_SLOW_QUERY_MS", 1000)) {
    console.warn(`[Clinic DB] Slow query (${elapsed}ms):`, text.substring(0, 100));
  }

  return result;
}

// Used by the health endpoint; never throws.
export async function checkDatabase(): Promise<"ok" | "unreachable"> {
  try {
    await query("SELECT 1");
    return "ok";
  } catch (err) {
    console.error("[Clinic DB] Health check failed:", err instanceof Error ? err.message : err);
    return "unreachable";
  }
}

export async function closeDatabasePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = undefined;
  await closing.end();
  console.log("[Clinic DB] Pool closed");
}
