import pg from "pg";
import type { Pool as PgPool } from "pg";
import { logger } from "../../../shared/observability/src/logger.js";
import { CircuitBreaker } from "../../../shared/circuit-breaker/src/index.js";

const { Pool } = pg;

// ── Database pool ──────────────────────────────────────────────────────────

const dbHost = process.env.DB_HOST || "localhost";

const pgConfig = {
  host: dbHost,
  port: parseInt(process.env.DB_PORT || "5432"),
  user: process.env.DB_USER || "nps_reader",
  database: process.env.DB_NAME || "nps_survey",
  password: process.env.DB_PASSWORD || "",
  ssl:
    process.env.DB_SSL === "false" || dbHost === "localhost"
      ? false
      : { rejectUnauthorized: false },
};

// Created on first query so that spreadsheet-backed runs never open a pool
let pool: PgPool | null = null;

function getPool(): PgPool {
  if (pool) return pool;

  logger.info("Initializing PG pool", {
    host: pgConfig.host,
    port: pgConfig.port,
    user: pgConfig.user,
    database: pgConfig.database,
  });

  pool = new Pool(pgConfig);

  pool.on("connect", () => {
    logger.debug("PG pool: new client connected", {
      host: pgConfig.host,
      database: pgConfig.database,
    });
  });

  pool.on("error", (err) => {
    logger.error("PG pool: unexpected error on idle client", {
      error: err.message,
    });
  });

  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
}

// ── Circuit breaker for PG queries ────────────────────────────────────────

const dbCircuitBreaker = new CircuitBreaker({
  name: "postgresql",
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
});

/** Circuit breaker snapshot for health checks */
export function getDbCircuitSnapshot() {
  return dbCircuitBreaker.snapshot();
}

// ── Read-only query helper ───────────────────────────────────────────

export async function executeReadOnlyQuery(sql: string, params?: unknown[]) {
  return dbCircuitBreaker.execute(async () => {
    const client = await getPool().connect();
    try {
      await client.query("BEGIN TRANSACTION READ ONLY");
      await client.query("SET LOCAL statement_timeout = '30s'");
      const result = await client.query(sql, params);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  });
}
