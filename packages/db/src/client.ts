/**
 * PostgreSQL Client
 *
 * Thin wrapper over a `pg` connection pool. Raw SQL, no ORM.
 *
 * - One pool per process, shared by every store
 * - Query timing feeds the metrics exposed on /metrics
 * - pg and socket errors are translated to DuplicateKeyError /
 *   StoreUnavailableError before they leave this module
 *
 * Environment Variables (read by the API config, passed in here):
 * - DATABASE_URL: connection string
 * - DB_POOL_MAX: maximum connections
 * - DB_TIMEOUT_MS: statement and connection timeout
 */

import pg from "pg";
import { createLogger } from "@shortlane/logger";
import { translatePgError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface QueryRows<R> {
  rows: R[];
  rowCount: number | null;
}

/**
 * The slice of a pg pool the stores use. Tests script it in process.
 */
export interface Queryable {
  query<R>(text: string, values?: unknown[]): Promise<QueryRows<R>>;
}

export interface PgClient extends Queryable {
  ping(): Promise<boolean>;
  end(): Promise<void>;
}

export interface PgClientOptions {
  connectionString: string;
  /** Maximum connections in pool (default: 10) */
  max?: number;
  /** Statement and connection timeout in ms (default: 5000) */
  timeoutMs?: number;
}

/**
 * Database metrics for monitoring
 */
export interface DbMetrics {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  avgQueryTimeMs: number;
}

// =============================================================================
// Metrics
// =============================================================================

const log = createLogger("db");

const metrics: DbMetrics = {
  totalQueries: 0,
  slowQueries: 0,
  errors: 0,
  avgQueryTimeMs: 0,
};

const SLOW_QUERY_THRESHOLD_MS = 100;

function recordQuery(durationMs: number, text: string): void {
  metrics.totalQueries++;
  metrics.avgQueryTimeMs =
    (metrics.avgQueryTimeMs * (metrics.totalQueries - 1) + durationMs) / metrics.totalQueries;

  if (durationMs > SLOW_QUERY_THRESHOLD_MS) {
    metrics.slowQueries++;
    log.warn({ durationMs: Math.round(durationMs), query: text.trim().split("\n")[0] }, "Slow query");
  }
}

/**
 * Get database query metrics
 */
export function getDbMetrics(): DbMetrics {
  return { ...metrics };
}

/**
 * Reset metrics (for testing)
 */
export function resetDbMetrics(): void {
  metrics.totalQueries = 0;
  metrics.slowQueries = 0;
  metrics.errors = 0;
  metrics.avgQueryTimeMs = 0;
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Create a pooled client. The pool connects lazily on first query.
 */
export function createPgClient(options: PgClientOptions): PgClient {
  const { connectionString, max = 10, timeoutMs = 5000 } = options;

  const pool = new pg.Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: timeoutMs,
    statement_timeout: timeoutMs,
    query_timeout: timeoutMs,
  });

  // An idle client losing its connection must not crash the process
  pool.on("error", (err) => {
    log.error({ err }, "Idle database client error");
  });

  async function query<R>(text: string, values?: unknown[]): Promise<QueryRows<R>> {
    const start = performance.now();
    try {
      const result = await pool.query(text, values);
      recordQuery(performance.now() - start, text);
      return { rows: result.rows, rowCount: result.rowCount };
    } catch (err) {
      metrics.errors++;
      throw translatePgError(err);
    }
  }

  return {
    query,

    async ping(): Promise<boolean> {
      try {
        await query("SELECT 1");
        return true;
      } catch (err) {
        log.warn({ err }, "Database ping failed");
        return false;
      }
    },

    async end(): Promise<void> {
      await pool.end();
    },
  };
}
