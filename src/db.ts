import pg from "pg";
import type { Pool, QueryResultRow } from "pg";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("db");

/** The slice of `pg.Pool` the stores use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

export function createPool(databaseUrl: string): Pool {
  const isLocal = databaseUrl.includes("localhost") || databaseUrl.includes("127.0.0.1");
  const connectionString = !isLocal && !databaseUrl.includes("sslmode=")
    ? databaseUrl + (databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
    : databaseUrl;

  return new pg.Pool({
    connectionString,
    ssl: isLocal ? false : { rejectUnauthorized: false },
  });
}

export function asQueryable(pool: Pool): Queryable {
  return { query: (text, values) => pool.query(text, values) };
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS watchlist (
      id         SERIAL PRIMARY KEY,
      symbol     TEXT UNIQUE NOT NULL,
      name       TEXT NOT NULL,
      sector     TEXT NOT NULL DEFAULT 'Custom',
      notes      TEXT,
      active     BOOLEAN NOT NULL DEFAULT true,
      added_at   TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS price_history (
      symbol      TEXT NOT NULL,
      date        DATE NOT NULL,
      open        DOUBLE PRECISION,
      high        DOUBLE PRECISION,
      low         DOUBLE PRECISION,
      close       DOUBLE PRECISION,
      adj_close   DOUBLE PRECISION,
      volume      BIGINT,
      fetched_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (symbol, date)
    );

    CREATE TABLE IF NOT EXISTS latest_quote (
      symbol          TEXT PRIMARY KEY,
      price           DOUBLE PRECISION NOT NULL,
      bid             DOUBLE PRECISION,
      ask             DOUBLE PRECISION,
      previous_close  DOUBLE PRECISION,
      observed_at     TIMESTAMPTZ NOT NULL,
      fetched_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS alert_ledger (
      id             BIGSERIAL PRIMARY KEY,
      symbol         TEXT NOT NULL,
      window_key     TEXT NOT NULL CHECK (window_key IN ('7_day', '30_day', '90_day')),
      current_price  DOUBLE PRECISION NOT NULL,
      average_price  DOUBLE PRECISION NOT NULL,
      abs_diff       DOUBLE PRECISION NOT NULL,
      pct_diff       DOUBLE PRECISION NOT NULL,
      session_start  TIMESTAMPTZ NOT NULL,
      sent_at        TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE UNIQUE INDEX IF NOT EXISTS alert_ledger_session_key
      ON alert_ledger (symbol, window_key, session_start);
    CREATE INDEX IF NOT EXISTS alert_ledger_sent_at ON alert_ledger (symbol, window_key, sent_at);
  `);
}

// ── Startup connection ──────────────────────────────────────────────────

/**
 * Opens the first connection, retrying with a doubling delay. Exhausting the
 * attempts is a startup failure.
 */
export async function connectWithRetry(
  db: Queryable,
  attempts: number,
  initialDelayMs = 2000,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((r) => setTimeout(r, ms)),
): Promise<void> {
  let delay = initialDelayMs;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await db.query("SELECT 1");
      log.info("Database connection established");
      return;
    } catch (e) {
      if (attempt === attempts) {
        throw new ConfigError(`Failed to connect to database after ${attempts} attempts: ${errorMessage(e)}`, {
          cause: e,
        });
      }
      log.warn(`Database connection attempt ${attempt}/${attempts} failed: ${errorMessage(e)}; retrying in ${delay / 1000}s`);
      await sleep(delay);
      delay *= 2;
    }
  }
}

// ── Row conversion ───────────────────────────────────────────────────────

export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function toIso(value: unknown): string {
  return value instanceof Date ? value.toISOString() : new Date(String(value)).toISOString();
}
