import type { Queryable } from "../db.js";
import { toIso, toNumberOrNull } from "../db.js";
import type { LatestQuote, PricePoint, Quote } from "../types.js";

export interface PriceStore {
  /** Inserts or overwrites rows keyed by (symbol, date). Returns the number of rows written. */
  upsertHistory(points: PricePoint[], fetchedAt: Date): Promise<number>;
  /** Closing prices of the `limit` most recent days with a non-null close, newest first. */
  getRecentCloses(symbol: string, limit: number): Promise<number[]>;
  /** Latest history date (YYYY-MM-DD) per symbol; symbols without history are absent. */
  getLatestHistoryDates(symbols: string[]): Promise<Map<string, string>>;
  upsertLatestQuote(quote: Quote, fetchedAt: Date): Promise<void>;
  getLatestQuote(symbol: string): Promise<LatestQuote | null>;
}

export class PgPriceStore implements PriceStore {
  constructor(private readonly db: Queryable) {}

  async upsertHistory(points: PricePoint[], fetchedAt: Date): Promise<number> {
    let written = 0;
    for (const p of points) {
      const { rowCount } = await this.db.query(
        `INSERT INTO price_history (symbol, date, open, high, low, close, adj_close, volume, fetched_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (symbol, date) DO UPDATE SET
           open = EXCLUDED.open,
           high = EXCLUDED.high,
           low = EXCLUDED.low,
           close = EXCLUDED.close,
           adj_close = EXCLUDED.adj_close,
           volume = EXCLUDED.volume,
           fetched_at = EXCLUDED.fetched_at`,
        [p.symbol, p.date, p.open, p.high, p.low, p.close, p.adjClose, p.volume, fetchedAt],
      );
      written += rowCount ?? 0;
    }
    return written;
  }

  async getRecentCloses(symbol: string, limit: number): Promise<number[]> {
    const { rows } = await this.db.query(
      `SELECT close FROM price_history
       WHERE symbol = $1 AND close IS NOT NULL
       ORDER BY date DESC
       LIMIT $2`,
      [symbol, limit],
    );
    return rows.map((r) => toNumberOrNull(r.close)).filter((c): c is number => c !== null);
  }

  async getLatestHistoryDates(symbols: string[]): Promise<Map<string, string>> {
    if (symbols.length === 0) return new Map();
    const { rows } = await this.db.query(
      `SELECT symbol, to_char(max(date), 'YYYY-MM-DD') AS latest
       FROM price_history
       WHERE symbol = ANY($1)
       GROUP BY symbol`,
      [symbols],
    );
    return new Map(rows.map((r) => [String(r.symbol), String(r.latest)]));
  }

  async upsertLatestQuote(quote: Quote, fetchedAt: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO latest_quote (symbol, price, bid, ask, previous_close, observed_at, fetched_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (symbol) DO UPDATE SET
         price = EXCLUDED.price,
         bid = EXCLUDED.bid,
         ask = EXCLUDED.ask,
         previous_close = EXCLUDED.previous_close,
         observed_at = EXCLUDED.observed_at,
         fetched_at = EXCLUDED.fetched_at`,
      [quote.symbol, quote.price, quote.bid, quote.ask, quote.previousClose, quote.observedAt, fetchedAt],
    );
  }

  async getLatestQuote(symbol: string): Promise<LatestQuote | null> {
    const { rows } = await this.db.query(
      `SELECT symbol, price, bid, ask, previous_close, observed_at, fetched_at
       FROM latest_quote WHERE symbol = $1`,
      [symbol],
    );
    if (rows.length === 0) return null;
    const row = rows[0];
    return {
      symbol: String(row.symbol),
      price: Number(row.price),
      bid: toNumberOrNull(row.bid),
      ask: toNumberOrNull(row.ask),
      previousClose: toNumberOrNull(row.previous_close),
      observedAt: toIso(row.observed_at),
      fetchedAt: toIso(row.fetched_at),
    };
  }
}
