import type { Queryable } from "../db.js";
import { toIso } from "../db.js";
import { parseWindowKey, windowKey } from "../types.js";
import type { AlertRecord, NewAlertRecord, WindowDays } from "../types.js";

/**
 * Append-only record of notifications already sent. Rows are never updated
 * or deleted; a row with `sent_at >= sessionStart` means the window was
 * already notified in that session.
 */
export interface AlertLedger {
  hasAlertSince(symbol: string, window: WindowDays, since: Date): Promise<boolean>;
  /**
   * Appends `record` unless one already exists for the same
   * (symbol, window, sessionStart). Returns whether a row was written.
   */
  recordIfAbsent(record: NewAlertRecord): Promise<boolean>;
  /** Records sent at or after `since`, newest first. */
  listSince(since: Date): Promise<AlertRecord[]>;
}

export class PgAlertLedger implements AlertLedger {
  constructor(private readonly db: Queryable) {}

  async hasAlertSince(symbol: string, window: WindowDays, since: Date): Promise<boolean> {
    const { rows } = await this.db.query(
      `SELECT EXISTS (
         SELECT 1 FROM alert_ledger
         WHERE symbol = $1 AND window_key = $2 AND sent_at >= $3
       ) AS notified`,
      [symbol, windowKey(window), since],
    );
    return rows[0]?.notified === true;
  }

  async recordIfAbsent(record: NewAlertRecord): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `INSERT INTO alert_ledger
         (symbol, window_key, current_price, average_price, abs_diff, pct_diff, session_start, sent_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (symbol, window_key, session_start) DO NOTHING
       RETURNING id`,
      [
        record.symbol,
        windowKey(record.window),
        record.currentPrice,
        record.averagePrice,
        record.absDiff,
        record.pctDiff,
        record.sessionStart,
        record.sentAt,
      ],
    );
    return (rowCount ?? 0) > 0;
  }

  async listSince(since: Date): Promise<AlertRecord[]> {
    const { rows } = await this.db.query(
      `SELECT id, symbol, window_key, current_price, average_price, abs_diff, pct_diff, session_start, sent_at
       FROM alert_ledger
       WHERE sent_at >= $1
       ORDER BY sent_at DESC, id DESC`,
      [since],
    );
    const records: AlertRecord[] = [];
    for (const row of rows) {
      const window = parseWindowKey(String(row.window_key));
      if (window === null) continue;
      records.push({
        id: Number(row.id),
        symbol: String(row.symbol),
        window,
        currentPrice: Number(row.current_price),
        averagePrice: Number(row.average_price),
        absDiff: Number(row.abs_diff),
        pctDiff: Number(row.pct_diff),
        sessionStart: toIso(row.session_start),
        sentAt: toIso(row.sent_at),
      });
    }
    return records;
  }
}
