import type { Queryable } from "../db.js";
import { toIso } from "../db.js";
import type { NewWatchlistEntry, WatchlistEntry } from "../types.js";
import type { QueryResultRow } from "pg";

export type AddOutcome = "added" | "reactivated" | "exists";

export interface WatchlistRepository {
  listActive(): Promise<WatchlistEntry[]>;
  listAll(): Promise<WatchlistEntry[]>;
  find(symbol: string): Promise<WatchlistEntry | null>;
  /** Adds a symbol, or reactivates it when it was removed earlier. */
  add(entry: NewWatchlistEntry): Promise<{ entry: WatchlistEntry; outcome: AddOutcome }>;
  /** Deactivates the symbol. Returns false when it is not actively watched. */
  remove(symbol: string): Promise<boolean>;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

const WATCHLIST_COLUMNS = `id, symbol, name, sector, notes, active, added_at`;

function rowToEntry(row: QueryResultRow): WatchlistEntry {
  return {
    id: Number(row.id),
    symbol: String(row.symbol),
    name: String(row.name),
    sector: String(row.sector),
    notes: row.notes == null ? undefined : String(row.notes),
    active: row.active === true,
    addedAt: toIso(row.added_at),
  };
}

export class PgWatchlistRepository implements WatchlistRepository {
  constructor(private readonly db: Queryable) {}

  async listActive(): Promise<WatchlistEntry[]> {
    const { rows } = await this.db.query(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist WHERE active = true ORDER BY symbol`,
    );
    return rows.map(rowToEntry);
  }

  async listAll(): Promise<WatchlistEntry[]> {
    const { rows } = await this.db.query(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist ORDER BY active DESC, symbol`,
    );
    return rows.map(rowToEntry);
  }

  async find(symbol: string): Promise<WatchlistEntry | null> {
    const { rows } = await this.db.query(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist WHERE symbol = $1`,
      [normalizeSymbol(symbol)],
    );
    return rows.length > 0 ? rowToEntry(rows[0]) : null;
  }

  async add(entry: NewWatchlistEntry): Promise<{ entry: WatchlistEntry; outcome: AddOutcome }> {
    const symbol = normalizeSymbol(entry.symbol);
    const existing = await this.find(symbol);

    if (existing?.active) return { entry: existing, outcome: "exists" };

    if (existing) {
      const { rows } = await this.db.query(
        `UPDATE watchlist SET
           active = true,
           name = COALESCE($2, name),
           sector = COALESCE($3, sector),
           notes = COALESCE($4, notes)
         WHERE symbol = $1
         RETURNING ${WATCHLIST_COLUMNS}`,
        [symbol, entry.name ?? null, entry.sector ?? null, entry.notes ?? null],
      );
      return { entry: rowToEntry(rows[0]), outcome: "reactivated" };
    }

    const { rows } = await this.db.query(
      `INSERT INTO watchlist (symbol, name, sector, notes)
       VALUES ($1, $2, $3, $4)
       RETURNING ${WATCHLIST_COLUMNS}`,
      [symbol, entry.name ?? symbol, entry.sector ?? "Custom", entry.notes ?? null],
    );
    return { entry: rowToEntry(rows[0]), outcome: "added" };
  }

  async remove(symbol: string): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE watchlist SET active = false WHERE symbol = $1 AND active = true`,
      [normalizeSymbol(symbol)],
    );
    return (rowCount ?? 0) > 0;
  }
}
