import type { AlertLedger } from "../../src/store/alert-ledger.js";
import type { PriceStore } from "../../src/store/price-store.js";
import type { AddOutcome, WatchlistRepository } from "../../src/store/watchlist.js";
import { normalizeSymbol } from "../../src/store/watchlist.js";
import type {
  AlertRecord,
  LatestQuote,
  NewAlertRecord,
  NewWatchlistEntry,
  PricePoint,
  Quote,
  WatchlistEntry,
  WindowDays,
} from "../../src/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function point(symbol: string, date: string, close: number | null): PricePoint {
  return { symbol, date, open: close, high: close, low: close, close, adjClose: close, volume: 1000 };
}

export class MemoryPriceStore implements PriceStore {
  readonly history = new Map<string, Map<string, PricePoint>>();
  readonly quotes = new Map<string, LatestQuote>();

  /** Stores `closes` (oldest first) on consecutive days ending at `lastDate`. */
  seedCloses(symbol: string, closes: Array<number | null>, lastDate = "2024-07-15"): void {
    const end = Date.parse(`${lastDate}T00:00:00Z`);
    const points = closes.map((close, i) =>
      point(symbol, new Date(end - (closes.length - 1 - i) * DAY_MS).toISOString().slice(0, 10), close),
    );
    for (const p of points) this.put(p);
  }

  private put(p: PricePoint): void {
    let rows = this.history.get(p.symbol);
    if (!rows) {
      rows = new Map();
      this.history.set(p.symbol, rows);
    }
    rows.set(p.date, { ...p });
  }

  async upsertHistory(points: PricePoint[]): Promise<number> {
    for (const p of points) this.put(p);
    return points.length;
  }

  async getRecentCloses(symbol: string, limit: number): Promise<number[]> {
    const rows = [...(this.history.get(symbol)?.values() ?? [])];
    return rows
      .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
      .map((p) => p.close)
      .filter((c): c is number => c !== null)
      .slice(0, limit);
  }

  async getLatestHistoryDates(symbols: string[]): Promise<Map<string, string>> {
    const latest = new Map<string, string>();
    for (const symbol of symbols) {
      const dates = [...(this.history.get(symbol)?.keys() ?? [])].sort();
      const last = dates[dates.length - 1];
      if (last !== undefined) latest.set(symbol, last);
    }
    return latest;
  }

  async upsertLatestQuote(quote: Quote, fetchedAt: Date): Promise<void> {
    this.quotes.set(quote.symbol, {
      symbol: quote.symbol,
      price: quote.price,
      bid: quote.bid,
      ask: quote.ask,
      previousClose: quote.previousClose,
      observedAt: quote.observedAt.toISOString(),
      fetchedAt: fetchedAt.toISOString(),
    });
  }

  async getLatestQuote(symbol: string): Promise<LatestQuote | null> {
    return this.quotes.get(symbol) ?? null;
  }
}

export class MemoryAlertLedger implements AlertLedger {
  readonly records: AlertRecord[] = [];

  async hasAlertSince(symbol: string, window: WindowDays, since: Date): Promise<boolean> {
    return this.records.some((r) => r.symbol === symbol && r.window === window && Date.parse(r.sentAt) >= since.getTime());
  }

  async recordIfAbsent(record: NewAlertRecord): Promise<boolean> {
    const sessionStart = record.sessionStart.toISOString();
    const exists = this.records.some(
      (r) => r.symbol === record.symbol && r.window === record.window && r.sessionStart === sessionStart,
    );
    if (exists) return false;
    this.records.push({
      ...record,
      id: this.records.length + 1,
      sessionStart,
      sentAt: record.sentAt.toISOString(),
    });
    return true;
  }

  async listSince(since: Date): Promise<AlertRecord[]> {
    return this.records
      .filter((r) => Date.parse(r.sentAt) >= since.getTime())
      .sort((a, b) => Date.parse(b.sentAt) - Date.parse(a.sentAt) || b.id - a.id);
  }
}

export class MemoryWatchlist implements WatchlistRepository {
  readonly entries = new Map<string, WatchlistEntry>();
  private nextId = 1;

  constructor(symbols: string[] = []) {
    for (const symbol of symbols) {
      this.entries.set(symbol, {
        id: this.nextId++,
        symbol,
        name: symbol,
        sector: "Custom",
        active: true,
        addedAt: "2024-01-01T00:00:00.000Z",
      });
    }
  }

  async listActive(): Promise<WatchlistEntry[]> {
    return [...this.entries.values()].filter((e) => e.active).sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  async listAll(): Promise<WatchlistEntry[]> {
    return [...this.entries.values()].sort((a, b) => Number(b.active) - Number(a.active) || a.symbol.localeCompare(b.symbol));
  }

  async find(symbol: string): Promise<WatchlistEntry | null> {
    return this.entries.get(normalizeSymbol(symbol)) ?? null;
  }

  async add(input: NewWatchlistEntry): Promise<{ entry: WatchlistEntry; outcome: AddOutcome }> {
    const symbol = normalizeSymbol(input.symbol);
    const existing = this.entries.get(symbol);
    if (existing?.active) return { entry: existing, outcome: "exists" };
    if (existing) {
      const entry: WatchlistEntry = {
        ...existing,
        active: true,
        name: input.name ?? existing.name,
        sector: input.sector ?? existing.sector,
        notes: input.notes ?? existing.notes,
      };
      this.entries.set(symbol, entry);
      return { entry, outcome: "reactivated" };
    }
    const entry: WatchlistEntry = {
      id: this.nextId++,
      symbol,
      name: input.name ?? symbol,
      sector: input.sector ?? "Custom",
      notes: input.notes,
      active: true,
      addedAt: "2024-07-01T00:00:00.000Z",
    };
    this.entries.set(symbol, entry);
    return { entry, outcome: "added" };
  }

  async remove(symbol: string): Promise<boolean> {
    const entry = this.entries.get(normalizeSymbol(symbol));
    if (!entry?.active) return false;
    this.entries.set(entry.symbol, { ...entry, active: false });
    return true;
  }
}
