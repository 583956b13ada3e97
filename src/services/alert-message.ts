import type { AlertCandidate, MarketSession, Quote, StatusSnapshot, WatchlistEntry } from "../types.js";
import { formatClockTime, formatInZone } from "./session.js";

const usd = (value: number) => `$${value.toFixed(2)}`;

export function formatAlertMessage(
  symbol: string,
  price: number,
  candidates: AlertCandidate[],
  at: Date,
  timeZone: string,
): string {
  const lines = [
    `ALERT: ${symbol}`,
    "",
    `Price: ${usd(price)}`,
    `Time: ${formatInZone(at, timeZone)} (${timeZone})`,
    "",
    "ALERTS:",
  ];
  for (const c of candidates) {
    lines.push(`${c.window}-Day Average: ${usd(c.average)}`);
    lines.push(`Below: ${usd(c.absDiff)} (${c.pctDiff.toFixed(2)}%)`);
  }
  lines.push("", `#${symbol}`);
  return lines.join("\n");
}

/** Moves smaller than this, in price units, count as flat. */
export const FLAT_MOVE = 0.01;

export type PriceMove = "up" | "down" | "flat";

export function priceMove(price: number, previousClose: number | null): PriceMove {
  if (previousClose === null || previousClose <= 0) return "flat";
  const change = price - previousClose;
  if (Math.abs(change) < FLAT_MOVE) return "flat";
  return change > 0 ? "up" : "down";
}

function describeMove(quote: Quote): string {
  const { price, previousClose } = quote;
  if (previousClose === null || previousClose <= 0) return "no previous close";
  const change = price - previousClose;
  if (Math.abs(change) < FLAT_MOVE) return `unchanged from ${usd(previousClose)}`;
  const sign = change > 0 ? "+" : "-";
  const pct = (Math.abs(change) / previousClose) * 100;
  return `${sign}${usd(Math.abs(change))} (${sign}${pct.toFixed(2)}%) vs ${usd(previousClose)}`;
}

/** Per-cycle overview: each quote against its previous close, then the up/down/flat tally. */
export function formatPriceDigest(quotes: Quote[], at: Date, market: MarketSession, marketOpen: boolean): string {
  const lines = [
    "PRICE UPDATE",
    `Time: ${formatInZone(at, market.timeZone)} (${market.timeZone})`,
    `Market: ${marketOpen ? "OPEN" : "CLOSED"}`,
    "",
  ];
  const tally: Record<PriceMove, number> = { up: 0, down: 0, flat: 0 };
  for (const q of quotes) {
    tally[priceMove(q.price, q.previousClose)]++;
    lines.push(`${q.symbol}: ${usd(q.price)} ${describeMove(q)}`);
  }
  lines.push("", `Up: ${tally.up}  Down: ${tally.down}  Flat: ${tally.flat}`);
  return lines.join("\n");
}

export function formatErrorMessage(context: string, message: string, at: Date): string {
  return [`ERROR: ${context}`, "", `Time: ${at.toISOString()}`, `Error: ${message}`].join("\n");
}

export function formatStartupMessage(symbols: string[], market: MarketSession, now: Date): string {
  return [
    "Price dip monitor started",
    `Time: ${formatInZone(now, market.timeZone)} (${market.timeZone})`,
    `Market hours: ${formatClockTime(market.open)}-${formatClockTime(market.close)}`,
    `Watching ${symbols.length} symbol(s)${symbols.length > 0 ? `: ${symbols.join(", ")}` : ""}`,
    "Alerts: price below the 7, 30 or 90 day average, once per window per session",
  ].join("\n");
}

export function formatStatusMessage(status: StatusSnapshot): string {
  const lines = [
    `Market: ${status.marketOpen ? "OPEN" : "CLOSED"} (${status.timeZone})`,
    `Session start: ${status.sessionStart}`,
    `Watching: ${status.symbols.length > 0 ? status.symbols.join(", ") : "nothing"}`,
  ];
  const cycle = status.lastCycle;
  if (cycle) {
    lines.push(
      `Last check: ${cycle.finishedAt} (${cycle.quotes}/${cycle.instruments} quotes, ` +
        `${cycle.alertsSent} alert(s), ${cycle.failures.length} failure(s))`,
    );
  } else {
    lines.push("Last check: never");
  }
  if (status.lastSync) {
    lines.push(`Last sync: ${status.lastSync.finishedAt}`);
  }
  return lines.join("\n");
}

export function formatWatchlist(entries: WatchlistEntry[]): string {
  if (entries.length === 0) return "Watchlist is empty.";
  return entries.map((e) => `${e.symbol} - ${e.name} (${e.sector})`).join("\n");
}

export const HELP_TEXT = [
  "Commands:",
  "/add SYMBOL [name] - start watching a symbol",
  "/remove SYMBOL - stop watching a symbol",
  "/list - show the watchlist",
  "/status - market state and last check",
  "/help - this message",
].join("\n");
