import YahooFinance from "yahoo-finance2";
import { InsufficientDataError } from "../errors.js";
import { AVERAGE_WINDOWS } from "../types.js";
import type { PricePoint, Quote } from "../types.js";
import { localDate } from "./session.js";

/** Daily history is trimmed to what the longest averaging window can use. */
export const MAX_HISTORY_DAYS = Math.max(...AVERAGE_WINDOWS);

export interface MarketDataProvider {
  /** Daily OHLCV records for the last `lookbackDays` calendar days, oldest first. */
  fetchHistory(symbol: string, lookbackDays: number): Promise<PricePoint[]>;
  fetchQuote(symbol: string): Promise<Quote>;
}

export class YahooMarketData implements MarketDataProvider {
  private readonly yf = new YahooFinance({
    queue: { concurrency: 1, timeout: 60 },
  });

  async fetchHistory(symbol: string, lookbackDays: number): Promise<PricePoint[]> {
    const period1 = new Date(Date.now() - lookbackDays * 24 * 60 * 60 * 1000);
    const chart = await this.yf.chart(symbol, { period1, interval: "1d" });
    const timeZone = chart.meta.exchangeTimezoneName || "UTC";

    const points: PricePoint[] = chart.quotes.map((q) => ({
      symbol,
      date: localDate(q.date, timeZone),
      open: q.open ?? null,
      high: q.high ?? null,
      low: q.low ?? null,
      close: q.close ?? null,
      adjClose: q.adjclose ?? q.close ?? null,
      volume: q.volume ?? null,
    }));

    return points.slice(-MAX_HISTORY_DAYS);
  }

  async fetchQuote(symbol: string): Promise<Quote> {
    const q = await this.yf.quote(symbol);
    if (q.regularMarketPrice == null) {
      throw new InsufficientDataError(`No price in quote for ${symbol}`);
    }
    return {
      symbol: q.symbol,
      name: q.shortName || q.longName || q.symbol,
      price: q.regularMarketPrice,
      bid: q.bid ?? null,
      ask: q.ask ?? null,
      previousClose: q.regularMarketPreviousClose ?? null,
      observedAt: q.regularMarketTime ?? new Date(),
      sessionState: q.marketState ?? "UNKNOWN",
    };
  }
}
