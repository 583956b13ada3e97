import type { RetryPolicy } from "../config.js";
import { classifyError, errorMessage, toPersistenceError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { AlertLedger } from "../store/alert-ledger.js";
import type { PriceStore } from "../store/price-store.js";
import type { WatchlistRepository } from "../store/watchlist.js";
import { normalizeSymbol } from "../store/watchlist.js";
import { AVERAGE_WINDOWS, windowKey } from "../types.js";
import type {
  AlertCandidate,
  CycleFailure,
  CycleReport,
  CycleStage,
  InstrumentSummary,
  MarketSession,
  Quote,
  StatusSnapshot,
  SyncReport,
  WatchlistEntry,
  WindowDays,
} from "../types.js";
import { formatAlertMessage, formatErrorMessage, formatPriceDigest } from "./alert-message.js";
import { evaluateAverages } from "./alert-evaluator.js";
import { filterUnnotified } from "./dedup.js";
import type { MarketDataProvider } from "./market-data.js";
import { computeAverages } from "./moving-average.js";
import type { Notifier } from "./notifier.js";
import { sleep, withRetry } from "./retry.js";
import type { Sleep } from "./retry.js";
import { isWithinMarketHours, resolveSessionStart, sessionDate } from "./session.js";

const log = createLogger("monitor");

const DAY_MS = 24 * 60 * 60 * 1000;

const STORE_STAGES: ReadonlySet<CycleStage> = new Set<CycleStage>(["persist-quote", "averages", "dedup", "record"]);

export interface MonitorDeps {
  watchlist: WatchlistRepository;
  prices: PriceStore;
  ledger: AlertLedger;
  marketData: MarketDataProvider;
  notifier: Notifier;
  market: MarketSession;
  retry: RetryPolicy;
  historyLookbackDays: number;
  /** Send a price overview after every cycle that fetched at least one quote. */
  priceDigest?: boolean;
  windows?: readonly WindowDays[];
  clock?: () => Date;
  sleep?: Sleep;
}

interface CycleCounters {
  fetched: Quote[];
  quotes: number;
  candidates: number;
  alertsSent: number;
  suppressed: number;
  failures: CycleFailure[];
}

/**
 * One monitoring pass over the active watchlist: fetch quotes, compare them
 * with the moving averages and notify each window at most once per session.
 */
export class MonitoringCycle {
  private readonly windows: readonly WindowDays[];
  private readonly clock: () => Date;
  private readonly sleep: Sleep;
  private cycleInFlight: Promise<CycleReport> | null = null;
  private readonly pending = new Set<Promise<unknown>>();
  private lastCycle: CycleReport | null = null;
  private lastSync: SyncReport | null = null;

  constructor(private readonly deps: MonitorDeps) {
    this.windows = deps.windows ?? AVERAGE_WINDOWS;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
  }

  get isRunning(): boolean {
    return this.cycleInFlight !== null;
  }

  /** Resolves once every cycle and sync started so far has settled. */
  async waitForIdle(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async track<T>(task: Promise<T>): Promise<T> {
    this.pending.add(task);
    try {
      return await task;
    } finally {
      this.pending.delete(task);
    }
  }

  async runCycle(): Promise<CycleReport> {
    if (this.cycleInFlight) {
      const now = this.clock().toISOString();
      log.warn("Previous cycle still running; skipping this tick");
      return {
        startedAt: now,
        finishedAt: now,
        skipped: true,
        sessionStart: null,
        instruments: 0,
        quotes: 0,
        candidates: 0,
        alertsSent: 0,
        suppressed: 0,
        failures: [],
      };
    }

    const run = this.cycle();
    this.cycleInFlight = run;
    try {
      const report = await this.track(run);
      this.lastCycle = report;
      return report;
    } finally {
      this.cycleInFlight = null;
    }
  }

  private async cycle(): Promise<CycleReport> {
    const startedAt = this.clock();
    const { market } = this.deps;
    const entries = await this.deps.watchlist.listActive();
    const sessionStart = resolveSessionStart(startedAt, market.timeZone, market.open);

    if (entries.length === 0) {
      log.info("Watchlist is empty; nothing to check");
    } else {
      log.info(`Checking ${entries.length} symbol(s), session since ${sessionStart.toISOString()}`);
    }

    const counters: CycleCounters = {
      fetched: [],
      quotes: 0,
      candidates: 0,
      alertsSent: 0,
      suppressed: 0,
      failures: [],
    };
    for (const entry of entries) {
      await this.checkInstrument(entry, sessionStart, counters);
    }

    if (entries.length > 0 && counters.quotes === 0) {
      const first = counters.failures[0];
      await this.notifyError(
        "Monitoring cycle",
        `no quotes fetched for ${entries.length} symbol(s)` + (first ? `; ${first.symbol}: ${first.message}` : ""),
      );
    } else if (this.deps.priceDigest && counters.fetched.length > 0) {
      await this.sendDigest(counters.fetched);
    }

    const report: CycleReport = {
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock().toISOString(),
      skipped: false,
      sessionStart: sessionStart.toISOString(),
      instruments: entries.length,
      quotes: counters.quotes,
      candidates: counters.candidates,
      alertsSent: counters.alertsSent,
      suppressed: counters.suppressed,
      failures: counters.failures,
    };
    log.info(
      `Cycle done: ${report.quotes}/${report.instruments} quotes, ${report.candidates} candidate(s), ` +
        `${report.alertsSent} sent, ${report.suppressed} suppressed, ${report.failures.length} failure(s)`,
    );
    return report;
  }

  private async checkInstrument(entry: WatchlistEntry, sessionStart: Date, counters: CycleCounters): Promise<void> {
    const { symbol } = entry;
    const { deps } = this;
    const fail = (stage: CycleStage, e: unknown) => {
      const error = STORE_STAGES.has(stage) ? toPersistenceError(e) : classifyError(e);
      counters.failures.push({ symbol, stage, kind: error.kind, message: error.message });
      log.warn(`${symbol}: ${stage} failed [${error.kind}]: ${error.message}`);
    };

    const quote = await withRetry(`quote ${symbol}`, () => deps.marketData.fetchQuote(symbol), deps.retry, this.sleep);
    if (!quote.success) {
      fail("quote", quote.error);
      return;
    }
    counters.quotes++;
    counters.fetched.push(quote.data);
    const price = quote.data.price;

    try {
      await deps.prices.upsertLatestQuote(quote.data, this.clock());
    } catch (e) {
      fail("persist-quote", e);
      return;
    }

    let candidates: AlertCandidate[];
    try {
      const averages = await computeAverages(deps.prices, symbol, this.windows);
      if ([...averages.values()].every((a) => a === null)) {
        log.warn(`${symbol}: no price history yet; averages unavailable`);
      }
      candidates = evaluateAverages(price, averages);
    } catch (e) {
      fail("averages", e);
      return;
    }
    log.debug(`${symbol}: $${price.toFixed(2)}, ${candidates.length} window(s) above price`);
    if (candidates.length === 0) return;
    counters.candidates += candidates.length;

    let eligible: AlertCandidate[];
    try {
      eligible = await filterUnnotified(deps.ledger, symbol, candidates, sessionStart);
    } catch (e) {
      fail("dedup", e);
      return;
    }
    counters.suppressed += candidates.length - eligible.length;

    // Claim each window before sending; a lost race means another run already owns it.
    const claimed: AlertCandidate[] = [];
    for (const candidate of eligible) {
      try {
        const written = await deps.ledger.recordIfAbsent({
          symbol,
          window: candidate.window,
          currentPrice: price,
          averagePrice: candidate.average,
          absDiff: candidate.absDiff,
          pctDiff: candidate.pctDiff,
          sessionStart,
          sentAt: this.clock(),
        });
        if (written) claimed.push(candidate);
        else counters.suppressed++;
      } catch (e) {
        fail("record", e);
        claimed.push(candidate);
      }
    }
    if (claimed.length === 0) return;

    const message = formatAlertMessage(symbol, price, claimed, this.clock(), deps.market.timeZone);
    // A timed-out send may still be delivered, so it is not repeated.
    const sent = await withRetry(`notify ${symbol}`, () => deps.notifier.send(message), deps.retry, this.sleep, {
      retryTimeouts: false,
    });
    if (!sent.success) {
      fail("notify", sent.error);
      return;
    }
    counters.alertsSent += claimed.length;
    log.info(`${symbol}: alert sent for ${claimed.map((c) => windowKey(c.window)).join(", ")}`);
  }

  private async sendDigest(quotes: Quote[]): Promise<void> {
    const now = this.clock();
    const { market } = this.deps;
    const text = formatPriceDigest(quotes, now, market, isWithinMarketHours(now, market));
    const sent = await withRetry("price digest", () => this.deps.notifier.send(text), this.singleAttempt(), this.sleep);
    if (!sent.success) log.warn(`Price digest not delivered: ${sent.error.message}`);
  }

  /** Tells the operator that a whole task failed. Delivery problems are only logged. */
  async notifyError(context: string, error: unknown): Promise<void> {
    const text = formatErrorMessage(context, errorMessage(error), this.clock());
    const sent = await withRetry(
      "error notification",
      () => this.deps.notifier.send(text),
      this.singleAttempt(),
      this.sleep,
    );
    if (!sent.success) log.warn(`Error notification not delivered: ${sent.error.message}`);
  }

  private singleAttempt(): RetryPolicy {
    return { ...this.deps.retry, attempts: 1 };
  }

  /**
   * Backfills symbols without history and refreshes those whose latest daily
   * bar is older than the current session date.
   */
  async syncWatchlist(): Promise<SyncReport> {
    return this.track(this.sync());
  }

  private async sync(): Promise<SyncReport> {
    const startedAt = this.clock();
    const { deps } = this;
    const symbols = (await deps.watchlist.listActive()).map((e) => e.symbol);
    const latest = await deps.prices.getLatestHistoryDates(symbols);
    const today = sessionDate(startedAt, deps.market.timeZone, deps.market.open);

    const report: SyncReport = {
      startedAt: startedAt.toISOString(),
      finishedAt: "",
      backfilled: [],
      refreshed: [],
      upToDate: [],
      failures: [],
    };

    for (const symbol of symbols) {
      const last = latest.get(symbol);
      if (last !== undefined && last >= today) {
        report.upToDate.push(symbol);
        continue;
      }

      const lookback =
        last === undefined
          ? deps.historyLookbackDays
          : Math.min(deps.historyLookbackDays, Math.round((Date.parse(today) - Date.parse(last)) / DAY_MS) + 1);

      const history = await withRetry(
        `history ${symbol}`,
        () => deps.marketData.fetchHistory(symbol, lookback),
        deps.retry,
        this.sleep,
      );
      if (!history.success) {
        report.failures.push({ symbol, kind: history.error.kind, message: history.error.message });
        continue;
      }
      if (history.data.length === 0) {
        log.warn(`${symbol}: no history returned for the last ${lookback} day(s)`);
        report.failures.push({ symbol, kind: "insufficient-data", message: "no history returned" });
        continue;
      }

      try {
        const written = await deps.prices.upsertHistory(history.data, this.clock());
        log.info(`${symbol}: stored ${written} daily record(s)`);
        (last === undefined ? report.backfilled : report.refreshed).push(symbol);
      } catch (e) {
        const error = toPersistenceError(e);
        log.error(`${symbol}: storing history failed [${error.kind}]: ${error.message}`);
        report.failures.push({ symbol, kind: error.kind, message: error.message });
      }
    }

    report.finishedAt = this.clock().toISOString();
    this.lastSync = report;
    log.info(
      `Sync done: ${report.backfilled.length} backfilled, ${report.refreshed.length} refreshed, ` +
        `${report.upToDate.length} up to date, ${report.failures.length} failure(s)`,
    );
    return report;
  }

  async statusSnapshot(): Promise<StatusSnapshot> {
    const now = this.clock();
    const { market } = this.deps;
    const entries = await this.deps.watchlist.listActive();
    return {
      now: now.toISOString(),
      marketOpen: isWithinMarketHours(now, market),
      timeZone: market.timeZone,
      sessionStart: resolveSessionStart(now, market.timeZone, market.open).toISOString(),
      symbols: entries.map((e) => e.symbol),
      lastCycle: this.lastCycle,
      lastSync: this.lastSync,
    };
  }

  /** Stored quote and averages for one symbol, without touching the market-data source. */
  async summarize(rawSymbol: string): Promise<InstrumentSummary> {
    const symbol = normalizeSymbol(rawSymbol);
    const quote = await this.deps.prices.getLatestQuote(symbol);
    const averages = await computeAverages(this.deps.prices, symbol, this.windows);

    const byKey: InstrumentSummary["averages"] = {};
    for (const [window, average] of averages) byKey[windowKey(window)] = average;

    return {
      symbol,
      quote,
      averages: byKey,
      candidates: quote ? evaluateAverages(quote.price, averages) : [],
    };
  }
}

export function describeFailure(e: unknown): string {
  const error = classifyError(e);
  return `[${error.kind}] ${errorMessage(error)}`;
}
