#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { asQueryable, connectWithRetry, createPool, initDb } from "./db.js";
import type { Queryable } from "./db.js";
import { errorMessage } from "./errors.js";
import { setLogLevel } from "./logger.js";
import { YahooMarketData } from "./services/market-data.js";
import { MonitoringCycle } from "./services/monitor.js";
import { buildChannels, FanOutNotifier } from "./services/notifier.js";
import { createTelegramBot } from "./services/telegram.js";
import { PgAlertLedger } from "./store/alert-ledger.js";
import { PgPriceStore } from "./store/price-store.js";
import { normalizeSymbol, PgWatchlistRepository } from "./store/watchlist.js";
import { windowKey } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

async function withDatabase<T>(run: (db: Queryable, config: Config) => Promise<T>): Promise<T> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const pool = createPool(config.databaseUrl);
  try {
    const db = asQueryable(pool);
    await connectWithRetry(db, 1);
    await initDb(db);
    return await run(db, config);
  } finally {
    await pool.end();
  }
}

function buildMonitor(db: Queryable, config: Config): { monitor: MonitoringCycle; notifier: FanOutNotifier } {
  const api = config.telegram ? createTelegramBot(config.telegram).api : undefined;
  const notifier = new FanOutNotifier(buildChannels(config, api));
  const monitor = new MonitoringCycle({
    watchlist: new PgWatchlistRepository(db),
    prices: new PgPriceStore(db),
    ledger: new PgAlertLedger(db),
    marketData: new YahooMarketData(),
    notifier,
    market: config.market,
    retry: config.retry,
    historyLookbackDays: config.historyLookbackDays,
    priceDigest: config.priceDigest,
  });
  return { monitor, notifier };
}

const program = new Command();

program
  .name("price-dip-monitor")
  .description("Watch symbols and get alerted when the price drops below its 7, 30 or 90 day average");

program
  .command("add <symbol>")
  .description("Add a symbol to the watchlist (or reactivate it)")
  .option("--name <name>", "Company name (looked up when omitted)")
  .option("--sector <sector>", "Sector", "Custom")
  .option("--notes <notes>", "Free-form notes")
  .action(async (rawSymbol: string, opts: { name?: string; sector: string; notes?: string }) => {
    const symbol = normalizeSymbol(rawSymbol);
    let name = opts.name;
    if (!name) {
      console.log(`Looking up ${symbol}...`);
      try {
        const quote = await new YahooMarketData().fetchQuote(symbol);
        name = quote.name;
        console.log(`  Current price: $${quote.price.toFixed(2)} (${name})`);
      } catch (e) {
        console.warn(`  Warning: could not look up ${symbol} (${errorMessage(e)}). Adding it anyway.`);
      }
    }

    await withDatabase(async (db) => {
      const { entry, outcome } = await new PgWatchlistRepository(db).add({
        symbol,
        name,
        sector: opts.sector,
        notes: opts.notes,
      });
      if (outcome === "exists") {
        console.log(`${entry.symbol} is already on the watchlist.`);
        return;
      }
      console.log(`\n${outcome === "added" ? "Added" : "Reactivated"}:`);
      console.log(`  Symbol: ${entry.symbol}`);
      console.log(`  Name:   ${entry.name}`);
      console.log(`  Sector: ${entry.sector}`);
      if (entry.notes) console.log(`  Notes:  ${entry.notes}`);
      console.log(`\nRun 'sync' to load its price history now, or wait for the next scheduled sync.`);
    });
  });

program
  .command("remove <symbol>")
  .description("Stop watching a symbol")
  .action(async (rawSymbol: string) => {
    const symbol = normalizeSymbol(rawSymbol);
    const removed = await withDatabase((db) => new PgWatchlistRepository(db).remove(symbol));
    if (removed) {
      console.log(`${symbol} removed from the watchlist.`);
    } else {
      console.error(`${symbol} is not on the watchlist.`);
      process.exitCode = 1;
    }
  });

program
  .command("list")
  .description("Show the watchlist")
  .option("--all", "Include removed symbols")
  .action(async (opts: { all?: boolean }) => {
    const entries = await withDatabase((db) => {
      const repo = new PgWatchlistRepository(db);
      return opts.all ? repo.listAll() : repo.listActive();
    });
    if (entries.length === 0) {
      console.log("Watchlist is empty. Use 'add' to watch a symbol.");
      return;
    }

    console.log(`\n${"Symbol".padEnd(10)} ${"Name".padEnd(30)} ${"Sector".padEnd(15)} ${"Active".padEnd(7)} Added`);
    console.log("-".repeat(80));
    for (const e of entries) {
      console.log(
        `${e.symbol.padEnd(10)} ${e.name.slice(0, 29).padEnd(30)} ${e.sector.slice(0, 14).padEnd(15)} ${(e.active ? "Yes" : "No").padEnd(7)} ${e.addedAt.slice(0, 10)}`,
      );
    }
    console.log();
  });

program
  .command("check")
  .description("Run one monitoring cycle now")
  .action(async () => {
    const report = await withDatabase(async (db, config) => {
      const { monitor, notifier } = buildMonitor(db, config);
      console.log(`Channels: ${notifier.channelNames.join(", ") || "none (alerts are logged)"}`);
      try {
        return await monitor.runCycle();
      } catch (e) {
        await monitor.notifyError("Manual check", e);
        throw e;
      }
    });
    console.log(
      `\nChecked ${report.instruments} symbol(s): ${report.quotes} quote(s), ${report.candidates} candidate(s), ` +
        `${report.alertsSent} alert(s) sent, ${report.suppressed} already notified this session.`,
    );
    for (const f of report.failures) {
      console.log(`  ${f.symbol}: ${f.stage} failed [${f.kind}] ${f.message}`);
    }
  });

program
  .command("sync")
  .description("Backfill or refresh daily price history for the watchlist")
  .action(async () => {
    const report = await withDatabase((db, config) => buildMonitor(db, config).monitor.syncWatchlist());
    console.log(`Backfilled: ${report.backfilled.join(", ") || "-"}`);
    console.log(`Refreshed:  ${report.refreshed.join(", ") || "-"}`);
    console.log(`Up to date: ${report.upToDate.join(", ") || "-"}`);
    for (const f of report.failures) {
      console.log(`  ${f.symbol}: [${f.kind}] ${f.message}`);
    }
  });

program
  .command("alerts")
  .description("Show recently sent alerts")
  .option("--days <n>", "How many days back", "7")
  .action(async (opts: { days: string }) => {
    const days = Number(opts.days);
    if (!Number.isInteger(days) || days < 1) {
      console.error("Error: --days must be a positive integer");
      process.exitCode = 1;
      return;
    }
    const records = await withDatabase((db) =>
      new PgAlertLedger(db).listSince(new Date(Date.now() - days * DAY_MS)),
    );
    if (records.length === 0) {
      console.log(`No alerts in the last ${days} day(s).`);
      return;
    }

    console.log(`\n${"Sent".padEnd(17)} ${"Symbol".padEnd(10)} ${"Window".padEnd(7)} ${"Price".padEnd(10)} ${"Average".padEnd(10)} Below`);
    console.log("-".repeat(70));
    for (const r of records) {
      console.log(
        `${r.sentAt.slice(0, 16).replace("T", " ")} ${r.symbol.padEnd(10)} ${windowKey(r.window).padEnd(7)} ` +
          `${`$${r.currentPrice.toFixed(2)}`.padEnd(10)} ${`$${r.averagePrice.toFixed(2)}`.padEnd(10)} ${r.pctDiff.toFixed(2)}%`,
      );
    }
    console.log();
  });

void program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
