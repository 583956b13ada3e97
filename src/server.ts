import { AsyncChannel } from "./channel.js";
import { createApp } from "./app.js";
import { isEmailConfigured, isSmsConfigured, isTelegramConfigured, loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { asQueryable, connectWithRetry, createPool, initDb } from "./db.js";
import { errorMessage } from "./errors.js";
import { createLogger, setLogLevel } from "./logger.js";
import { startScheduler } from "./scheduler.js";
import { formatStartupMessage } from "./services/alert-message.js";
import { runCommandLoop } from "./services/commands.js";
import type { InboundCommand } from "./services/commands.js";
import { YahooMarketData } from "./services/market-data.js";
import { MonitoringCycle } from "./services/monitor.js";
import { buildChannels, FanOutNotifier } from "./services/notifier.js";
import { createTelegramBot, TelegramListener } from "./services/telegram.js";
import { PgAlertLedger } from "./store/alert-ledger.js";
import { PgPriceStore } from "./store/price-store.js";
import { PgWatchlistRepository } from "./store/watchlist.js";

const log = createLogger("server");

async function main(config: Config): Promise<void> {
  const pool = createPool(config.databaseUrl);
  const db = asQueryable(pool);
  await connectWithRetry(db, config.dbConnectAttempts);
  await initDb(db);

  const watchlist = new PgWatchlistRepository(db);
  const prices = new PgPriceStore(db);
  const ledger = new PgAlertLedger(db);

  const bot = config.telegram ? createTelegramBot(config.telegram) : null;
  const channels = buildChannels(config, bot?.api);
  const notifier = new FanOutNotifier(channels);

  log.info(`Telegram: ${isTelegramConfigured(config) ? "configured" : "not configured"}`);
  log.info(`Email:    ${isEmailConfigured(config) ? "configured" : "not configured"}`);
  log.info(`SMS:      ${isSmsConfigured(config) ? "configured" : "not configured"}`);

  const monitor = new MonitoringCycle({
    watchlist,
    prices,
    ledger,
    marketData: new YahooMarketData(),
    notifier,
    market: config.market,
    retry: config.retry,
    historyLookbackDays: config.historyLookbackDays,
    priceDigest: config.priceDigest,
  });

  const app = createApp({ watchlist, ledger, monitor });
  const server = app.listen(config.port, () => {
    log.info(`HTTP API listening on http://localhost:${config.port}`);
  });

  const scheduler = startScheduler(monitor, config);

  let listener: TelegramListener | null = null;
  if (bot && config.telegram) {
    const commands = new AsyncChannel<InboundCommand>();
    listener = new TelegramListener(bot, config.telegram.chatId, commands);
    void runCommandLoop(commands, { watchlist, status: () => monitor.statusSnapshot() }).catch((e: unknown) => {
      log.error(`Command loop stopped: ${errorMessage(e)}`);
    });
    listener.start();
  }

  try {
    const symbols = (await watchlist.listActive()).map((e) => e.symbol);
    await notifier.send(formatStartupMessage(symbols, config.market, new Date()));
  } catch (e) {
    log.warn(`Startup message not delivered: ${errorMessage(e)}`);
  }

  const shutdown = async (signal: string) => {
    log.info(`${signal} received, shutting down`);
    scheduler.stop();
    await listener?.stop();
    server.close();
    if (monitor.isRunning) log.info("Waiting for the running check to finish");
    await monitor.waitForIdle();
    await pool.end();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((e: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(e)}`);
        process.exit(1);
      });
    });
  }
}

let config: Config;
try {
  config = loadConfig();
} catch (e) {
  log.error(errorMessage(e));
  process.exit(1);
}
setLogLevel(config.logLevel);

main(config).catch((e: unknown) => {
  log.error(`Fatal: ${errorMessage(e)}`);
  process.exit(1);
});
