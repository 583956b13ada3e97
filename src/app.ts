import express from "express";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { MonitoringCycle } from "./services/monitor.js";
import type { AlertLedger } from "./store/alert-ledger.js";
import type { WatchlistRepository } from "./store/watchlist.js";

const log = createLogger("http");

const DAY_MS = 24 * 60 * 60 * 1000;

const NewEntryBody = z.object({
  symbol: z
    .string()
    .trim()
    .min(1, "symbol is required")
    .max(15)
    .regex(/^[A-Za-z0-9][A-Za-z0-9.\-=^]*$/, "symbol contains invalid characters"),
  name: z.string().trim().min(1).max(100).optional(),
  sector: z.string().trim().min(1).max(50).optional(),
  notes: z.string().max(500).optional(),
});

const DaysQuery = z.coerce.number().int().min(1).max(365).default(7);

export interface AppDeps {
  watchlist: WatchlistRepository;
  ledger: AlertLedger;
  monitor: Pick<MonitoringCycle, "statusSnapshot" | "summarize">;
  clock?: () => Date;
}

export function createApp(deps: AppDeps): express.Express {
  const { watchlist, ledger, monitor } = deps;
  const clock = deps.clock ?? (() => new Date());
  const app = express();

  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  // ── Watchlist ───────────────────────────────────────────────────────────

  app.get("/api/watchlist", async (_req, res) => {
    try {
      res.json(await watchlist.listAll());
    } catch (err) {
      log.error(`GET /api/watchlist: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to list watchlist" });
    }
  });

  app.post("/api/watchlist", async (req, res) => {
    const parsed = NewEntryBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    try {
      const { entry, outcome } = await watchlist.add(parsed.data);
      if (outcome === "exists") {
        res.status(409).json({ error: `${entry.symbol} is already on the watchlist` });
        return;
      }
      log.info(`${outcome === "added" ? "Added" : "Reactivated"} ${entry.symbol}`);
      res.status(201).json(entry);
    } catch (err) {
      log.error(`POST /api/watchlist: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to add symbol" });
    }
  });

  app.delete("/api/watchlist/:symbol", async (req, res) => {
    try {
      const removed = await watchlist.remove(req.params.symbol);
      if (!removed) {
        res.status(404).json({ error: "Symbol not on the watchlist" });
        return;
      }
      res.json({ ok: true });
    } catch (err) {
      log.error(`DELETE /api/watchlist: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to remove symbol" });
    }
  });

  // ── Alerts & status ─────────────────────────────────────────────────────

  app.get("/api/alerts", async (req, res) => {
    const days = DaysQuery.safeParse(req.query.days);
    if (!days.success) {
      res.status(400).json({ error: "days must be an integer between 1 and 365" });
      return;
    }
    try {
      const since = new Date(clock().getTime() - days.data * DAY_MS);
      res.json(await ledger.listSince(since));
    } catch (err) {
      log.error(`GET /api/alerts: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to list alerts" });
    }
  });

  app.get("/api/summary/:symbol", async (req, res) => {
    try {
      const entry = await watchlist.find(req.params.symbol);
      if (!entry) {
        res.status(404).json({ error: "Symbol not on the watchlist" });
        return;
      }
      res.json(await monitor.summarize(entry.symbol));
    } catch (err) {
      log.error(`GET /api/summary: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to build summary" });
    }
  });

  app.get("/api/status", async (_req, res) => {
    try {
      res.json(await monitor.statusSnapshot());
    } catch (err) {
      log.error(`GET /api/status: ${errorMessage(err)}`);
      res.status(500).json({ error: "Failed to read status" });
    }
  });

  return app;
}
