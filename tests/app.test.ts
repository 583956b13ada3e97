import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { Server } from "node:http";
import { createApp } from "../src/app.js";
import { MonitoringCycle } from "../src/services/monitor.js";
import { MemoryAlertLedger, MemoryPriceStore, MemoryWatchlist } from "./helpers/memory-store.js";

const NOW = new Date("2024-07-16T08:00:00Z");

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let watchlist: MemoryWatchlist;
  let ledger: MemoryAlertLedger;
  let prices: MemoryPriceStore;

  beforeEach(async () => {
    watchlist = new MemoryWatchlist(["SAP.DE"]);
    ledger = new MemoryAlertLedger();
    prices = new MemoryPriceStore();

    const monitor = new MonitoringCycle({
      watchlist,
      prices,
      ledger,
      marketData: {
        fetchQuote: () => Promise.reject(new Error("offline")),
        fetchHistory: () => Promise.resolve([]),
      },
      notifier: { send: () => Promise.resolve() },
      market: { timeZone: "Europe/Berlin", open: { hour: 9, minute: 0 }, close: { hour: 17, minute: 30 } },
      retry: { attempts: 1, baseDelayMs: 0, timeoutMs: 1000 },
      historyLookbackDays: 150,
      clock: () => NOW,
    });

    server = createApp({ watchlist, ledger, monitor, clock: () => NOW }).listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function post(path: string, body: object) {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("GET /api/health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  describe("watchlist", () => {
    it("adds a symbol", async () => {
      const res = await post("/api/watchlist", { symbol: "bmw.de", name: "BMW", sector: "Automotive" });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ symbol: "BMW.DE", name: "BMW", sector: "Automotive", active: true });
      expect((await watchlist.find("BMW.DE"))?.active).toBe(true);
    });

    it("rejects a duplicate", async () => {
      const res = await post("/api/watchlist", { symbol: "SAP.DE" });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: "SAP.DE is already on the watchlist" });
    });

    it("validates the body", async () => {
      const res = await post("/api/watchlist", { symbol: "SAP DE!" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "symbol contains invalid characters" });
    });

    it("lists active and removed entries", async () => {
      await watchlist.add({ symbol: "BMW.DE" });
      await watchlist.remove("BMW.DE");
      const res = await fetch(`${baseUrl}/api/watchlist`);
      const body: unknown = await res.json();
      expect(body).toEqual([
        expect.objectContaining({ symbol: "SAP.DE", active: true }),
        expect.objectContaining({ symbol: "BMW.DE", active: false }),
      ]);
    });

    it("removes a symbol and 404s when it is not watched", async () => {
      const first = await fetch(`${baseUrl}/api/watchlist/sap.de`, { method: "DELETE" });
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ ok: true });

      const second = await fetch(`${baseUrl}/api/watchlist/sap.de`, { method: "DELETE" });
      expect(second.status).toBe(404);
    });
  });

  describe("alerts", () => {
    beforeEach(async () => {
      const base = {
        symbol: "SAP.DE",
        currentPrice: 9.5,
        averagePrice: 10,
        absDiff: 0.5,
        pctDiff: 5,
      };
      await ledger.recordIfAbsent({
        ...base,
        window: 7,
        sessionStart: new Date("2024-07-15T07:00:00Z"),
        sentAt: new Date("2024-07-15T08:00:00Z"),
      });
      await ledger.recordIfAbsent({
        ...base,
        window: 30,
        sessionStart: new Date("2024-07-01T07:00:00Z"),
        sentAt: new Date("2024-07-01T08:00:00Z"),
      });
    });

    it("returns the last seven days by default", async () => {
      const res = await fetch(`${baseUrl}/api/alerts`);
      const body: unknown = await res.json();
      expect(body).toEqual([expect.objectContaining({ window: 7, sentAt: "2024-07-15T08:00:00.000Z" })]);
    });

    it("honours ?days", async () => {
      const res = await fetch(`${baseUrl}/api/alerts?days=30`);
      const body: unknown = await res.json();
      expect(Array.isArray(body) && body.length).toBe(2);
    });

    it("rejects a bad ?days", async () => {
      const res = await fetch(`${baseUrl}/api/alerts?days=abc`);
      expect(res.status).toBe(400);
    });
  });

  describe("summary and status", () => {
    it("summarises a watched symbol", async () => {
      prices.seedCloses("SAP.DE", [10, 11, 9, 8, 12, 10, 11]);
      const res = await fetch(`${baseUrl}/api/summary/SAP.DE`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ symbol: "SAP.DE", quote: null, candidates: [] });
    });

    it("404s for a symbol that is not watched", async () => {
      const res = await fetch(`${baseUrl}/api/summary/NOPE`);
      expect(res.status).toBe(404);
    });

    it("returns the status snapshot", async () => {
      const res = await fetch(`${baseUrl}/api/status`);
      expect(await res.json()).toEqual({
        now: "2024-07-16T08:00:00.000Z",
        marketOpen: true,
        timeZone: "Europe/Berlin",
        sessionStart: "2024-07-16T07:00:00.000Z",
        symbols: ["SAP.DE"],
        lastCycle: null,
        lastSync: null,
      });
    });
  });
});
