import { describe, it, expect, vi } from "vitest";
import { computeAverage, computeAverages, mean } from "../src/services/moving-average.js";
import { evaluateAverages } from "../src/services/alert-evaluator.js";
import { MemoryPriceStore } from "./helpers/memory-store.js";

describe("mean", () => {
  it("returns null for no values", () => {
    expect(mean([])).toBeNull();
  });

  it("averages the values", () => {
    expect(mean([1, 2, 3])).toBe(2);
  });
});

describe("computeAverage", () => {
  it("averages the seven most recent closes", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("SAP.DE", [10, 11, 9, 8, 12, 10, 11]);
    const avg = await computeAverage(store, "SAP.DE", 7);
    expect(avg).toBeCloseTo(10.142857, 6);
  });

  it("uses only the newest closes when more history exists", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("SAP.DE", [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    // newest seven: 4..10
    expect(await computeAverage(store, "SAP.DE", 7)).toBe(7);
  });

  it("averages over what exists when history is shorter than the window", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("SAP.DE", [1, 2, 3]);
    expect(await computeAverage(store, "SAP.DE", 30)).toBe(2);
  });

  it("skips days without a close", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("SAP.DE", [5, null, 7]);
    expect(await computeAverage(store, "SAP.DE", 7)).toBe(6);
  });

  it("returns null when the symbol has no history", async () => {
    expect(await computeAverage(new MemoryPriceStore(), "NOPE", 7)).toBeNull();
  });

  it("ignores other symbols", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("AAA", [100, 100]);
    store.seedCloses("BBB", [1, 3]);
    expect(await computeAverage(store, "BBB", 7)).toBe(2);
  });
});

describe("computeAverages", () => {
  it("reads the longest window once and slices the shorter ones", async () => {
    const store = new MemoryPriceStore();
    store.seedCloses("SAP.DE", Array.from({ length: 100 }, (_, i) => i + 1));
    const spy = vi.spyOn(store, "getRecentCloses");

    const averages = await computeAverages(store, "SAP.DE");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("SAP.DE", 90);
    // newest 7: 94..100, newest 30: 71..100, newest 90: 11..100
    expect(averages.get(7)).toBe(97);
    expect(averages.get(30)).toBe(85.5);
    expect(averages.get(90)).toBe(55.5);
  });

  it("reports every window as no data without history, so nothing triggers", async () => {
    const averages = await computeAverages(new MemoryPriceStore(), "EMPTY");
    expect([...averages.entries()]).toEqual([
      [7, null],
      [30, null],
      [90, null],
    ]);
    expect(evaluateAverages(9.5, averages)).toEqual([]);
  });

  it("returns an empty map for no windows", async () => {
    const store = new MemoryPriceStore();
    const spy = vi.spyOn(store, "getRecentCloses");
    expect((await computeAverages(store, "SAP.DE", [])).size).toBe(0);
    expect(spy).not.toHaveBeenCalled();
  });
});
