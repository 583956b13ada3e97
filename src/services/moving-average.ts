import type { PriceStore } from "../store/price-store.js";
import { AVERAGE_WINDOWS } from "../types.js";
import type { WindowAverages, WindowDays } from "../types.js";

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Mean close of the `window` most recent trading days, or over all of them
 * when fewer exist. `null` when the symbol has no closes at all.
 */
export async function computeAverage(store: PriceStore, symbol: string, window: WindowDays): Promise<number | null> {
  return mean(await store.getRecentCloses(symbol, window));
}

/** Reads the longest window once and slices the shorter ones from it. */
export async function computeAverages(
  store: PriceStore,
  symbol: string,
  windows: readonly WindowDays[] = AVERAGE_WINDOWS,
): Promise<WindowAverages> {
  const averages: WindowAverages = new Map();
  if (windows.length === 0) return averages;

  const closes = await store.getRecentCloses(symbol, Math.max(...windows));
  for (const window of windows) {
    averages.set(window, mean(closes.slice(0, window)));
  }
  return averages;
}
